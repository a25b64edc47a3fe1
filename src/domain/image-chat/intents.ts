/**
 * Inbound intents - the closed set of requests a client can make on a session
 */

import type { ImagePurpose, StylePreset } from './presets.js';

export interface IChatIntent {
  kind: 'chat';
  content: string;
  purpose?: ImagePurpose;
  style?: StylePreset;
}

export interface IGenerateIntent {
  kind: 'generate';
  content: string;
  purpose?: ImagePurpose;
  style?: StylePreset;
  /** Optional reference image from this session */
  imageId?: string;
}

export interface IRefineIntent {
  kind: 'refine';
  content: string;
  imageId: string;
}

export interface IConverseIntent {
  kind: 'converse';
  content: string;
  purpose?: ImagePurpose;
  style?: StylePreset;
}

export type InboundIntent = IChatIntent | IGenerateIntent | IRefineIntent | IConverseIntent;

export type IntentKind = InboundIntent['kind'];

export const INTENT_KINDS: readonly IntentKind[] = ['chat', 'generate', 'refine', 'converse'];

export const MAX_CONTENT_LENGTH: Record<IntentKind, number> = {
  chat: 2000,
  generate: 1000,
  refine: 500,
  converse: 2000,
};

export function isIntentKind(value: unknown): value is IntentKind {
  return typeof value === 'string' && INTENT_KINDS.some(candidate => candidate === value);
}

/** Intents that are expected to yield an image */
export function producesImage(intent: InboundIntent): boolean {
  return intent.kind === 'generate' || intent.kind === 'refine';
}
