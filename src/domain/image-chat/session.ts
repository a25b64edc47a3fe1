/**
 * Image Chat Session Domain Types
 */

import type { ImagePurpose, StylePreset } from './presets.js';

export type SessionStatus = 'active' | 'completed' | 'archived';

export const SESSION_STATUSES: readonly SessionStatus[] = ['active', 'completed', 'archived'];

export type MessageRole = 'user' | 'assistant';

export type ContentKind = 'text' | 'image' | 'mixed';

export interface IImageChatSession {
  id: string;
  title?: string;
  purpose: ImagePurpose;
  style?: StylePreset;
  status: SessionStatus;
  messagesCount: number;
  imagesGenerated: number;
  totalTokensUsed: number;
  finalImageUrl?: string;
  lastImageId?: string;
  createdAt: number;
  updatedAt: number;
}

export interface IMessageMetadata {
  intent?: string;
  promptUsed?: string;
  modelUsed?: string;
  width?: number;
  height?: number;
  refinedFrom?: string;
  referenceImageId?: string;
}

export interface IChatMessage {
  id: string;
  sessionId: string;
  /** Per-session position in the log, starting at 1 */
  sequence: number;
  role: MessageRole;
  contentKind: ContentKind;
  text?: string;
  imageId?: string;
  imageUrl?: string;
  tokensUsed: number;
  generationTimeMs?: number;
  metadata?: IMessageMetadata;
  createdAt: number;
}

/** A message as handed to the store; id, sequence and createdAt are assigned on append */
export type NewChatMessage = Omit<IChatMessage, 'id' | 'sessionId' | 'sequence' | 'createdAt'> & {
  id?: string;
};

export interface IGeneratedImage {
  id: string;
  sessionId: string;
  messageId: string;
  mimeType: string;
  base64: string;
  width?: number;
  height?: number;
  promptUsed: string;
  modelUsed: string;
  purpose: ImagePurpose;
  createdAt: number;
}

export interface ISessionDetail extends IImageChatSession {
  messages: IChatMessage[];
}

export interface ISessionPage {
  sessions: IImageChatSession[];
  total: number;
  limit: number;
  offset: number;
}

export interface ICreateSessionInput {
  id?: string;
  title?: string;
  purpose: ImagePurpose;
  style?: StylePreset;
}

export interface ISessionPatch {
  title?: string;
  purpose?: ImagePurpose;
  /** null clears the style */
  style?: StylePreset | null;
  status?: SessionStatus;
}

export function toDataUrl(image: Pick<IGeneratedImage, 'mimeType' | 'base64'>): string {
  return `data:${image.mimeType};base64,${image.base64}`;
}

export function isSessionStatus(value: unknown): value is SessionStatus {
  return typeof value === 'string' && SESSION_STATUSES.some(candidate => candidate === value);
}

export function isContentKind(value: unknown): value is ContentKind {
  return value === 'text' || value === 'image' || value === 'mixed';
}
