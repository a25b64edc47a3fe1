import type { BackendAspectRatio } from '../../domain/image-chat/presets.js';

export type GenerationMode = 'chat' | 'generate' | 'refine' | 'converse';

export type GenerationFailureKind =
  | 'RateLimited'
  | 'InvalidInput'
  | 'UpstreamUnavailable'
  | 'Timeout'
  | 'Unknown';

export interface ImagePayload {
  data: Buffer;
  mimeType: string;
}

export interface ContextTurn {
  role: 'user' | 'assistant';
  text: string;
}

/**
 * Request handed to a backend after prompt building
 */
export interface BackendRequest {
  mode: GenerationMode;
  prompt: string;
  systemInstruction?: string;
  aspectRatio: BackendAspectRatio;
  context: ContextTurn[];
  priorImage?: ImagePayload;
  /** False for chat: the backend must answer with text only */
  allowImage: boolean;
}

export interface BackendResponse {
  text?: string;
  image?: ImagePayload;
  tokensUsed: number;
  model: string;
}

export interface IImageBackend {
  readonly name: string;
  generate(request: BackendRequest, signal: AbortSignal): Promise<BackendResponse>;
}

export class GenerationFailure extends Error {
  constructor(
    public readonly kind: GenerationFailureKind,
    message: string,
    public readonly backend?: string
  ) {
    super(message);
    this.name = 'GenerationFailure';
  }
}

export function isGenerationFailure(error: unknown): error is GenerationFailure {
  return error instanceof GenerationFailure;
}
