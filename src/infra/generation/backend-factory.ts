import type { ImageChatRuntimeConfig } from '../config/runtime-config.js';
import type { IImageBackend } from './image-backend.js';
import { GeminiImageBackend } from './gemini-image-backend.js';
import { MockImageBackend } from './mock-image-backend.js';

export interface BackendSelection {
  /** Force the offline backend even when a key is configured */
  mock?: boolean;
}

export function createImageBackend(
  generation: ImageChatRuntimeConfig['generation'],
  selection: BackendSelection = {}
): IImageBackend {
  if (selection.mock) {
    return new MockImageBackend();
  }

  if (!generation.apiKey) {
    console.warn('[Generation] GEMINI_API_KEY is not set, falling back to the mock backend');
    return new MockImageBackend();
  }

  return new GeminiImageBackend({
    apiKey: generation.apiKey,
    model: generation.model,
    baseUrl: generation.baseUrl,
  });
}
