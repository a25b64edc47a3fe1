import {
  GenerationFailure,
  type BackendRequest,
  type BackendResponse,
  type IImageBackend,
} from './image-backend.js';

/** 1x1 grayscale PNG */
export const MOCK_PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=';

const IMAGE_REQUEST_PATTERN =
  /\b(generate|create|make|draw|design|render|show|image|picture|photo|banner|poster|visual)\b/i;

export function readsLikeImageRequest(text: string): boolean {
  return IMAGE_REQUEST_PATTERN.test(text);
}

export interface MockBackendOptions {
  model?: string;
  /** Simulated latency; honours the abort signal */
  delayMs?: number;
}

/**
 * Offline backend producing deterministic replies and a 1x1 PNG
 */
export class MockImageBackend implements IImageBackend {
  readonly name = 'mock';
  private model: string;
  private delayMs: number;

  constructor(options: MockBackendOptions = {}) {
    this.model = options.model ?? 'mock-image';
    this.delayMs = options.delayMs ?? 0;
  }

  async generate(request: BackendRequest, signal: AbortSignal): Promise<BackendResponse> {
    if (this.delayMs > 0) {
      await this.wait(signal);
    }

    const tokensUsed = Math.ceil(request.prompt.length / 4);
    const image = { data: Buffer.from(MOCK_PNG_BASE64, 'base64'), mimeType: 'image/png' };

    switch (request.mode) {
      case 'chat':
        return { text: `Mock response to: ${request.prompt}`, tokensUsed, model: this.model };
      case 'generate':
      case 'refine':
        return { text: 'Here is your image.', image, tokensUsed, model: this.model };
      case 'converse':
        if (request.allowImage && readsLikeImageRequest(request.prompt)) {
          return { text: `Created an image for: ${request.prompt}`, image, tokensUsed, model: this.model };
        }
        return { text: `Mock response to: ${request.prompt}`, tokensUsed, model: this.model };
    }
  }

  private wait(signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new GenerationFailure('Timeout', 'Mock generation aborted', this.name));
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, this.delayMs);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
