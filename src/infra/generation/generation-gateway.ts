/**
 * Generation Gateway
 * Uniform adapter over an image backend: builds the prompt for the mode,
 * bounds the call with a timeout and classifies every failure.
 */

import { PURPOSE_PRESETS, type ImagePurpose, type StylePreset } from '../../domain/image-chat/presets.js';
import {
  GenerationFailure,
  type BackendRequest,
  type ContextTurn,
  type GenerationMode,
  type IImageBackend,
  type ImagePayload,
} from './image-backend.js';
import {
  CONSULTANT_INSTRUCTION,
  buildConverseInstruction,
  buildGeneratePrompt,
  buildRefinePrompt,
} from './prompt-builder.js';

export interface GenerationRequest {
  mode: GenerationMode;
  /** User text: chat message, generate prompt, refine feedback or converse turn */
  content: string;
  purpose: ImagePurpose;
  style?: StylePreset;
  priorImage?: ImagePayload;
  context: ContextTurn[];
}

export interface GenerationResult {
  text?: string;
  image?: ImagePayload;
  elapsedMs: number;
  tokensUsed: number;
  model: string;
  promptUsed: string;
  width?: number;
  height?: number;
}

export interface GenerationGatewayOptions {
  timeoutMs: number;
}

export const DEFAULT_GATEWAY_OPTIONS: GenerationGatewayOptions = {
  timeoutMs: 120_000,
};

export class GenerationGateway {
  private options: GenerationGatewayOptions;

  constructor(
    private backend: IImageBackend,
    options: Partial<GenerationGatewayOptions> = {}
  ) {
    this.options = { ...DEFAULT_GATEWAY_OPTIONS, ...options };
  }

  get backendName(): string {
    return this.backend.name;
  }

  async invoke(request: GenerationRequest): Promise<GenerationResult> {
    const backendRequest = this.buildBackendRequest(request);
    const controller = new AbortController();
    const startedAt = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new GenerationFailure(
            'Timeout',
            `Generation timed out after ${this.options.timeoutMs} ms`,
            this.backend.name
          )
        );
      }, this.options.timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.backend.generate(backendRequest, controller.signal),
        timeout,
      ]);

      const text = response.text?.trim() ? response.text : undefined;
      const image = request.mode === 'chat' ? undefined : response.image;

      if ((request.mode === 'generate' || request.mode === 'refine') && !image) {
        throw new GenerationFailure('Unknown', 'Backend response contained no image', this.backend.name);
      }
      if (!text && !image) {
        throw new GenerationFailure('Unknown', 'Backend returned an empty response', this.backend.name);
      }

      const preset = PURPOSE_PRESETS[request.purpose];
      return {
        text,
        image,
        elapsedMs: Date.now() - startedAt,
        tokensUsed: response.tokensUsed,
        model: response.model,
        promptUsed: backendRequest.prompt,
        ...(image && { width: preset.width, height: preset.height }),
      };
    } catch (error) {
      throw toGenerationFailure(error, this.backend.name);
    } finally {
      clearTimeout(timer);
    }
  }

  private buildBackendRequest(request: GenerationRequest): BackendRequest {
    const aspectRatio = PURPOSE_PRESETS[request.purpose].backendAspectRatio;
    const base = {
      mode: request.mode,
      aspectRatio,
      context: request.context,
      priorImage: request.priorImage,
    };

    switch (request.mode) {
      case 'chat':
        return {
          ...base,
          prompt: request.content,
          systemInstruction: CONSULTANT_INSTRUCTION,
          priorImage: undefined,
          allowImage: false,
        };
      case 'generate':
        return {
          ...base,
          prompt: buildGeneratePrompt(request.content, request.purpose, request.style),
          allowImage: true,
        };
      case 'refine':
        return {
          ...base,
          prompt: buildRefinePrompt(request.content),
          allowImage: true,
        };
      case 'converse':
        return {
          ...base,
          prompt: request.content,
          systemInstruction: buildConverseInstruction(request.purpose, request.style),
          allowImage: true,
        };
    }
  }
}

/**
 * Classify anything a backend throws; non-GenerationFailure errors are Unknown
 */
export function toGenerationFailure(error: unknown, backend?: string): GenerationFailure {
  if (error instanceof GenerationFailure) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GenerationFailure('Unknown', message, backend);
}
