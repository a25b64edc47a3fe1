import {
  GenerationFailure,
  type BackendRequest,
  type BackendResponse,
  type IImageBackend,
  type ImagePayload,
} from './image-backend.js';

export interface GeminiBackendConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

interface GeminiPart {
  text?: string;
  inlineData?: { mimeType: string; data: string };
}

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

const INVALID_INPUT_STATUSES = new Set([400, 404, 413, 422]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Google AI Studio (Gemini) image backend
 * Uses the generativelanguage.googleapis.com generateContent endpoint
 */
export class GeminiImageBackend implements IImageBackend {
  readonly name = 'gemini';
  private baseUrl: string;

  constructor(private config: GeminiBackendConfig) {
    if (!config.apiKey) {
      throw new Error('Gemini API key is required');
    }
    this.baseUrl = config.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta';
  }

  async generate(request: BackendRequest, signal: AbortSignal): Promise<BackendResponse> {
    const contents: GeminiContent[] = request.context
      .filter(turn => turn.text.trim().length > 0)
      .map((turn): GeminiContent => ({
        role: turn.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: turn.text }],
      }));

    const finalParts: GeminiPart[] = [];
    if (request.priorImage) {
      finalParts.push({
        inlineData: {
          mimeType: request.priorImage.mimeType,
          data: request.priorImage.data.toString('base64'),
        },
      });
    }
    finalParts.push({ text: request.prompt });
    contents.push({ role: 'user', parts: finalParts });

    const body = {
      contents,
      systemInstruction: request.systemInstruction
        ? { parts: [{ text: request.systemInstruction }] }
        : undefined,
      generationConfig: request.allowImage
        ? {
            responseModalities: ['TEXT', 'IMAGE'],
            imageConfig: { aspectRatio: request.aspectRatio },
          }
        : { responseModalities: ['TEXT'] },
    };

    let response: Response;
    try {
      response = await fetch(
        `${this.baseUrl}/models/${this.config.model}:generateContent?key=${this.config.apiKey}`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(body),
          signal,
        }
      );
    } catch (error) {
      if (signal.aborted) {
        throw new GenerationFailure('Timeout', 'Gemini request aborted', this.name);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new GenerationFailure('UpstreamUnavailable', `Gemini request failed: ${message}`, this.name);
    }

    if (!response.ok) {
      const detail = await this.readErrorMessage(response);
      throw new GenerationFailure(
        this.classifyStatus(response.status),
        `Gemini API error (${response.status}): ${detail}`,
        this.name
      );
    }

    const data: unknown = await response.json();
    return this.parseResponse(data);
  }

  private classifyStatus(status: number): GenerationFailure['kind'] {
    if (status === 429) return 'RateLimited';
    if (INVALID_INPUT_STATUSES.has(status)) return 'InvalidInput';
    if (status >= 500) return 'UpstreamUnavailable';
    return 'Unknown';
  }

  private async readErrorMessage(response: Response): Promise<string> {
    try {
      const payload: unknown = await response.json();
      const apiError = isRecord(payload) ? payload.error : undefined;
      const message = isRecord(apiError) ? apiError.message : undefined;
      if (typeof message === 'string') {
        return message;
      }
    } catch (error) {
      console.warn(
        `[GeminiImageBackend] Unreadable error body: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return response.statusText;
  }

  private parseResponse(data: unknown): BackendResponse {
    if (!isRecord(data)) {
      throw new GenerationFailure('Unknown', 'Gemini returned a malformed response', this.name);
    }

    const textParts: string[] = [];
    let image: ImagePayload | undefined;

    const candidates: unknown = data.candidates;
    const first: unknown = Array.isArray(candidates) ? candidates[0] : undefined;
    const content = isRecord(first) ? first.content : undefined;
    const rawParts = isRecord(content) ? content.parts : undefined;
    const parts: unknown[] = Array.isArray(rawParts) ? rawParts : [];

    for (const part of parts) {
      if (!isRecord(part)) continue;
      const partText = part.text;
      if (typeof partText === 'string' && partText) {
        textParts.push(partText);
      }
      const rawInline = part.inlineData;
      const inline = isRecord(rawInline) ? rawInline : undefined;
      const inlineData = inline?.data;
      if (!image && inline && typeof inlineData === 'string') {
        const mimeType = inline.mimeType;
        image = {
          data: Buffer.from(inlineData, 'base64'),
          mimeType: typeof mimeType === 'string' ? mimeType : 'image/png',
        };
      }
    }

    const text = textParts.join('');

    if (!text && !image) {
      // Check for blocked content
      const feedback = data.promptFeedback;
      const blockReason = isRecord(feedback) ? feedback.blockReason : undefined;
      if (typeof blockReason === 'string') {
        throw new GenerationFailure('InvalidInput', `Gemini blocked request: ${blockReason}`, this.name);
      }
      const finishReason = isRecord(first) ? first.finishReason : undefined;
      if (finishReason === 'SAFETY' || finishReason === 'PROHIBITED_CONTENT' || finishReason === 'IMAGE_SAFETY') {
        throw new GenerationFailure('InvalidInput', `Gemini refused the request: ${finishReason}`, this.name);
      }
    }

    const usageMetadata = data.usageMetadata;
    const usage: Record<string, unknown> = isRecord(usageMetadata) ? usageMetadata : {};
    const tokensUsed = readNumber(usage.promptTokenCount) + readNumber(usage.candidatesTokenCount);
    const modelVersion = data.modelVersion;

    return {
      text: text || undefined,
      image,
      tokensUsed,
      model: typeof modelVersion === 'string' ? modelVersion : this.config.model,
    };
  }
}
