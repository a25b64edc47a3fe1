/**
 * Frame Codec - Decodes client frames into intents and builds server frames
 */

import {
  MAX_CONTENT_LENGTH,
  isIntentKind,
  type InboundIntent,
  type IntentKind,
} from '../../domain/image-chat/intents.js';
import {
  isImagePurpose,
  isStylePreset,
  type ImagePurpose,
  type StylePreset,
} from '../../domain/image-chat/presets.js';
import { GatewayError } from '../errors.js';
import type { ResultFrameData, ServerFrame, TerminalFrameType } from '../types.js';

export type DecodeResult =
  | { success: true; intent: InboundIntent }
  | { success: false; error: GatewayError };

interface Selection {
  purpose?: ImagePurpose;
  style?: StylePreset;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(error: GatewayError): DecodeResult {
  return { success: false, error };
}

export class FrameCodec {
  /**
   * Decode a raw client frame into a validated intent
   */
  decode(raw: string | Buffer): DecodeResult {
    let json: unknown;

    try {
      const str = typeof raw === 'string' ? raw : raw.toString('utf-8');
      json = JSON.parse(str);
    } catch {
      return fail(GatewayError.parseError('Invalid JSON'));
    }

    if (!isRecord(json)) {
      return fail(GatewayError.invalidRequest('Frame must be an object'));
    }

    const type = json.type;
    if (typeof type !== 'string' || type.length === 0) {
      return fail(GatewayError.invalidRequest('Missing or invalid "type" field'));
    }

    if (!isIntentKind(type)) {
      return fail(GatewayError.unknownIntent(type));
    }

    const content = this.readContent(type, json.content);
    if (content instanceof GatewayError) {
      return fail(content);
    }

    const data = json.data;
    let fields: Record<string, unknown> = {};
    if (data !== undefined) {
      if (!isRecord(data)) {
        return fail(GatewayError.invalidField('data', 'must be an object'));
      }
      fields = data;
    }

    const rawImageId = fields.image_id;
    let imageId: string | undefined;
    if (rawImageId !== undefined) {
      if (typeof rawImageId !== 'string' || rawImageId.trim().length === 0) {
        return fail(GatewayError.invalidField('image_id', 'must be a non-empty string'));
      }
      imageId = rawImageId.trim();
    }

    if (type === 'refine') {
      if (imageId === undefined) {
        return fail(GatewayError.invalidField('image_id', 'is required for refine'));
      }
      return { success: true, intent: { kind: 'refine', content, imageId } };
    }

    const selection = this.readSelection(fields);
    if (selection instanceof GatewayError) {
      return fail(selection);
    }

    switch (type) {
      case 'chat':
        return { success: true, intent: { kind: 'chat', content, ...selection } };
      case 'converse':
        return { success: true, intent: { kind: 'converse', content, ...selection } };
      case 'generate':
        return {
          success: true,
          intent: { kind: 'generate', content, ...selection, ...(imageId !== undefined && { imageId }) },
        };
    }
  }

  private readContent(kind: IntentKind, value: unknown): string | GatewayError {
    if (typeof value !== 'string') {
      return GatewayError.invalidField('content', 'is required');
    }

    const content = value.trim();
    if (content.length === 0) {
      return GatewayError.invalidField('content', 'must not be empty');
    }

    const limit = MAX_CONTENT_LENGTH[kind];
    if (Array.from(content).length > limit) {
      return GatewayError.invalidField('content', `must be at most ${limit} characters for ${kind}`);
    }

    return content;
  }

  private readSelection(fields: Record<string, unknown>): Selection | GatewayError {
    const selection: Selection = {};

    const purpose = fields.purpose;
    if (purpose !== undefined) {
      if (!isImagePurpose(purpose)) {
        return GatewayError.invalidField('purpose', `unknown purpose ${JSON.stringify(purpose)}`);
      }
      selection.purpose = purpose;
    }

    const style = fields.style;
    if (style !== undefined) {
      if (!isStylePreset(style)) {
        return GatewayError.invalidField('style', `unknown style ${JSON.stringify(style)}`);
      }
      selection.style = style;
    }

    return selection;
  }

  /**
   * Serialize a frame to JSON string
   */
  encode(frame: ServerFrame): string {
    return JSON.stringify(frame);
  }

  status(content: string, data?: Record<string, unknown>): ServerFrame {
    return {
      type: 'status',
      content,
      ...(data && { data }),
      timestamp: new Date().toISOString(),
    };
  }

  result(
    type: Exclude<TerminalFrameType, 'error'>,
    payload: { content?: string; imageUrl?: string; data: ResultFrameData }
  ): ServerFrame {
    return {
      type,
      ...(payload.content !== undefined && { content: payload.content }),
      ...(payload.imageUrl !== undefined && { image_url: payload.imageUrl }),
      data: { ...payload.data },
      timestamp: new Date().toISOString(),
    };
  }

  error(error: GatewayError): ServerFrame {
    return {
      type: 'error',
      content: error.message,
      data: { ...error.toFrameData() },
      timestamp: new Date().toISOString(),
    };
  }
}
