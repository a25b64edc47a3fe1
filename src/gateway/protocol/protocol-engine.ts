/**
 * Protocol Engine - turns one inbound frame into status frames and exactly
 * one terminal frame for a session.
 *
 * Validation and the user-turn append run synchronously on receipt, so turns
 * are logged in acceptance order. Generation runs under the session's
 * single-flight lock.
 */

import { randomUUID } from 'crypto';

import type { InboundIntent, IntentKind } from '../../domain/image-chat/intents.js';
import type { ImagePurpose, StylePreset } from '../../domain/image-chat/presets.js';
import {
  toDataUrl,
  type ContentKind,
  type IChatMessage,
  type IGeneratedImage,
  type IMessageMetadata,
} from '../../domain/image-chat/session.js';
import type { GenerationGateway, GenerationResult } from '../../infra/generation/generation-gateway.js';
import { toGenerationFailure } from '../../infra/generation/generation-gateway.js';
import type { ImagePayload } from '../../infra/generation/image-backend.js';
import type { ISessionStore, NewGeneratedImage } from '../../infra/persistence/session-store.js';
import { debug } from '../../debug/index.js';
import { GatewayError, isGatewayError } from '../errors.js';
import type { SessionState } from '../session/session-state.js';
import type { ResultFrameData, ServerFrame } from '../types.js';
import { FrameCodec } from './frame-codec.js';

const STATUS_STEPS: Record<IntentKind, { step: string; text: string }> = {
  chat: { step: 'responding', text: 'Generating response...' },
  generate: { step: 'generating', text: 'Generating image...' },
  refine: { step: 'refining', text: 'Refining image...' },
  converse: { step: 'thinking', text: 'Thinking...' },
};

/** A request that passed validation and has its user turn logged */
interface AcceptedTurn {
  intent: InboundIntent;
  userMessage: IChatMessage;
  purpose: ImagePurpose;
  style?: StylePreset;
  /** Image named by the request (refine target or generate reference) */
  inputImage?: IGeneratedImage;
}

function toPayload(image: IGeneratedImage): ImagePayload {
  return { data: Buffer.from(image.base64, 'base64'), mimeType: image.mimeType };
}

export class ProtocolEngine {
  constructor(
    private store: ISessionStore,
    private gateway: GenerationGateway,
    private codec: FrameCodec = new FrameCodec()
  ) {}

  /**
   * Handle one raw client frame. Acceptance happens before this returns its
   * promise; the promise settles once the terminal frame has been emitted.
   */
  async handleFrame(state: SessionState, raw: string | Buffer): Promise<void> {
    state.touch();

    const decoded = this.codec.decode(raw);
    if (!decoded.success) {
      this.reject(state, decoded.error);
      return;
    }

    await this.handleIntent(state, decoded.intent);
  }

  async handleIntent(state: SessionState, intent: InboundIntent): Promise<void> {
    let turn: AcceptedTurn;
    try {
      turn = this.accept(state, intent);
    } catch (error) {
      if (isGatewayError(error)) {
        this.reject(state, error);
      } else {
        console.error(`[ProtocolEngine] Failed to accept ${intent.kind} for session ${state.id}:`, error);
        this.reject(state, GatewayError.persistenceFailure(error));
      }
      return;
    }

    let frame: ServerFrame;
    try {
      frame = await state.withGenerationLock(() => this.execute(state, turn));
    } catch (error) {
      console.error(`[ProtocolEngine] Unexpected error for session ${state.id}:`, error);
      frame = this.codec.error(
        GatewayError.internalError(error instanceof Error ? error.message : String(error))
      );
    }

    state.send(frame);
  }

  // ==========================================================================
  // Acceptance (synchronous)
  // ==========================================================================

  private accept(state: SessionState, intent: InboundIntent): AcceptedTurn {
    const session = this.readStore(() => this.store.getSessionSummary(state.id));
    if (!session) {
      throw GatewayError.sessionNotFound(state.id);
    }
    if (session.status !== 'active') {
      throw GatewayError.sessionNotActive(state.id, session.status);
    }

    let inputImage: IGeneratedImage | undefined;
    if (intent.kind === 'refine') {
      if (!state.lastImage()) {
        throw GatewayError.noPriorImage();
      }
      inputImage = this.requireImage(state.id, intent.imageId);
    } else if (intent.kind === 'generate' && intent.imageId) {
      inputImage = this.requireImage(state.id, intent.imageId);
    }

    const purpose = intent.kind === 'refine' ? state.currentPurpose : intent.purpose ?? state.currentPurpose;
    const style = intent.kind === 'refine' ? state.currentStyle : intent.style ?? state.currentStyle;

    const previous = { purpose: state.currentPurpose, style: state.currentStyle };
    const selectionChanged = purpose !== previous.purpose || style !== previous.style;
    if (selectionChanged) {
      this.store.updateSession(state.id, { purpose, style });
      state.currentPurpose = purpose;
      state.currentStyle = style;
    }

    const metadata: IMessageMetadata = { intent: intent.kind };
    if (intent.kind === 'refine') metadata.refinedFrom = intent.imageId;
    if (intent.kind === 'generate' && intent.imageId) metadata.referenceImageId = intent.imageId;

    let userMessage: IChatMessage;
    try {
      userMessage = this.store.appendMessage(state.id, {
        role: 'user',
        contentKind: 'text',
        text: intent.content,
        tokensUsed: 0,
        metadata,
      });
    } catch (error) {
      if (selectionChanged) {
        this.restoreSelection(state, previous.purpose, previous.style);
      }
      throw error;
    }
    state.countMessage();

    return { intent, userMessage, purpose, style, inputImage };
  }

  /** A rejected request leaves the selection as it found it */
  private restoreSelection(state: SessionState, purpose: ImagePurpose, style: StylePreset | undefined): void {
    state.currentPurpose = purpose;
    state.currentStyle = style;
    try {
      this.store.updateSession(state.id, { purpose, style: style ?? null });
    } catch (error) {
      console.error(`[ProtocolEngine] Failed to restore selection for session ${state.id}:`, error);
    }
  }

  private requireImage(sessionId: string, imageId: string): IGeneratedImage {
    const image = this.readStore(() => this.store.getImage(sessionId, imageId));
    if (!image) {
      throw GatewayError.imageNotFound(imageId);
    }
    return image;
  }

  private readStore<T>(read: () => T): T {
    try {
      return read();
    } catch (error) {
      throw GatewayError.persistenceFailure(error);
    }
  }

  private reject(state: SessionState, error: GatewayError): void {
    if (error.category === 'persistence') {
      console.error(`[ProtocolEngine] ${error.message} (session ${state.id})`);
    }
    debug.frameRejected(state.id, error.code, error.message);
    state.send(this.codec.error(error));
  }

  // ==========================================================================
  // Execution (inside the generation lock)
  // ==========================================================================

  private async execute(state: SessionState, turn: AcceptedTurn): Promise<ServerFrame> {
    const { intent } = turn;
    const context = state.contextWindow();
    state.pushContext({ role: 'user', text: intent.content });

    const priorImage = turn.inputImage ?? (intent.kind === 'converse' ? state.lastImage() : undefined);

    const status = STATUS_STEPS[intent.kind];
    state.send(this.codec.status(status.text, { step: status.step, message_id: turn.userMessage.id }));
    debug.generationStarted(state.id, intent.kind, state.pendingGenerations - 1);

    let result: GenerationResult;
    try {
      result = await this.gateway.invoke({
        mode: intent.kind,
        content: intent.content,
        purpose: turn.purpose,
        style: turn.style,
        priorImage: priorImage ? toPayload(priorImage) : undefined,
        context,
      });
    } catch (error) {
      const failure = toGenerationFailure(error);
      console.warn(
        `[ProtocolEngine] ${intent.kind} failed for session ${state.id}: ${failure.kind}: ${failure.message}`
      );
      debug.generationFailed(state.id, intent.kind, failure.kind, failure.message);
      return this.codec.error(GatewayError.fromGenerationFailure(failure));
    }

    return this.complete(state, turn, result, priorImage);
  }

  private complete(
    state: SessionState,
    turn: AcceptedTurn,
    result: GenerationResult,
    priorImage: IGeneratedImage | undefined
  ): ServerFrame {
    const { intent } = turn;
    const contentKind: ContentKind = result.image ? (result.text ? 'mixed' : 'image') : 'text';

    const image: NewGeneratedImage | undefined = result.image && {
      id: randomUUID(),
      mimeType: result.image.mimeType,
      base64: result.image.data.toString('base64'),
      width: result.width,
      height: result.height,
      promptUsed: result.promptUsed,
      modelUsed: result.model,
      purpose: turn.purpose,
    };

    const metadata: IMessageMetadata = {
      intent: intent.kind,
      promptUsed: result.promptUsed,
      modelUsed: result.model,
      ...(image && { width: image.width, height: image.height }),
      ...(image && priorImage && { refinedFrom: priorImage.id }),
    };

    let message: IChatMessage;
    try {
      message = this.store.appendMessage(
        state.id,
        {
          role: 'assistant',
          contentKind,
          text: result.text,
          tokensUsed: result.tokensUsed,
          generationTimeMs: result.elapsedMs,
          metadata,
        },
        image
      );
    } catch (error) {
      const gatewayError = GatewayError.persistenceFailure(error);
      console.error(`[ProtocolEngine] ${gatewayError.message} (session ${state.id})`);
      return this.codec.error(gatewayError);
    }

    state.countMessage();
    if (image) {
      state.recordImage({ ...image, sessionId: state.id, messageId: message.id, createdAt: message.createdAt });
    }
    state.pushContext({ role: 'assistant', text: result.text ?? `[image ${image?.id ?? message.id}]` });

    debug.generationCompleted(state.id, intent.kind, result.elapsedMs, {
      hasText: result.text !== undefined,
      hasImage: image !== undefined,
      model: result.model,
    });

    const data: ResultFrameData = {
      message_id: message.id,
      generation_time_ms: result.elapsedMs,
      model_used: result.model,
      tokens_used: result.tokensUsed,
    };

    if (!image) {
      return this.codec.result('message', { content: result.text, data });
    }

    data.image_id = image.id;
    data.prompt_used = result.promptUsed;
    data.width = image.width;
    data.height = image.height;

    const imageUrl = toDataUrl(image);
    if (intent.kind === 'converse' && result.text) {
      return this.codec.result('mixed', { content: result.text, imageUrl, data });
    }
    return this.codec.result('image', {
      content: result.text ?? (intent.kind === 'refine' ? 'Image refined.' : 'Image generated.'),
      imageUrl,
      data,
    });
  }
}
