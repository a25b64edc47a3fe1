/**
 * Session State - in-memory view of one logical conversation.
 * Keyed by session id, outlives the connections bound to it.
 */

import type { ImagePurpose, StylePreset } from '../../domain/image-chat/presets.js';
import type { IGeneratedImage } from '../../domain/image-chat/session.js';
import type { ContextTurn } from '../../infra/generation/image-backend.js';
import type { FrameCodec } from '../protocol/frame-codec.js';
import type { IConnection, ServerFrame } from '../types.js';
import { GenerationLock } from './generation-lock.js';

export interface SessionStateInit {
  id: string;
  purpose: ImagePurpose;
  style?: StylePreset;
  lastImage?: IGeneratedImage;
  context?: ContextTurn[];
  contextWindow: number;
  /** Messages already in the log */
  messageCount?: number;
}

export class SessionState {
  readonly id: string;
  private connection: IConnection | null = null;
  private purpose: ImagePurpose;
  private style: StylePreset | undefined;
  private latestImage: IGeneratedImage | undefined;
  private context: ContextTurn[];
  private readonly windowSize: number;
  private readonly lock = new GenerationLock();
  private lastActivityAt = Date.now();
  private logged: number;

  constructor(
    init: SessionStateInit,
    private codec: FrameCodec
  ) {
    this.id = init.id;
    this.purpose = init.purpose;
    this.style = init.style;
    this.latestImage = init.lastImage;
    this.windowSize = init.contextWindow;
    this.logged = init.messageCount ?? 0;
    const context = init.context ?? [];
    this.context = this.windowSize > 0 ? context.slice(-this.windowSize) : [];
  }

  // ==========================================================================
  // Connection binding
  // ==========================================================================

  /**
   * Bind a connection. Returns the previously bound connection, if any.
   */
  bind(connection: IConnection): IConnection | null {
    const previous = this.connection;
    this.connection = connection;
    this.touch();
    return previous && previous !== connection ? previous : null;
  }

  /**
   * Unbind. With a connection argument only that connection is unbound.
   */
  unbind(connection?: IConnection): boolean {
    if (!this.connection) return false;
    if (connection && connection !== this.connection) return false;
    this.connection = null;
    this.touch();
    return true;
  }

  isBound(): boolean {
    return this.connection !== null;
  }

  get boundConnection(): IConnection | null {
    return this.connection;
  }

  /**
   * Deliver a frame to the bound live connection; dropped when there is none
   */
  send(frame: ServerFrame): boolean {
    const connection = this.connection;
    if (!connection || !connection.isOpen()) {
      return false;
    }

    try {
      connection.send(this.codec.encode(frame));
      return true;
    } catch (error) {
      console.warn(
        `[SessionState] Failed to send ${frame.type} frame to ${connection.id}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      return false;
    }
  }

  // ==========================================================================
  // Selection
  // ==========================================================================

  get currentPurpose(): ImagePurpose {
    return this.purpose;
  }

  set currentPurpose(purpose: ImagePurpose) {
    this.purpose = purpose;
  }

  get currentStyle(): StylePreset | undefined {
    return this.style;
  }

  set currentStyle(style: StylePreset | undefined) {
    this.style = style;
  }

  // ==========================================================================
  // Image and context (mutated inside the generation lock)
  // ==========================================================================

  lastImage(): IGeneratedImage | undefined {
    return this.latestImage;
  }

  recordImage(image: IGeneratedImage): void {
    this.latestImage = image;
  }

  contextWindow(): ContextTurn[] {
    return this.context.map(turn => ({ ...turn }));
  }

  pushContext(turn: ContextTurn): void {
    if (this.windowSize <= 0) return;
    this.context.push(turn);
    if (this.context.length > this.windowSize) {
      this.context.splice(0, this.context.length - this.windowSize);
    }
  }

  /** Number of messages appended to the log for this session */
  get messageCount(): number {
    return this.logged;
  }

  countMessage(): void {
    this.logged++;
  }

  // ==========================================================================
  // Generation lock
  // ==========================================================================

  withGenerationLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.run(fn);
  }

  isGenerating(): boolean {
    return this.lock.isHeld();
  }

  /** Requests holding or waiting for the lock */
  get pendingGenerations(): number {
    return this.lock.size;
  }

  // ==========================================================================
  // Activity
  // ==========================================================================

  touch(): void {
    this.lastActivityAt = Date.now();
  }

  idleFor(now: number = Date.now()): number {
    return now - this.lastActivityAt;
  }
}
