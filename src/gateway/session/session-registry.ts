/**
 * Session Registry - owns every in-memory Session State.
 * At most one state per session id; rebuilt from the store on first use.
 */

import type { IChatMessage } from '../../domain/image-chat/session.js';
import type { ContextTurn } from '../../infra/generation/image-backend.js';
import type { ISessionStore } from '../../infra/persistence/session-store.js';
import { FrameCodec } from '../protocol/frame-codec.js';
import { SessionState } from './session-state.js';

export interface SessionRegistryOptions {
  contextWindow: number;
}

export function toContextTurn(message: IChatMessage): ContextTurn | null {
  if (message.text && message.text.trim()) {
    return { role: message.role, text: message.text };
  }
  if (message.imageId) {
    return { role: message.role, text: `[image ${message.imageId}]` };
  }
  return null;
}

export class SessionRegistry {
  private states = new Map<string, SessionState>();

  constructor(
    private store: ISessionStore,
    private options: SessionRegistryOptions,
    private codec: FrameCodec = new FrameCodec()
  ) {}

  /**
   * Return the cached state, or load it from the store. Null when the session does not exist.
   */
  acquire(sessionId: string): SessionState | null {
    const cached = this.states.get(sessionId);
    if (cached) {
      return cached;
    }

    const session = this.store.getSessionSummary(sessionId);
    if (!session) {
      return null;
    }

    const lastImage = session.lastImageId
      ? this.store.getImage(sessionId, session.lastImageId) ?? undefined
      : undefined;

    const context: ContextTurn[] = [];
    if (this.options.contextWindow > 0) {
      for (const message of this.store.getRecentMessages(sessionId, this.options.contextWindow)) {
        const turn = toContextTurn(message);
        if (turn) context.push(turn);
      }
    }

    const state = new SessionState(
      {
        id: session.id,
        purpose: session.purpose,
        style: session.style,
        lastImage,
        context,
        contextWindow: this.options.contextWindow,
        messageCount: session.messagesCount,
      },
      this.codec
    );
    this.states.set(sessionId, state);
    return state;
  }

  has(sessionId: string): boolean {
    return this.states.has(sessionId);
  }

  get(sessionId: string): SessionState | undefined {
    return this.states.get(sessionId);
  }

  forget(sessionId: string): boolean {
    return this.states.delete(sessionId);
  }

  /**
   * Evict states that are unbound, idle and not generating
   */
  sweep(idleMs: number, now: number = Date.now()): number {
    let evicted = 0;
    for (const [id, state] of this.states) {
      if (!state.isBound() && state.pendingGenerations === 0 && state.idleFor(now) >= idleMs) {
        this.states.delete(id);
        evicted++;
      }
    }
    return evicted;
  }

  get size(): number {
    return this.states.size;
  }
}
