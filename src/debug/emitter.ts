/**
 * Debug event emitter singleton.
 * Provides the core event emission mechanism for the instrumentation system.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { DebugEvent, DebugContext } from './types.js';

/**
 * DebugEmitter manages debug event emission.
 * It can be enabled/disabled and maintains context for event correlation.
 */
class DebugEmitter extends EventEmitter {
  private _enabled = false;
  private context: DebugContext = {};

  enable(): void {
    this._enabled = true;
  }

  disable(): void {
    this._enabled = false;
  }

  isEnabled(): boolean {
    return this._enabled;
  }

  /**
   * Merge fields into the current context.
   * Context fields are added to all emitted events.
   */
  setContext(ctx: DebugContext): void {
    this.context = { ...this.context, ...ctx };
  }

  getContext(): DebugContext {
    return { ...this.context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Emit a debug event.
   * @param type - Event type in format "domain.action"
   * @param source - Source module identifier
   * @returns true if event was emitted, false if debug is disabled
   */
  emitDebug(type: string, source: string, data: Record<string, unknown>): boolean {
    if (!this._enabled) {
      return false;
    }

    const sessionId = typeof data.sessionId === 'string' ? data.sessionId : this.context.sessionId;
    const event: DebugEvent = {
      id: randomUUID(),
      timestamp: Date.now(),
      type,
      source,
      data,
      ...(sessionId && { sessionId }),
    };

    return super.emit('debug', event);
  }

  onDebug(handler: (event: DebugEvent) => void): void {
    this.on('debug', handler);
  }

  offDebug(handler: (event: DebugEvent) => void): void {
    this.off('debug', handler);
  }
}

// Singleton instance
export const debugEmitter = new DebugEmitter();
