/**
 * Convenient debug API for instrumentation.
 * Provides typed methods for emitting common debug events.
 */

import { debugEmitter } from './emitter.js';

export const debug = {
  get enabled(): boolean {
    return debugEmitter.isEnabled();
  },

  // ========== Connection Events ==========

  connectionBound(sessionId: string, connectionId: string, resumed: boolean): void {
    debugEmitter.emitDebug('connection.bound', 'supervisor', { sessionId, connectionId, resumed });
  },

  connectionSuperseded(sessionId: string, previousConnectionId: string, connectionId: string): void {
    debugEmitter.emitDebug('connection.superseded', 'supervisor', {
      sessionId,
      previousConnectionId,
      connectionId,
    });
  },

  connectionUnbound(sessionId: string, connectionId: string, reason: string): void {
    debugEmitter.emitDebug('connection.unbound', 'supervisor', { sessionId, connectionId, reason });
  },

  // ========== Heartbeat Events ==========

  heartbeatTimeout(connectionId: string, silentMs: number, cause: 'no_pong' | 'ping_failed'): void {
    debugEmitter.emitDebug('connection.heartbeat_timeout', 'heartbeat', { connectionId, silentMs, cause });
  },

  // ========== Protocol Events ==========

  frameRejected(sessionId: string, code: number, message: string): void {
    debugEmitter.emitDebug('frame.rejected', 'protocol-engine', { sessionId, code, message });
  },

  // ========== Generation Events ==========

  generationStarted(sessionId: string, mode: string, queued: number): void {
    debugEmitter.emitDebug('generation.started', 'protocol-engine', { sessionId, mode, queued });
  },

  generationCompleted(
    sessionId: string,
    mode: string,
    elapsedMs: number,
    result: { hasText: boolean; hasImage: boolean; model: string }
  ): void {
    debugEmitter.emitDebug('generation.completed', 'protocol-engine', {
      sessionId,
      mode,
      elapsedMs,
      ...result,
    });
  },

  generationFailed(sessionId: string, mode: string, kind: string, message: string): void {
    debugEmitter.emitDebug('generation.failed', 'protocol-engine', { sessionId, mode, kind, message });
  },
};
