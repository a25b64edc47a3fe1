/**
 * Heartbeat Handler - ping/pong liveness for bound connections
 */

import { debug } from '../../debug/index.js';
import type { IConnection } from '../types.js';

export interface HeartbeatConfig {
  intervalMs: number;
  timeoutMs: number;
}

interface ConnectionState {
  connection: IConnection;
  lastPong: number;
  isAlive: boolean;
}

export class HeartbeatHandler {
  private connections = new Map<string, ConnectionState>();
  private intervalTimer?: NodeJS.Timeout;
  private readonly config: HeartbeatConfig;
  private onTimeout?: (connection: IConnection) => void;

  constructor(config: HeartbeatConfig) {
    this.config = config;
  }

  setTimeoutCallback(callback: (connection: IConnection) => void): void {
    this.onTimeout = callback;
  }

  start(): void {
    if (this.intervalTimer) return;

    this.intervalTimer = setInterval(() => {
      this.checkConnections();
    }, this.config.intervalMs);
  }

  stop(): void {
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = undefined;
    }
    this.connections.clear();
  }

  addConnection(connection: IConnection): void {
    this.connections.set(connection.id, {
      connection,
      lastPong: Date.now(),
      isAlive: true,
    });

    connection.onPong(() => {
      const state = this.connections.get(connection.id);
      if (state) {
        state.lastPong = Date.now();
        state.isAlive = true;
      }
    });
  }

  removeConnection(connectionId: string): void {
    this.connections.delete(connectionId);
  }

  checkConnections(): void {
    const now = Date.now();

    for (const state of [...this.connections.values()]) {
      const silentMs = now - state.lastPong;
      if (!state.isAlive && silentMs > this.config.timeoutMs) {
        console.log(`[Heartbeat] Connection ${state.connection.id} silent for ${silentMs}ms`);
        this.expire(state, silentMs, 'no_pong');
        continue;
      }

      state.isAlive = false;
      try {
        state.connection.ping();
      } catch (error) {
        console.error(`[Heartbeat] Failed to ping ${state.connection.id}:`, error);
        this.expire(state, silentMs, 'ping_failed');
      }
    }
  }

  private expire(state: ConnectionState, silentMs: number, cause: 'no_pong' | 'ping_failed'): void {
    this.connections.delete(state.connection.id);
    debug.heartbeatTimeout(state.connection.id, silentMs, cause);
    this.onTimeout?.(state.connection);
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  isConnectionAlive(connectionId: string): boolean {
    return this.connections.get(connectionId)?.isAlive ?? false;
  }
}
