/**
 * Connection Supervisor - accepts sockets for a session path, binds them to
 * Session State, supersedes older sockets and routes inbound frames.
 */

import { debug } from '../../debug/index.js';
import type { ProtocolEngine } from '../protocol/protocol-engine.js';
import { FrameCodec } from '../protocol/frame-codec.js';
import type { SessionRegistry } from '../session/session-registry.js';
import type { SessionState } from '../session/session-state.js';
import { CloseCodes, SESSION_PATH_PREFIX, type IConnection } from '../types.js';
import { HeartbeatHandler, type HeartbeatConfig } from './heartbeat.js';

export interface ConnectionSupervisorConfig {
  maxConnectionsPerIp: number;
  heartbeat: HeartbeatConfig;
  /** Unbound idle session states are swept after this long */
  sessionIdleMs: number;
}

interface TrackedConnection {
  connection: IConnection;
  sessionId: string;
}

const MAX_SESSION_ID_LENGTH = 128;

/**
 * Extract the session id from `/ws/image-chat/<sessionId>`; null for any other path
 */
export function parseSessionPath(url: string | undefined): string | null {
  if (!url) return null;

  const pathname = url.split('?')[0];
  if (!pathname.startsWith(SESSION_PATH_PREFIX)) return null;

  const encoded = pathname.slice(SESSION_PATH_PREFIX.length).replace(/\/$/, '');
  if (!encoded || encoded.includes('/')) return null;

  let sessionId: string;
  try {
    sessionId = decodeURIComponent(encoded);
  } catch {
    return null;
  }

  if (!sessionId.trim() || sessionId.length > MAX_SESSION_ID_LENGTH) return null;
  return sessionId;
}

export class ConnectionSupervisor {
  private connections = new Map<string, TrackedConnection>();
  private ipConnectionCounts = new Map<string, number>();
  private heartbeat: HeartbeatHandler;
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    private config: ConnectionSupervisorConfig,
    private registry: SessionRegistry,
    private engine: ProtocolEngine,
    private codec: FrameCodec = new FrameCodec()
  ) {
    this.heartbeat = new HeartbeatHandler(config.heartbeat);

    this.heartbeat.setTimeoutCallback((connection) => {
      this.handleClose(connection, 'heartbeat_timeout');
      connection.terminate();
    });
  }

  start(): void {
    this.heartbeat.start();

    if (!this.sweepTimer) {
      const interval = Math.min(this.config.sessionIdleMs, 60_000);
      this.sweepTimer = setInterval(() => {
        const evicted = this.registry.sweep(this.config.sessionIdleMs);
        if (evicted > 0) {
          console.log(`[ConnectionSupervisor] Evicted ${evicted} idle session(s)`);
        }
      }, interval);
      this.sweepTimer.unref();
    }
  }

  stop(): void {
    this.heartbeat.stop();

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }

    // Close all connections
    for (const { connection, sessionId } of this.connections.values()) {
      this.registry.get(sessionId)?.unbind(connection);
      try {
        connection.close(CloseCodes.GOING_AWAY, 'Server shutting down');
      } catch (error) {
        console.warn(`[ConnectionSupervisor] Failed to close ${connection.id} during shutdown:`, error);
      }
    }
    this.connections.clear();
    this.ipConnectionCounts.clear();
  }

  canAcceptConnection(remoteAddress: string): boolean {
    const count = this.ipConnectionCounts.get(remoteAddress) || 0;
    return count < this.config.maxConnectionsPerIp;
  }

  /**
   * Accept a new socket for a request path. Returns the bound state, or null
   * after closing the socket with the reason.
   */
  accept(connection: IConnection, path: string | undefined): SessionState | null {
    const sessionId = parseSessionPath(path);
    if (!sessionId) {
      connection.close(CloseCodes.BAD_PATH, 'Invalid session path');
      return null;
    }

    if (!this.canAcceptConnection(connection.remoteAddress)) {
      console.warn(`[ConnectionSupervisor] Connection limit reached for ${connection.remoteAddress}`);
      connection.close(CloseCodes.CONNECTION_LIMIT, 'Too many connections');
      return null;
    }

    let state: SessionState | null;
    try {
      state = this.registry.acquire(sessionId);
    } catch (error) {
      console.error(`[ConnectionSupervisor] Failed to load session ${sessionId}:`, error);
      connection.close(1011, 'Session store unavailable');
      return null;
    }

    if (!state) {
      connection.close(CloseCodes.SESSION_NOT_FOUND, 'Session not found');
      return null;
    }

    this.connections.set(connection.id, { connection, sessionId });
    const count = this.ipConnectionCounts.get(connection.remoteAddress) || 0;
    this.ipConnectionCounts.set(connection.remoteAddress, count + 1);
    this.heartbeat.addConnection(connection);

    const previous = state.bind(connection);
    if (previous) {
      console.log(`[ConnectionSupervisor] Session ${sessionId}: ${previous.id} superseded by ${connection.id}`);
      debug.connectionSuperseded(sessionId, previous.id, connection.id);
      this.release(previous);
      try {
        previous.close(CloseCodes.SUPERSEDED, 'superseded');
      } catch (error) {
        console.warn(`[ConnectionSupervisor] Failed to close superseded ${previous.id}:`, error);
      }
    }

    const resumed = state.messageCount > 0;
    debug.connectionBound(sessionId, connection.id, resumed);

    state.send(
      this.codec.status('Connected', {
        session_id: sessionId,
        resumed,
        last_image_id: state.lastImage()?.id ?? null,
        purpose: state.currentPurpose,
        style: state.currentStyle ?? null,
      })
    );

    return state;
  }

  /**
   * Route one inbound frame to the Protocol Engine of the connection's session
   */
  handleMessage(connection: IConnection, raw: string | Buffer): void {
    const tracked = this.connections.get(connection.id);
    if (!tracked) {
      return;
    }

    const state = this.registry.acquire(tracked.sessionId);
    if (!state) {
      connection.close(CloseCodes.SESSION_NOT_FOUND, 'Session not found');
      return;
    }

    this.engine.handleFrame(state, raw).catch((error: unknown) => {
      console.error(`[ConnectionSupervisor] Frame handling failed for session ${tracked.sessionId}:`, error);
    });
  }

  /**
   * Socket closed or timed out. Unbinds only when it is the bound connection.
   */
  handleClose(connection: IConnection, reason: string): void {
    const tracked = this.release(connection);
    if (!tracked) {
      return;
    }

    const state = this.registry.get(tracked.sessionId);
    if (state?.unbind(connection)) {
      debug.connectionUnbound(tracked.sessionId, connection.id, reason);
    }
  }

  private release(connection: IConnection): TrackedConnection | undefined {
    const tracked = this.connections.get(connection.id);
    if (!tracked) {
      return undefined;
    }

    this.connections.delete(connection.id);
    this.heartbeat.removeConnection(connection.id);

    const count = this.ipConnectionCounts.get(connection.remoteAddress) || 1;
    if (count <= 1) {
      this.ipConnectionCounts.delete(connection.remoteAddress);
    } else {
      this.ipConnectionCounts.set(connection.remoteAddress, count - 1);
    }

    return tracked;
  }

  /** Run one heartbeat round now */
  checkHeartbeats(): void {
    this.heartbeat.checkConnections();
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  getStats(): { connections: number; sessions: number; byIp: Record<string, number> } {
    return {
      connections: this.connections.size,
      sessions: this.registry.size,
      byIp: Object.fromEntries(this.ipConnectionCounts),
    };
  }
}
