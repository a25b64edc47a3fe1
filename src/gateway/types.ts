/**
 * Gateway Types - WebSocket communication layer types
 */

import type { ErrorCategory } from './errors.js';

// ============================================================================
// Wire Frame Types
// ============================================================================

/** Client -> Server frame as it appears on the wire */
export interface ClientFrame {
  type: string;
  content: string;
  data?: {
    purpose?: string;
    style?: string;
    image_id?: string;
  };
}

export type ServerFrameType = 'status' | 'message' | 'image' | 'mixed' | 'error';

/** Server -> Client frame */
export interface ServerFrame {
  type: ServerFrameType;
  content?: string;
  image_url?: string;
  data?: Record<string, unknown>;
  timestamp: string;
}

/** Terminal frames close out one inbound request */
export type TerminalFrameType = Exclude<ServerFrameType, 'status'>;

export type ErrorFrameData = {
  code: number;
  reason: string;
  category: ErrorCategory;
  details?: unknown;
};

export type ResultFrameData = {
  message_id: string;
  generation_time_ms: number;
  image_id?: string;
  model_used?: string;
  prompt_used?: string;
  width?: number;
  height?: number;
  tokens_used?: number;
};

// ============================================================================
// Connection Types
// ============================================================================

/**
 * One physical duplex channel. The server wraps `ws` sockets in this shape;
 * tests provide an in-process stand-in.
 */
export interface IConnection {
  readonly id: string;
  readonly remoteAddress: string;
  isOpen(): boolean;
  send(payload: string): void;
  close(code: number, reason: string): void;
  terminate(): void;
  ping(): void;
  onPong(listener: () => void): void;
}

export const CloseCodes = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  SUPERSEDED: 4000,
  BAD_PATH: 4400,
  SESSION_NOT_FOUND: 4404,
  CONNECTION_LIMIT: 4006,
  HEARTBEAT_TIMEOUT: 4008,
} as const;

// ============================================================================
// Configuration Types
// ============================================================================

export interface GatewayConfig {
  host: string;
  port: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  maxConnectionsPerIp: number;
  /** Unbound, idle session states older than this are evicted */
  sessionIdleMs: number;
}

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  host: '127.0.0.1',
  port: 8000,
  heartbeatIntervalMs: 30000,
  heartbeatTimeoutMs: 10000,
  maxConnectionsPerIp: 10,
  sessionIdleMs: 30 * 60 * 1000,
};

export const SESSION_PATH_PREFIX = '/ws/image-chat/';
