/**
 * Gateway Module - Public exports
 */

// Main server
export { GatewayServer, type GatewayServerDependencies } from './gateway-server.js';

// Types
export {
  type ClientFrame,
  type ServerFrame,
  type ServerFrameType,
  type TerminalFrameType,
  type ErrorFrameData,
  type ResultFrameData,
  type IConnection,
  type GatewayConfig,
  CloseCodes,
  DEFAULT_GATEWAY_CONFIG,
  SESSION_PATH_PREFIX,
} from './types.js';

// Errors
export {
  GatewayError,
  ErrorCodes,
  ErrorMessages,
  isGatewayError,
  isValidationError,
  type ErrorCode,
  type ErrorCategory,
} from './errors.js';

// Connection
export {
  ConnectionSupervisor,
  parseSessionPath,
  type ConnectionSupervisorConfig,
} from './connection/connection-supervisor.js';
export { HeartbeatHandler, type HeartbeatConfig } from './connection/heartbeat.js';
export { WsConnection } from './connection/ws-connection.js';

// Protocol
export { FrameCodec, type DecodeResult } from './protocol/frame-codec.js';
export { ProtocolEngine } from './protocol/protocol-engine.js';

// Session
export { SessionState, type SessionStateInit } from './session/session-state.js';
export { SessionRegistry, toContextTurn, type SessionRegistryOptions } from './session/session-registry.js';
export { GenerationLock } from './session/generation-lock.js';
