/**
 * Debug event types for the instrumentation system.
 */

/**
 * Base debug event structure.
 * All debug events emitted by the gateway follow this interface.
 */
export interface DebugEvent {
  /** Unique event identifier (UUID) */
  id: string;
  /** Event timestamp in milliseconds */
  timestamp: number;
  /** Event type in format "domain.action" (e.g., "connection.bound", "generation.failed") */
  type: string;
  /** Source module identifier (e.g., "supervisor", "protocol-engine") */
  source: string;
  /** Event-specific data payload */
  data: Record<string, unknown>;
  /** Associated session ID (if applicable) */
  sessionId?: string;
}

/**
 * Context attached to every event emitted while it is set.
 */
export interface DebugContext {
  sessionId?: string;
}
