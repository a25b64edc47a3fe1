/**
 * Gateway Error Codes and Classes
 *
 * Codes follow the JSON-RPC 2.0 ranges:
 * - -32700: Parse error
 * - -32600: Invalid request
 * - -32603: Internal error
 * - -32000 to -32099: Server errors (reserved for implementation)
 */

import type { ErrorFrameData } from './types.js';
import type { GenerationFailure, GenerationFailureKind } from '../infra/generation/image-backend.js';

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  // Frame errors
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  UNKNOWN_INTENT: -32601,
  INVALID_FIELD: -32602,
  INTERNAL_ERROR: -32603,

  // Session errors
  SESSION_NOT_FOUND: -32010,
  SESSION_NOT_ACTIVE: -32011,
  IMAGE_NOT_FOUND: -32012,
  NO_PRIOR_IMAGE: -32013,

  // Upstream generation errors
  RATE_LIMITED: -32030,
  INVALID_INPUT: -32031,
  UPSTREAM_UNAVAILABLE: -32032,
  GENERATION_TIMEOUT: -32033,
  UPSTREAM_UNKNOWN: -32034,

  // Storage errors
  PERSISTENCE_FAILURE: -32050,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorCategory = 'validation' | 'upstream' | 'persistence' | 'internal';

// ============================================================================
// Error Messages
// ============================================================================

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.PARSE_ERROR]: 'Parse error: Invalid JSON',
  [ErrorCodes.INVALID_REQUEST]: 'Invalid request: Missing required fields',
  [ErrorCodes.UNKNOWN_INTENT]: 'Unknown message type',
  [ErrorCodes.INVALID_FIELD]: 'Invalid field',
  [ErrorCodes.INTERNAL_ERROR]: 'Internal error',

  [ErrorCodes.SESSION_NOT_FOUND]: 'Session not found',
  [ErrorCodes.SESSION_NOT_ACTIVE]: 'Session is not active',
  [ErrorCodes.IMAGE_NOT_FOUND]: 'Image not found in this session',
  [ErrorCodes.NO_PRIOR_IMAGE]: 'No image to refine yet. Generate an image first.',

  [ErrorCodes.RATE_LIMITED]: 'Image service rate limit reached, try again shortly',
  [ErrorCodes.INVALID_INPUT]: 'Image service rejected the request',
  [ErrorCodes.UPSTREAM_UNAVAILABLE]: 'Image service is unavailable',
  [ErrorCodes.GENERATION_TIMEOUT]: 'Image generation timed out',
  [ErrorCodes.UPSTREAM_UNKNOWN]: 'Image generation failed',

  [ErrorCodes.PERSISTENCE_FAILURE]: 'Failed to save conversation',
};

const ErrorReasons: Record<ErrorCode, string> = {
  [ErrorCodes.PARSE_ERROR]: 'ParseError',
  [ErrorCodes.INVALID_REQUEST]: 'InvalidRequest',
  [ErrorCodes.UNKNOWN_INTENT]: 'UnknownIntent',
  [ErrorCodes.INVALID_FIELD]: 'InvalidField',
  [ErrorCodes.INTERNAL_ERROR]: 'Internal',

  [ErrorCodes.SESSION_NOT_FOUND]: 'SessionNotFound',
  [ErrorCodes.SESSION_NOT_ACTIVE]: 'SessionNotActive',
  [ErrorCodes.IMAGE_NOT_FOUND]: 'ImageNotFound',
  [ErrorCodes.NO_PRIOR_IMAGE]: 'NoPriorImage',

  [ErrorCodes.RATE_LIMITED]: 'RateLimited',
  [ErrorCodes.INVALID_INPUT]: 'InvalidInput',
  [ErrorCodes.UPSTREAM_UNAVAILABLE]: 'UpstreamUnavailable',
  [ErrorCodes.GENERATION_TIMEOUT]: 'Timeout',
  [ErrorCodes.UPSTREAM_UNKNOWN]: 'Unknown',

  [ErrorCodes.PERSISTENCE_FAILURE]: 'PersistenceFailure',
};

const FailureCodes: Record<GenerationFailureKind, ErrorCode> = {
  RateLimited: ErrorCodes.RATE_LIMITED,
  InvalidInput: ErrorCodes.INVALID_INPUT,
  UpstreamUnavailable: ErrorCodes.UPSTREAM_UNAVAILABLE,
  Timeout: ErrorCodes.GENERATION_TIMEOUT,
  Unknown: ErrorCodes.UPSTREAM_UNKNOWN,
};

function categorize(code: ErrorCode): ErrorCategory {
  if (code === ErrorCodes.INTERNAL_ERROR) return 'internal';
  if (code === ErrorCodes.PERSISTENCE_FAILURE) return 'persistence';
  if (code <= ErrorCodes.RATE_LIMITED && code >= ErrorCodes.UPSTREAM_UNKNOWN) return 'upstream';
  return 'validation';
}

// ============================================================================
// GatewayError Class
// ============================================================================

export class GatewayError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly reason: string;
  readonly data?: unknown;

  constructor(code: ErrorCode, message?: string, data?: unknown) {
    super(message || ErrorMessages[code]);
    this.name = 'GatewayError';
    this.code = code;
    this.category = categorize(code);
    this.reason = ErrorReasons[code];
    this.data = data;
  }

  toFrameData(): ErrorFrameData {
    return {
      code: this.code,
      reason: this.reason,
      category: this.category,
      ...(this.data !== undefined && { details: this.data }),
    };
  }

  static fromCode(code: ErrorCode, data?: unknown): GatewayError {
    return new GatewayError(code, ErrorMessages[code], data);
  }

  static parseError(details?: string): GatewayError {
    return new GatewayError(
      ErrorCodes.PARSE_ERROR,
      details ? `Parse error: ${details}` : undefined
    );
  }

  static invalidRequest(details?: string): GatewayError {
    return new GatewayError(
      ErrorCodes.INVALID_REQUEST,
      details ? `Invalid request: ${details}` : undefined
    );
  }

  static unknownIntent(type: string): GatewayError {
    return new GatewayError(ErrorCodes.UNKNOWN_INTENT, `Unknown message type: ${type}`);
  }

  static invalidField(field: string, details: string): GatewayError {
    return new GatewayError(ErrorCodes.INVALID_FIELD, `Invalid field "${field}": ${details}`, { field });
  }

  static internalError(details?: string): GatewayError {
    return new GatewayError(
      ErrorCodes.INTERNAL_ERROR,
      details ? `Internal error: ${details}` : undefined
    );
  }

  static sessionNotFound(sessionId: string): GatewayError {
    return new GatewayError(ErrorCodes.SESSION_NOT_FOUND, `Session not found: ${sessionId}`);
  }

  static sessionNotActive(sessionId: string, status: string): GatewayError {
    return new GatewayError(
      ErrorCodes.SESSION_NOT_ACTIVE,
      `Session ${sessionId} is ${status} and no longer accepts messages`
    );
  }

  static imageNotFound(imageId: string): GatewayError {
    return new GatewayError(ErrorCodes.IMAGE_NOT_FOUND, `Image not found in this session: ${imageId}`);
  }

  static noPriorImage(): GatewayError {
    return new GatewayError(ErrorCodes.NO_PRIOR_IMAGE);
  }

  static fromGenerationFailure(failure: GenerationFailure): GatewayError {
    return new GatewayError(FailureCodes[failure.kind], failure.message);
  }

  static persistenceFailure(cause: unknown): GatewayError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new GatewayError(ErrorCodes.PERSISTENCE_FAILURE, `Failed to save conversation: ${detail}`);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function isValidationError(error: unknown): error is GatewayError {
  return error instanceof GatewayError && error.category === 'validation';
}
