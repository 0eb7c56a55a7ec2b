/**
 * Custom Error Classes
 * 
 * Planning errors are thrown before any process is spawned. Engine failures
 * and cancellations are outcome data, not exceptions.
 */

import type { SessionState } from '../stateMachine.js';

/**
 * Base error class for all transcoder errors
 */
export class TranscoderError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TranscoderError';
    this.code = code;
    this.details = details;
    
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for malformed requests or configuration
 */
export class ValidationError extends TranscoderError {
  constructor(field: string, message: string, code: string = 'VALIDATION_ERROR') {
    super(
      `Validation failed for ${field}: ${message}`,
      code,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Target format outside the recognized set
 */
export class UnsupportedFormatError extends TranscoderError {
  constructor(format: string) {
    super(
      `Unsupported format: ${format}`,
      'UNSUPPORTED_FORMAT',
      { format }
    );
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Input media kind cannot produce the requested target kind
 */
export class UnsupportedConversionError extends TranscoderError {
  constructor(inputKind: string, format: string) {
    super(
      `Unsupported conversion from ${inputKind} input to ${format}`,
      'UNSUPPORTED_CONVERSION',
      { inputKind, format }
    );
    this.name = 'UnsupportedConversionError';
  }
}

/**
 * Metadata probe failed. Callers degrade to progress-less operation.
 */
export class ProbeError extends TranscoderError {
  constructor(inputPath: string, reason: string) {
    super(
      `Probe failed for ${inputPath}: ${reason}`,
      'PROBE_FAILED',
      { inputPath, reason: reason.substring(0, 1000) }
    );
    this.name = 'ProbeError';
  }
}

/**
 * State transition error for invalid session state changes
 */
export class StateTransitionError extends TranscoderError {
  constructor(
    sessionId: string,
    fromState: SessionState,
    toState: SessionState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { sessionId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

export function isTranscoderError(value: unknown): value is TranscoderError {
  return value instanceof TranscoderError;
}
