/**
 * Error taxonomy shared by the session core and the dashboard API.
 *
 * InputError and StateError are rejected at the boundary before anything is
 * mutated. ResolutionError carries the extraction failure kind; only
 * RateLimited and Timeout are retried. TransportError covers voice join/leave.
 */
import type { Logger } from './logger';

export type ErrorCode =
  | 'INPUT_ERROR'
  | 'STATE_ERROR'
  | 'RESOLUTION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export class TunedeckError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TunedeckError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { error: string; code: ErrorCode; details?: Record<string, unknown> } {
    return {
      error: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

export class InputError extends TunedeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', details);
    this.name = 'InputError';
  }
}

export class StateError extends TunedeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STATE_ERROR', details);
    this.name = 'StateError';
  }
}

export type ResolutionErrorKind =
  | 'NotFound'
  | 'AuthRequired'
  | 'RegionBlocked'
  | 'RateLimited'
  | 'Timeout';

const RETRYABLE_KINDS: ReadonlySet<ResolutionErrorKind> = new Set(['RateLimited', 'Timeout']);

export class ResolutionError extends TunedeckError {
  constructor(
    public readonly kind: ResolutionErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'RESOLUTION_ERROR', { kind }, options);
    this.name = 'ResolutionError';
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export class TransportError extends TunedeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_ERROR', undefined, options);
    this.name = 'TransportError';
  }
}

export class CancelledError extends TunedeckError {
  constructor(message = 'Superseded by a newer command') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class InternalError extends TunedeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INTERNAL_ERROR', undefined, options);
    this.name = 'InternalError';
  }
}

/**
 * Format an error into a message plus optional stack.
 * Includes error.cause when present (e.g. "fetch failed: connect ECONNREFUSED").
 */
export function formatError(err: unknown): { message: string; stack?: string } {
  if (err instanceof Error) {
    const cause = err.cause;
    let message = err.message;
    if (cause instanceof Error && cause.message && cause.message !== err.message) {
      message = `${err.message}: ${cause.message}`;
    } else if (typeof cause === 'string') {
      message = `${err.message}: ${cause}`;
    }
    return { message, stack: err.stack };
  }
  return { message: String(err) };
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Log an error with its stack at debug level
 */
export function logErrorWithStack(logger: Logger, message: string, err: unknown): void {
  const info = formatError(err);
  logger.error(`${message}: ${info.message}`);
  if (info.stack) {
    logger.debug(info.stack);
  }
}

/**
 * Wrap anything that is not already part of the taxonomy
 */
export function toTunedeckError(err: unknown): TunedeckError {
  if (err instanceof TunedeckError) return err;
  return new InternalError(getErrorMessage(err), { cause: err });
}

/**
 * Process-level handlers for unhandled rejections and uncaught exceptions
 */
export function setupProcessErrorHandlers(logger: Logger): void {
  process.on('unhandledRejection', (reason) => {
    logErrorWithStack(logger, 'Unhandled promise rejection', reason);
  });

  process.on('uncaughtException', (error) => {
    logErrorWithStack(logger, 'Uncaught exception', error);
    process.exitCode = 1;
  });
}
