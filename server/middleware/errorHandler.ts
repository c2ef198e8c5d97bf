import type { Request, Response, NextFunction } from 'express';
import { createLogger } from '../../utils/logger';
import {
  CancelledError,
  InputError,
  ResolutionError,
  StateError,
  TransportError,
  TunedeckError,
  toTunedeckError,
  type ResolutionErrorKind,
} from '../../utils/errors';

const log = createLogger('ERROR_HANDLER');

const RESOLUTION_STATUS: Record<ResolutionErrorKind, number> = {
  NotFound: 404,
  AuthRequired: 403,
  RegionBlocked: 403,
  RateLimited: 429,
  Timeout: 504,
};

/**
 * HTTP status for an error from the session core
 */
export function statusForError(err: TunedeckError): number {
  if (err instanceof InputError) return 400;
  if (err instanceof StateError) return 409;
  if (err instanceof CancelledError) return 409;
  if (err instanceof ResolutionError) return RESOLUTION_STATUS[err.kind];
  if (err instanceof TransportError) return 502;
  return 500;
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Body-parser errors carry their own status (400 for malformed JSON)
 */
function isClientHttpError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function apiErrorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = res.locals['requestId'] || '-';

  if (isClientHttpError(err) && !(err instanceof TunedeckError)) {
    log.warn(`API Error: ${err.message}`, { status: err.status, requestId });
    res.status(err.status).json({ error: err.message, code: 'INPUT_ERROR' });
    return;
  }

  const error = toTunedeckError(err);
  const status = statusForError(error);
  if (status >= 500) {
    log.error(`API Error: ${error.message}`, { status, requestId });
  } else {
    log.warn(`API Error: ${error.message}`, { status, requestId });
  }
  res.status(status).json(error.toJSON());
}
