import express from 'express';
import request from 'supertest';
import {
  CancelledError,
  InputError,
  InternalError,
  ResolutionError,
  StateError,
  TransportError,
  type ResolutionErrorKind,
} from '../../../utils/errors';

const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  http: jest.fn(),
};

jest.mock('../../../utils/logger', () => ({
  createLogger: () => mockLogger,
}));

import { apiErrorHandler, asyncHandler, statusForError } from '../errorHandler';

function appThrowing(error: unknown): express.Express {
  const app = express();
  app.use(express.json());
  app.post(
    '/fail',
    asyncHandler(async () => {
      throw error;
    })
  );
  app.use(apiErrorHandler);
  return app;
}

describe('statusForError', () => {
  it.each([
    [new InputError('bad'), 400],
    [new StateError('nope'), 409],
    [new CancelledError(), 409],
    [new TransportError('voice down'), 502],
    [new InternalError('oops'), 500],
  ])('maps %p to %i', (error, status) => {
    expect(statusForError(error)).toBe(status);
  });

  it.each<[ResolutionErrorKind, number]>([
    ['NotFound', 404],
    ['AuthRequired', 403],
    ['RegionBlocked', 403],
    ['RateLimited', 429],
    ['Timeout', 504],
  ])('maps ResolutionError %s to %i', (kind, status) => {
    expect(statusForError(new ResolutionError(kind, 'failed'))).toBe(status);
  });
});

describe('apiErrorHandler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('responds with the error JSON and its status', async () => {
    const response = await request(appThrowing(new StateError('Nothing is playing', { state: 'idle' }))).post(
      '/fail'
    );

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      error: 'Nothing is playing',
      code: 'STATE_ERROR',
      details: { state: 'idle' },
    });
    expect(mockLogger.warn).toHaveBeenCalledWith('API Error: Nothing is playing', {
      status: 409,
      requestId: '-',
    });
  });

  it('includes the resolution failure kind', async () => {
    const response = await request(appThrowing(new ResolutionError('NotFound', 'No results'))).post(
      '/fail'
    );

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: 'No results',
      code: 'RESOLUTION_ERROR',
      details: { kind: 'NotFound' },
    });
  });

  it('wraps unknown errors as internal errors', async () => {
    const response = await request(appThrowing(new Error('boom'))).post('/fail');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'boom', code: 'INTERNAL_ERROR' });
    expect(mockLogger.error).toHaveBeenCalledWith('API Error: boom', {
      status: 500,
      requestId: '-',
    });
  });

  it('keeps the status of body parser errors', async () => {
    const response = await request(appThrowing(new Error('unreachable')))
      .post('/fail')
      .set('Content-Type', 'application/json')
      .send('{"source":');

    expect(response.status).toBe(400);
    expect(response.body.code).toBe('INPUT_ERROR');
    expect(mockLogger.error).not.toHaveBeenCalled();
  });

  it('uses the request id when one was assigned', async () => {
    const app = express();
    app.use((_req, res, next) => {
      res.locals['requestId'] = 'req-1';
      next();
    });
    app.get(
      '/fail',
      asyncHandler(async () => {
        throw new TransportError('Voice join timed out');
      })
    );
    app.use(apiErrorHandler);

    const response = await request(app).get('/fail');

    expect(response.status).toBe(502);
    expect(mockLogger.error).toHaveBeenCalledWith('API Error: Voice join timed out', {
      status: 502,
      requestId: 'req-1',
    });
  });
});
