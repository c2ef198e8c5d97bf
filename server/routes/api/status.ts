import express, { Request, Response } from 'express';
import { openSessionStream } from '../../sse/sessionEvents';
import { tenantParam, type ServerContext } from './shared';

export function createStatusRouter({ registry, broadcaster, isReady }: ServerContext): express.Router {
  const router = express.Router();

  // GET /api/status - Bot readiness and session count
  router.get('/status', (_req: Request, res: Response): void => {
    res.json({ online: isReady(), sessions: registry.size });
  });

  // GET /api/guilds - Every guild the bot is in, with its playback state
  router.get('/guilds', (_req: Request, res: Response): void => {
    res.json(registry.directory());
  });

  // GET /api/sessions - Snapshots of every live session
  router.get('/sessions', (_req: Request, res: Response): void => {
    res.json(registry.list().map((session) => session.snapshot()));
  });

  // GET /api/sessions/:tenantId - Snapshot (a disconnected placeholder when there is no session)
  router.get('/sessions/:tenantId', (req: Request, res: Response): void => {
    res.json(registry.describe(tenantParam(req)));
  });

  // GET /api/sessions/:tenantId/events - SSE for song/queue updates
  router.get('/sessions/:tenantId/events', (req: Request, res: Response): void => {
    const tenantId = tenantParam(req);
    openSessionStream(res, tenantId, broadcaster, registry.describe(tenantId));
  });

  return router;
}
