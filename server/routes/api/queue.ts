import express, { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/errorHandler';
import { indexParam, requireSession, tenantParam, type ServerContext } from './shared';

export function createQueueRouter({ registry }: ServerContext): express.Router {
  const router = express.Router();

  // GET /api/sessions/:tenantId/queue - Current track and upcoming queue
  router.get('/sessions/:tenantId/queue', (req: Request, res: Response): void => {
    const { currentSong, queue, queueLength } = registry.describe(tenantParam(req));
    res.json({ currentSong, queue, queueLength });
  });

  // POST /api/sessions/:tenantId/queue/clear
  router.post(
    '/sessions/:tenantId/queue/clear',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const session = registry.get(tenantParam(req));
      res.json(session ? await session.clearQueue() : { cleared: 0 });
    })
  );

  // POST /api/sessions/:tenantId/queue/prune - Drop duplicate entries
  router.post(
    '/sessions/:tenantId/queue/prune',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const session = registry.get(tenantParam(req));
      res.json({ removed: session ? await session.pruneQueue() : 0 });
    })
  );

  // POST /api/sessions/:tenantId/queue/:index/play - Jump to a queued track
  router.post(
    '/sessions/:tenantId/queue/:index/play',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const tenantId = tenantParam(req);
      const index = indexParam(req);
      const track = await requireSession(registry, tenantId).playNow(index);
      res.json({ track });
    })
  );

  // DELETE /api/sessions/:tenantId/queue/:index
  router.delete(
    '/sessions/:tenantId/queue/:index',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const tenantId = tenantParam(req);
      const index = indexParam(req);
      const removed = await requireSession(registry, tenantId).removeFromQueue(index);
      res.json({ removed });
    })
  );

  return router;
}
