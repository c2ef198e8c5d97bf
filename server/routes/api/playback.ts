import express, { Request, Response } from 'express';
import { z } from 'zod';
import { MAX_VOLUME, MIN_VOLUME } from '../../../utils/voice/constants';
import { asyncHandler } from '../../middleware/errorHandler';
import { parseBody, requireSession, tenantParam, type ServerContext } from './shared';

const joinSchema = z.object({
  channelId: z.string().trim().min(1),
});

const playSchema = z.object({
  source: z.string(),
  channelId: z.string().trim().min(1).optional(),
  requestedBy: z.string().trim().min(1).max(100).optional(),
});

const volumeSchema = z.object({
  volume: z.number().int().min(MIN_VOLUME).max(MAX_VOLUME),
});

export function createPlaybackRouter({ registry }: ServerContext): express.Router {
  const router = express.Router();

  // POST /api/sessions/:tenantId/join - Join a voice channel
  router.post(
    '/sessions/:tenantId/join',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const tenantId = tenantParam(req);
      const { channelId } = parseBody(joinSchema, req.body);
      const snapshot = await registry.getOrCreate(tenantId).join(channelId);
      res.json(snapshot);
    })
  );

  // POST /api/sessions/:tenantId/leave - Leave voice and drop the session
  router.post(
    '/sessions/:tenantId/leave',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const left = await registry.remove(tenantParam(req));
      res.json({ left });
    })
  );

  // POST /api/sessions/:tenantId/play - Play or queue a URL, playlist or search
  router.post(
    '/sessions/:tenantId/play',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const tenantId = tenantParam(req);
      const { source, channelId, requestedBy } = parseBody(playSchema, req.body);

      if (!channelId) {
        const result = await requireSession(registry, tenantId).play(source, { requestedBy });
        res.json(result);
        return;
      }

      // Join and resolve run side by side; the track is applied once voice is up
      const session = registry.getOrCreate(tenantId);
      const joining = session.state === 'disconnected' ? session.join(channelId) : null;
      const [, result] = await Promise.all([joining, session.play(source, { requestedBy })]);
      res.json(result);
    })
  );

  // POST /api/sessions/:tenantId/skip
  router.post(
    '/sessions/:tenantId/skip',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const result = await requireSession(registry, tenantParam(req)).skip();
      res.json(result);
    })
  );

  // POST /api/sessions/:tenantId/pause
  router.post(
    '/sessions/:tenantId/pause',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      res.json(await requireSession(registry, tenantParam(req)).pause());
    })
  );

  // POST /api/sessions/:tenantId/resume
  router.post(
    '/sessions/:tenantId/resume',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      res.json(await requireSession(registry, tenantParam(req)).resume());
    })
  );

  // POST /api/sessions/:tenantId/stop - Stop playback and clear the queue
  router.post(
    '/sessions/:tenantId/stop',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const session = registry.get(tenantParam(req));
      // Nothing to stop without a session
      res.json(session ? await session.stop() : { cleared: 0 });
    })
  );

  // POST /api/sessions/:tenantId/volume
  router.post(
    '/sessions/:tenantId/volume',
    asyncHandler(async (req: Request, res: Response): Promise<void> => {
      const tenantId = tenantParam(req);
      const { volume } = parseBody(volumeSchema, req.body);
      res.json(await requireSession(registry, tenantId).setVolume(volume));
    })
  );

  return router;
}
