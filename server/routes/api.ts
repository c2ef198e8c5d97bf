import express from 'express';
import { createPlaybackRouter } from './api/playback';
import { createQueueRouter } from './api/queue';
import { createStatusRouter } from './api/status';
import type { ServerContext } from './api/shared';

export function createApiRouter(context: ServerContext): express.Router {
  const router = express.Router();

  router.use(createStatusRouter(context));
  router.use(createPlaybackRouter(context));
  router.use(createQueueRouter(context));

  return router;
}
