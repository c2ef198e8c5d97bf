import express, { Express, Request, Response } from 'express';
import type { Server } from 'http';
import { createLogger } from '../utils/logger';
import { apiErrorHandler } from './middleware/errorHandler';
import requestLogger from './middleware/requestLogger';
import { createApiRouter } from './routes/api';
import { addHealthRoutes } from './routes/health';
import type { ServerContext } from './routes/api/shared';

const log = createLogger('SERVER');

export type { ServerContext };

export function createApp(context: ServerContext): Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));
  app.use((req, res, next) => {
    // Health checks stay out of the request log
    if (req.path.startsWith('/health')) {
      next();
      return;
    }
    requestLogger(req, res, next);
  });

  addHealthRoutes(app, {
    getReady: context.isReady,
    getSessionCount: () => context.registry.size,
  });
  app.use('/api', createApiRouter(context));

  app.use('/api', (req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.originalUrl}`, code: 'INPUT_ERROR' });
  });
  app.use(apiErrorHandler);

  return app;
}

export function startServer(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      log.info(`API listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
