import type { Express, Request, Response } from 'express';

export interface HealthOptions {
  getReady: () => boolean;
  getSessionCount: () => number;
}

/**
 * Mount GET /health/live and GET /health/ready on the app.
 * /health/live returns 200 OK; /health/ready reports readiness as JSON.
 */
export function addHealthRoutes(app: Express, { getReady, getSessionCount }: HealthOptions): void {
  app.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  app.get('/health/ready', (_req: Request, res: Response) => {
    const ready = getReady();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      ready,
      degraded: !ready,
      sessions: getSessionCount(),
      timestamp: Date.now(),
    });
  });
}
