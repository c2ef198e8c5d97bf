import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../../utils/logger';

const log = createLogger('HTTP');

export default function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const { method, originalUrl, ip } = req;
  const requestId = req.get('x-request-id') || uuidv4();
  res.locals['requestId'] = requestId;
  res.setHeader('X-Request-Id', requestId);

  log.debug(`→ ${method} ${originalUrl} from ${ip} [${requestId}]`);

  res.on('finish', () => {
    const duration = Date.now() - start;
    const status = res.statusCode;
    const message = `← ${method} ${originalUrl} ${status} ${duration}ms [${requestId}]`;

    if (status >= 500) {
      log.error(message, { ip, userAgent: req.get('user-agent') || '-' });
    } else if (status >= 400) {
      log.warn(message);
    } else {
      log.http(message);
    }
  });

  next();
}
