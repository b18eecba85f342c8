import type { Request, Response, NextFunction } from 'express';
import { createLogger } from './logger';

const log = createLogger('http');

export function httpLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();
  res.on('finish', () => {
    const entry = {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      ms: Math.round(Number(process.hrtime.bigint() - startedAt) / 1e4) / 100,
      requestId: req.requestId,
    };
    if (res.statusCode >= 500) {
      log.error(entry, 'request failed');
      return;
    }
    log.info(entry, 'request completed');
  });
  next();
}
