import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Assigns or propagates `X-Request-Id` on every request.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const id = typeof header === 'string' && header.trim().length > 0 ? header.trim() : uuidv4();
  req.requestId = id;
  res.setHeader('X-Request-Id', id);
  next();
}
