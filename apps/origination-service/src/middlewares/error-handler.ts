import { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError, fail } from '@lendwise/shared-kernel';
import { createLogger } from '@lendwise/observability';
import { ZodError } from 'zod';

const log = createLogger('origination-error-handler');

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    const ve = new ValidationError(err.flatten().fieldErrors);
    res.status(ve.statusCode).json(fail(ve.code, ve.message, ve.details));
    return;
  }

  if (isMalformedJson(err)) {
    res.status(400).json(fail('INVALID_JSON', 'Request body is not valid JSON'));
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      log.warn({ requestId: req.requestId, code: err.code, error: err.message }, 'Upstream failure');
    }
    res.status(err.statusCode).json(fail(err.code, err.message, err.details));
    return;
  }

  log.error({ err, requestId: req.requestId }, 'Unhandled error');
  res.status(500).json(fail('INTERNAL_ERROR', 'Internal server error'));
}
