import type { RequestHandler } from 'express';
import type { AnyZodObject } from 'zod';

export interface RequestSchemas {
  body?: AnyZodObject;
  query?: AnyZodObject;
  params?: AnyZodObject;
}

/**
 * Parses each configured part of the request and swaps in the parsed value,
 * so handlers see trimmed and defaulted input. A `ZodError` goes to the
 * error handler.
 */
export function validate(schemas: RequestSchemas): RequestHandler {
  return (req, _res, next) => {
    try {
      if (schemas.params) req.params = schemas.params.parse(req.params);
      if (schemas.query) req.query = schemas.query.parse(req.query);
      if (schemas.body) req.body = schemas.body.parse(req.body);
      next();
    } catch (err) {
      next(err);
    }
  };
}
