/**
 * Request Body Validation Middleware
 * Layer: Interfaces (HTTP)
 *
 *   router.post('/sync', validateBody(syncRequestSchema), controller.trigger);
 *
 * On success `req.body` is replaced with the parsed data, so defaults and
 * coercions are applied before the controller sees it. On failure a
 * ValidationError (400) goes to the error handler and the controller is
 * never reached.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export function validateBody<T extends z.ZodType>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});

    if (!result.success) {
      const messages = result.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ValidationError(messages);
    }

    req.body = result.data;
    next();
  };
}
