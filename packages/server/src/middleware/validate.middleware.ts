import type { Request, Response, NextFunction } from 'express';
import type { ZodSchema } from 'zod';

interface ValidateSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Validates req.body and/or req.params against Zod schemas.
 * On success the parsed values (trimmed, defaults applied) replace the raw ones.
 * On failure the ZodError goes to next() and errorHandler renders a 400.
 *
 * Usage:
 *   validate(learningPathRequestSchema)         body only
 *   validate({ params: jobParamsSchema })       route params
 */
export const validate = (schema: ZodSchema | ValidateSchemas) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      if ('parse' in schema) {
        req.body = schema.parse(req.body);
      } else {
        if (schema.body) req.body = schema.body.parse(req.body);
        if (schema.params) req.params = schema.params.parse(req.params);
      }
      next();
    } catch (err) {
      next(err);
    }
  };
};
