import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodTypeAny } from 'zod';
import { logger } from './logging.js';
import { SchemaValidationError } from '../errors/index.js';

/**
 * Validation Middleware
 *
 * Validates a request part against a Zod schema and replaces it with the
 * parsed value (defaults applied). Failures go to the error handler as a
 * SchemaValidationError, so the response uses the common error payload.
 */

export type ValidationTarget = 'body' | 'query' | 'params';

/**
 * @example
 * ```typescript
 * router.post('/tools/analyze_screenshot',
 *   validateRequest(analyzeScreenshotSchema, 'body'),
 *   controller.handle('analyze_screenshot')
 * );
 * ```
 */
export function validateRequest(schema: ZodTypeAny, target: ValidationTarget = 'body') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      const validated: unknown = schema.parse(req[target] ?? {});
      if (target === 'body') {
        req.body = validated;
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const formattedErrors = error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        }));

        logger.warn('Request validation failed', {
          target,
          errors: formattedErrors,
          path: req.path,
          method: req.method,
        });

        next(new SchemaValidationError(
          formattedErrors,
          `Validation failed: ${formattedErrors.map(e => `${e.path || '(root)'} ${e.message}`).join('; ')}`,
          { operation: `${req.method} ${req.path}` }
        ));
        return;
      }

      next(error);
    }
  };
}
