import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import { AppError } from './errorHandler';

/**
 * Validation target - where to find the data to validate.
 * Express 5 exposes `req.query` as a getter, so only body and params are supported.
 */
export type ValidationTarget = 'body' | 'params';

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}" ` : '';
      return `${path}${issue.message}`;
    })
    .join(', ');
}

/**
 * Creates a middleware that validates request data against a Zod schema.
 * A validated body replaces `req.body` so handlers see trimmed, defaulted values.
 */
export const validateRequest = (schema: z.ZodTypeAny, target: ValidationTarget = 'body') => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[target]);

    if (!result.success) {
      throw new AppError(formatZodIssues(result.error), 400, 'VALIDATION_ERROR');
    }

    if (target === 'body') {
      req.body = result.data;
    }
    next();
  };
};
