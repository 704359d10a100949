import { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodTypeAny } from 'zod';
import { ValidationError } from '../shared/errors';

export interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
  query?: ZodTypeAny;
}

type Source = keyof ValidationSchemas;

const SOURCES: readonly Source[] = ['body', 'params', 'query'];

/**
 * Parses each configured part of the request, replacing it with the parsed
 * value. Issues from every part are reported together as one ValidationError.
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const issues: string[] = [];

    for (const source of SOURCES) {
      const schema = schemas[source];
      if (!schema) continue;

      const result = schema.safeParse(req[source]);
      if (!result.success) {
        issues.push(...formatZodIssues(result.error, source));
      } else if (source === 'body') {
        req.body = result.data;
      } else if (source === 'params') {
        req.params = result.data;
      } else {
        req.query = result.data;
      }
    }

    if (issues.length > 0) {
      next(new ValidationError(issues.join('; ')));
      return;
    }
    next();
  };
}

export function formatZodIssues(error: ZodError, source: string): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${source}.${issue.path.join('.')}` : source;
    return `${path}: ${issue.message}`;
  });
}
