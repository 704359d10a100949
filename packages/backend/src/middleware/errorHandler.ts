import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { AppError } from '../shared/errors';
import { errorResponse } from '../shared/envelope';
import { logger } from '../shared/logger';
import '../shared/types';

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

/**
 * True when a message carries file paths, stack frames or database/network
 * details that must not reach a client in production.
 */
export function containsInternalDetails(message: string): boolean {
  const internalPatterns = [
    /\/app\/src\//i,
    /\/home\//i,
    /\/usr\//i,
    /\.(ts|js):\d+/,
    /at\s+\S+\s+\(/,
    /node_modules\//,
    /relation\s+"/i,
    /ECONNREFUSED/i,
    /ENOTFOUND/i,
    /password authentication failed/i,
    /syntax error at or near/i,
    /duplicate key value/i,
  ];
  return internalPatterns.some((pattern) => pattern.test(message));
}

// body-parser flags malformed JSON with this type
function isJsonParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Maps framework errors that are really bad input onto the AppError taxonomy. */
function toAppError(err: Error): AppError | null {
  if (err instanceof AppError) return err;
  if (err instanceof MulterError) {
    return new AppError(400, 'VALIDATION_ERROR', `Upload rejected: ${err.message}`);
  }
  if (isJsonParseError(err)) {
    return new AppError(400, 'INVALID_JSON', 'Request body is not valid JSON');
  }
  return null;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);

  if (appError) {
    const meta = {
      requestId: req.id,
      code: appError.code,
      statusCode: appError.statusCode,
      message: appError.message,
    };
    if (appError.statusCode >= 500) {
      logger.error('Request failed', { ...meta, stack: appError.stack });
    } else {
      logger.warn('Request rejected', meta);
    }

    const message = isProduction() && containsInternalDetails(appError.message)
      ? 'An error occurred'
      : appError.message;
    res.status(appError.statusCode).json(errorResponse(appError.code, message));
    return;
  }

  logger.error('Unhandled error', {
    requestId: req.id,
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred'));
}
