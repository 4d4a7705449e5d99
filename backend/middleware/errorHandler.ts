/**
 * Error handling middleware
 * Turns AppErrors into `{ success: false, error, code }`; anything else is a
 * logged, generic 500
 */
import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import config from '../config/env';
import {
  AppError,
  NotFoundError,
  RateLimitError,
  createErrorResponse,
  getErrorMessage,
  isAppError,
  isOperationalError
} from '../utils/errors';
import logger from '../utils/logger';

interface HttpParserError {
  status: number;
  type: string;
}

// body-parser failures carry `status` and `type`
function isParserError(err: unknown): err is HttpParserError {
  return typeof err === 'object' && err !== null &&
    'status' in err && typeof err.status === 'number' &&
    'type' in err && typeof err.type === 'string';
}

function fromParserError(err: HttpParserError): AppError {
  switch (err.type) {
    case 'entity.too.large':
      return new AppError('Request body too large', 'PAYLOAD_TOO_LARGE', 413);
    case 'entity.parse.failed':
      return new AppError('Malformed JSON body', 'INVALID_JSON', 400);
    default:
      return new AppError('Invalid request body', 'INVALID_BODY', err.status >= 400 && err.status < 500 ? err.status : 400);
  }
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const requestId = req.requestId || 'unknown';
  const error = isAppError(err) ? err : isParserError(err) ? fromParserError(err) : err;

  if (isOperationalError(error)) {
    if (error.statusCode >= 500) {
      logger.warn('Request failed', { requestId, code: error.code, path: req.path });
    }
    if (error instanceof RateLimitError && error.retryAfter !== undefined) {
      res.setHeader('Retry-After', String(error.retryAfter));
    }
    res.status(error.statusCode).json(createErrorResponse(error, requestId));
    return;
  }

  logger.error('Unhandled error', {
    requestId,
    error: getErrorMessage(err),
    stack: config.isDevelopment && err instanceof Error ? err.stack : undefined,
    path: req.path,
    method: req.method
  });

  const status = isAppError(error) ? error.statusCode : 500;
  res.status(status).json(createErrorResponse(error, requestId));
};

/**
 * 404 for unmatched API routes
 */
export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route'));
}

export default errorHandler;
