/**
 * Centralized Error Middleware - Production Safe
 * Prevents leaking stack traces and internal messages to clients
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

const isProd = process.env.NODE_ENV === 'production';

/**
 * Application Error - Structured error with metadata
 * Use this for all known error cases
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

/**
 * express.json() failures carry an HTTP status and a `type` such as
 * 'entity.parse.failed' or 'entity.too.large'
 */
function isBodyParserError(err: Error): err is Error & { status: number; type: string } {
  return (
    'status' in err && typeof err.status === 'number' &&
    'type' in err && typeof err.type === 'string'
  );
}

function toAppError(err: Error): AppError | null {
  if (err instanceof AppError) return err;
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    const code = err.type === 'entity.too.large' ? 'PAYLOAD_TOO_LARGE' : 'INVALID_JSON';
    return new AppError(err.message, err.status, code, undefined, false);
  }
  return null;
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app (after all routes)
 *
 * Production: no stack traces, generic messages unless exposeMessage is set.
 * Development: stack traces and details included.
 */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const appError = toAppError(err);
  const header = res.getHeader('x-trace-id');
  const traceId = req.traceId || (typeof header === 'string' ? header : 'unknown');
  const statusCode = appError ? appError.statusCode : 500;
  const code = appError ? appError.code : 'INTERNAL_ERROR';

  let clientMessage: string;
  if (appError?.exposeMessage) {
    clientMessage = appError.message;
  } else if (appError) {
    clientMessage = getGenericMessage(appError.statusCode);
  } else {
    clientMessage = isProd ? 'Internal server error' : err.message || 'Internal server error';
  }

  const logContext = {
    error: {
      name: err.name,
      message: err.message,
      stack: err.stack,
      code,
      statusCode,
    },
    traceId,
    method: req.method,
    path: req.path,
  };

  const log = req.log ?? logger;
  if (statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    error: clientMessage,
    code,
    traceId,
  };

  if (!isProd) {
    if (appError?.details) {
      response.details = appError.details;
    }
    if (err.stack && statusCode >= 500) {
      response.stack = err.stack;
    }
  }

  res.status(statusCode).json(response);
}

/**
 * Unmatched routes become a 404 AppError
 */
export function notFoundMiddleware(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(`Route ${req.method} ${req.path} not found`, 404, 'NOT_FOUND', undefined, true));
}

/**
 * Get generic error message based on status code
 */
function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 413:
      return 'Payload too large';
    case 422:
      return 'Validation failed';
    case 500:
      return 'Internal server error';
    case 503:
      return 'Service unavailable';
    case 504:
      return 'Gateway timeout';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

/**
 * Helper: Create validation error
 */
export function createValidationError(
  message: string,
  details?: unknown
): AppError {
  return new AppError(
    message,
    400,
    'VALIDATION_ERROR',
    details,
    true // Safe to expose validation messages
  );
}
