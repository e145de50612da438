/**
 * HTTP Logging Middleware
 *
 * One log line per request and one per response (status, duration).
 * Level follows the status code; every line carries the traceId via req.log.
 * Bodies are never logged: they hold the user's query text.
 */

import { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.info({
    msg: 'HTTP request',
    method: req.method,
    path: req.path,
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = res.statusCode >= 500 ? 'error'
                : res.statusCode >= 400 ? 'warn'
                : 'info';

    req.log[level]({
      msg: 'HTTP response',
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration,
    });
  });

  next();
}
