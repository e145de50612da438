/**
 * Request Context Middleware
 *
 * Ensures every request has proper context:
 * - traceId: Reuses x-trace-id from client (sanitized) or generates UUID
 * - Attaches req.ctx = { traceId }
 * - Attaches req.log (child logger with traceId)
 * - Returns x-trace-id in response header
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../lib/logger/structured-logger.js';

export interface RequestContext {
  traceId: string;
}

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      ctx: RequestContext;
      log: typeof logger;
    }
  }
}

export function resolveTraceId(header: string | string[] | undefined): string {
  const raw = typeof header === 'string' ? header : undefined;

  // Safe chars only, bounded length
  if (raw && raw.length <= 128 && /^[a-zA-Z0-9_-]+$/.test(raw)) {
    return raw;
  }

  return uuidv4();
}

export function requestContextMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const traceId = resolveTraceId(req.headers['x-trace-id']);
  const ctx: RequestContext = { traceId };

  req.traceId = traceId;
  req.ctx = ctx;
  req.log = logger.child(ctx);

  res.setHeader('x-trace-id', traceId);

  next();
}
