/**
 * Request Context Middleware
 * TraceId propagation for deterministic debugging
 *
 * Ensures every request has a unique traceId:
 * - Reuses x-trace-id from client if provided
 * - Generates UUID if not provided
 * - Attaches req.traceId and req.log (child logger with traceId)
 * - Returns x-trace-id in response header
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

export function requestContextMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const header = req.headers['x-trace-id'];
  const traceId = (typeof header === 'string' && header.trim()) || uuidv4();

  req.traceId = traceId;
  req.log = logger.child({ traceId });
  res.setHeader('x-trace-id', traceId);

  next();
}
