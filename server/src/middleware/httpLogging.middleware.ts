/**
 * HTTP Logging Middleware
 * Request/response summary logging
 *
 * - One log line per request (method, path)
 * - One log line per response (status, duration)
 * - Log level follows the status code
 * - All lines carry traceId via req.log
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.info({
    method: req.method,
    path: req.path,
  }, 'HTTP request');

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = res.statusCode >= 500 ? 'error'
      : res.statusCode >= 400 ? 'warn'
        : 'info';

    req.log[level]({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration,
    }, 'HTTP response');
  });

  next();
}
