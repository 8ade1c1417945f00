/**
 * HTTP request logging middleware
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../services/logging/logger.js';
import { loggers } from '../services/logging/log-helpers.js';

export interface RequestLoggerOptions {
  /** Requests slower than this are also logged as slow_request */
  slowThresholdMs?: number;
}

/**
 * Tags every request with an X-Request-Id and logs its completion.
 * Status >= 500 logs at error, >= 400 at warn.
 */
export function createRequestLogger(options: RequestLoggerOptions = {}): RequestHandler {
  const slowThresholdMs = options.slowThresholdMs ?? 2000;

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const requestId = generateRequestId();

    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    logger.debug({ category: 'http', event: 'request_received', requestId, method: req.method, path: req.path },
      `${req.method} ${req.path}`);

    res.on('finish', () => {
      const duration = Date.now() - startTime;

      loggers.httpRequest({
        requestId,
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        duration_ms: duration,
      });

      if (duration > slowThresholdMs) {
        logger.warn({
          category: 'performance',
          event: 'slow_request',
          requestId,
          path: req.originalUrl,
          duration_ms: duration,
          threshold_ms: slowThresholdMs,
        }, `Slow request: ${req.method} ${req.originalUrl} (${duration}ms)`);
      }
    });

    next();
  };
}

function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Logs errors that reach the Express error chain, then passes them on.
 * Body parse failures are client errors and log at warn.
 */
export function errorLogger(err: Error, req: Request, res: Response, next: NextFunction): void {
  const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : 'unknown';

  if (isBodyParseError(err)) {
    logger.warn({ category: 'http', event: 'invalid_body', requestId, path: req.path }, 'Rejected malformed JSON body');
  } else {
    loggers.error(`Unhandled error: ${err.message}`, err, { requestId, method: req.method, path: req.path });
  }

  next(err);
}

/**
 * express.json() marks malformed bodies with type 'entity.parse.failed'
 */
export function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}
