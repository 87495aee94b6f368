import { randomUUID } from 'crypto';
import type { RequestHandler } from 'express';
import type { Logger } from '../../logging/logger.js';

export const CORRELATION_HEADER = 'X-Correlation-ID';

const DEFAULT_EXCLUDED_PATHS = ['/healthz', '/favicon.ico'];

export interface RequestLoggerOptions {
  slowRequestThresholdMs: number;
  excludePaths?: string[];
}

/**
 * Tag each request with a correlation id (taken from the incoming header when present),
 * echo it on the response and log the outcome once the response is finished.
 */
export function requestLogger(logger: Logger, options: RequestLoggerOptions): RequestHandler {
  const excluded = options.excludePaths ?? DEFAULT_EXCLUDED_PATHS;

  return (req, res, next) => {
    const correlationId = req.get(CORRELATION_HEADER) || randomUUID();
    req.headers[CORRELATION_HEADER.toLowerCase()] = correlationId;
    res.setHeader(CORRELATION_HEADER, correlationId);

    const path = req.path;
    if (excluded.includes(path)) {
      next();
      return;
    }

    const startedAt = performance.now();
    const requestLog = logger.child({ correlation_id: correlationId });

    res.on('finish', () => {
      const durationMs = Math.round((performance.now() - startedAt) * 100) / 100;
      const fields = {
        event_type: 'response',
        request_method: req.method,
        request_path: path,
        response_status_code: res.statusCode,
        process_time_ms: durationMs,
        client_ip: req.ip,
        user_agent: req.get('user-agent') ?? 'unknown',
      };
      const message = `Request completed: ${req.method} ${path} - ${res.statusCode}`;

      if (res.statusCode >= 500) {
        requestLog.error(message, fields);
      } else if (res.statusCode >= 400) {
        requestLog.warn(message, fields);
      } else {
        requestLog.info(message, fields);
      }

      if (durationMs > options.slowRequestThresholdMs) {
        requestLog.warn(`Slow request detected: ${req.method} ${path}`, {
          event_type: 'performance',
          event_category: 'slow_request',
          process_time_ms: durationMs,
        });
      }
    });

    next();
  };
}
