import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { ApplicationError } from '../../../application/errors.js';
import type { Logger } from '../../logging/logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

/**
 * body-parser marks unparseable JSON with `type: 'entity.parse.failed'`.
 */
function isJsonParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      res.status(400).json(response);
      return;
    }

    if (err instanceof ApplicationError) {
      if (err.status === 401) {
        res.setHeader('WWW-Authenticate', 'Bearer');
      }
      const response: ErrorResponse = {
        code: err.code,
        message: err.message,
      };
      res.status(err.status).json(response);
      return;
    }

    if (isJsonParseError(err)) {
      const response: ErrorResponse = {
        code: 'INVALID_JSON',
        message: 'Request body is not valid JSON',
      };
      res.status(400).json(response);
      return;
    }

    logger.error('Unhandled error', {
      error: err,
      request_method: req.method,
      request_path: req.path,
    });

    // Generic error fallback
    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
