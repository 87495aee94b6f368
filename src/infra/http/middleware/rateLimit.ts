import type { RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { RateLimitedError } from '../../../application/errors.js';

export interface RateLimiters {
  api: RequestHandler;
  login: RequestHandler;
}

const passThrough: RequestHandler = (_req, _res, next) => {
  next();
};

/**
 * In-memory limiters (reset on restart). Disabled limiters let everything through.
 */
export function createRateLimiters(enabled: boolean): RateLimiters {
  if (!enabled) {
    return { api: passThrough, login: passThrough };
  }

  return {
    // 60 requests per minute per client
    api: rateLimit({
      windowMs: 60 * 1000,
      limit: 60,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, _res, next) => {
        next(new RateLimitedError());
      },
    }),
    // 10 login attempts per minute per IP
    login: rateLimit({
      windowMs: 60 * 1000,
      limit: 10,
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: (req) => req.ip || req.socket.remoteAddress || 'unknown',
      handler: (_req, _res, next) => {
        next(new RateLimitedError('Too many login attempts, please try again later.'));
      },
    }),
  };
}
