import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';
import type { AppConfig } from '../../config.js';

/**
 * Per-IP rate limiter for the replay API.
 * Uses in-memory store (resets on server restart).
 */
export function createRateLimiter(config: AppConfig): RequestHandler {
  return rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX,
    message: {
      code: 'RATE_LIMITED',
      message: 'Too many requests, please try again later.',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
