import rateLimit from 'express-rate-limit';
import { RequestHandler } from 'express';
import { TooManyRequestsError } from '../utils/errors';

/**
 * Rate Limiting Middleware
 *
 * Single Responsibility: Keep clients from rescanning storage in a tight loop
 */

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

export function createRateLimitMiddleware({ windowMs, max }: RateLimitOptions): RequestHandler {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    handler: (req, res, next) => {
      next(new TooManyRequestsError('Too many requests, please try again later'));
    },
  });
}
