/**
 * Rate Limiting Middleware
 * 
 * Protects API endpoints from abuse and overload.
 * Uses express-rate-limit with different limits for different endpoints:
 * - API endpoints: Standard limit
 * - Selection endpoints: Lower limit (each selection may fire several geocoding requests)
 */

import rateLimit, { RateLimitRequestHandler, ipKeyGenerator } from 'express-rate-limit';
import { Request, Response } from 'express';
import logger from '../utils/logger';
import { config } from '../config';
import { TIME } from '../utils/constants';

/**
 * Key generator for rate limiting by client IP.
 * Uses ipKeyGenerator helper for proper IPv6 support
 */
function generateKey(req: Request): string {
  const ip = req.ip || req.socket.remoteAddress || 'unknown';
  return ipKeyGenerator(ip);
}

/**
 * Creates a standardized rate limit handler
 * @param errorMessage - Message returned to the client
 * @param retryAfterSeconds - Retry after time in seconds
 * @param logMessage - Log message prefix
 */
export function createRateLimitHandler(
  errorMessage: string,
  retryAfterSeconds: number,
  logMessage: string
): (req: Pick<Request, 'ip' | 'path' | 'method'>, res: Pick<Response, 'status' | 'json'>) => void {
  return (req, res): void => {
    logger.warn(`⚠️ ${logMessage}`, {
      ip: req.ip,
      path: req.path,
      method: req.method
    });

    res.status(429).json({
      status: 'error',
      error: { message: errorMessage, code: 'RATE_LIMITED' },
      retryAfter: retryAfterSeconds
    });
  };
}

/**
 * Standard rate limiter for API endpoints
 */
export const apiLimiter: RateLimitRequestHandler = rateLimit({
  windowMs: config.rateLimit.api.windowMs,
  limit: config.rateLimit.api.max,
  standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
  legacyHeaders: false, // Disable the `X-RateLimit-*` headers
  keyGenerator: generateKey,
  handler: createRateLimitHandler(
    'Too many requests. Try again in a few minutes.',
    config.rateLimit.api.windowMs / TIME.SECOND,
    'Rate limit exceeded'
  )
});

/**
 * Stricter limiter for routes that run a target selection
 */
export const selectionLimiter: RateLimitRequestHandler = rateLimit({
  windowMs: config.rateLimit.selection.windowMs,
  limit: config.rateLimit.selection.max,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: generateKey,
  handler: createRateLimitHandler(
    'Too many new targets requested. Try again in a minute.',
    config.rateLimit.selection.windowMs / TIME.SECOND,
    'Selection rate limit exceeded'
  )
});
