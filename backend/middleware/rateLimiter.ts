/**
 * Rate limiting middleware
 * Coarse express-rate-limit caps; the submission write limit with its ban
 * lives in the gatekeeper's sliding window limiter
 */
import rateLimit, { type Options, type RateLimitRequestHandler } from 'express-rate-limit';
import { ADMIN_AUTH_RATE_LIMIT, GENERAL_RATE_LIMIT } from '../config/constants';
import { extractClientIP } from '../abusePrevention';

function createLimiter(options: Partial<Options>): RateLimitRequestHandler {
  return rateLimit({
    ...options,
    keyGenerator: req => extractClientIP(req),
    standardHeaders: true,
    legacyHeaders: false
  });
}

function tooManyHandler(message: string): Options['handler'] {
  return (_req, res, _next, options) => {
    const retryAfterSeconds = Math.ceil(options.windowMs / 1000);
    res.setHeader('Retry-After', retryAfterSeconds);
    res.status(429).json({
      success: false,
      error: message,
      code: 'RATE_LIMIT_EXCEEDED',
      retryAfter: retryAfterSeconds
    });
  };
}

/**
 * General API limiter; health checks are never counted
 */
export const createGeneralLimiter = (max: number = GENERAL_RATE_LIMIT.max): RateLimitRequestHandler => createLimiter({
  windowMs: GENERAL_RATE_LIMIT.windowMs,
  limit: max,
  skip: req => `${req.baseUrl}${req.path}` === '/api/health',
  handler: tooManyHandler('Too many requests from this IP, please try again later.')
});

/**
 * Failed admin authentication attempts only
 */
export const createAdminAuthLimiter = (max: number = ADMIN_AUTH_RATE_LIMIT.max): RateLimitRequestHandler => createLimiter({
  windowMs: ADMIN_AUTH_RATE_LIMIT.windowMs,
  limit: max,
  skipSuccessfulRequests: true,
  handler: tooManyHandler('Too many authentication attempts. Please try again later.')
});

export default { createGeneralLimiter, createAdminAuthLimiter };
