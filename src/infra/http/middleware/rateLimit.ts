import rateLimit from 'express-rate-limit';

export interface RateLimitOptions {
  windowMs: number;
  /** General API limit per client within the window. */
  max: number;
  /** Login attempts per IP within the window. */
  loginMax: number;
}

/**
 * General API rate limiter.
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter(options: RateLimitOptions) {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter rate limiter for the login endpoint, keyed by IP.
 */
export function createLoginRateLimiter(options: RateLimitOptions) {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.loginMax,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    // Use IP address for login (no user ID available yet)
    keyGenerator: (req) => {
      return req.ip || req.socket.remoteAddress || 'unknown';
    },
  });
}
