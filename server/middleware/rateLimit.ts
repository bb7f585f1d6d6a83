/**
 * Rate limiting middleware for API endpoints
 */

import rateLimit from 'express-rate-limit';

/**
 * Conversion submissions: 60 requests per minute per IP
 */
export const convertRateLimit = rateLimit({
  windowMs: 60_000,
  limit: 60,
  standardHeaders: true,
  legacyHeaders: false,
  message: { ok: false, error: { code: 'RATE_LIMITED', message: 'Too many conversion requests. Please slow down.' } },
});

/**
 * Runtime settings changes: 10 requests per minute per IP
 */
export const settingsRateLimit = rateLimit({
  windowMs: 60_000,
  limit: 10,
  standardHeaders: true,
  legacyHeaders: false,
  message: { ok: false, error: { code: 'RATE_LIMITED', message: 'Too many settings changes. Please slow down.' } },
});

/**
 * Global rate limiter: 600 requests per minute per IP (fallback for all routes)
 */
export const globalRateLimit = rateLimit({
  windowMs: 60_000,
  limit: 600,
  standardHeaders: true,
  legacyHeaders: false,
  message: { ok: false, error: { code: 'RATE_LIMITED', message: 'Too many requests. Please slow down.' } },
});
