// generalRateLimiter.ts

import rateLimit from 'express-rate-limit';
import { Request } from 'express';

/**
 * Limiter for the settings endpoint, which mutates shared state.
 * 60 changes per minute from a single IP.
 */
export const settingsLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 60,
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    code: 'TOO_MANY_REQUESTS',
    message: 'Too many interval changes, please try again later.',
  },
});

/**
 * General rate limiter for JSON and page routes.
 * The stream endpoint is long-lived and stays outside it.
 */
export const generalLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 500,
  skip: (req: Request) => req.path === '/stream_updates',
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    code: 'TOO_MANY_REQUESTS',
    message: 'Too many requests, please try again later.',
  },
});
