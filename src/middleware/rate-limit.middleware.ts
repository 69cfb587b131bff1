import rateLimit from 'express-rate-limit';
import { Request } from 'express';

const isProd = process.env.NODE_ENV === 'production';

/**
 * Rate limiter for projection endpoints
 * Every call fans out to five sports-data fetches, so keep bursts small.
 * Development: 120 requests per minute. Production: 30 per minute per IP.
 */
export const projectionLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: isProd ? 30 : 120,
  message: {
    error: { code: 'RATE_LIMITED', message: 'Too many projection requests, please slow down' },
  },
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
});
