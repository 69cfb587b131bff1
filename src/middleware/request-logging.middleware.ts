import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { logger } from '../config/logger.config';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

const SLOW_REQUEST_MS = 1000;

/**
 * Tags each request with an ID (client-supplied X-Request-ID when well formed)
 * and logs it on completion. Slow requests are logged at warn.
 */
export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const clientId = req.header('x-request-id');
  const requestId = clientId && /^[a-zA-Z0-9-]{1,128}$/.test(clientId) ? clientId : randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  const start = Date.now();
  res.on('finish', () => {
    const durationMs = Date.now() - start;
    const meta = { requestId, method: req.method, path: req.path, status: res.statusCode, durationMs };
    if (durationMs > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', meta);
    } else {
      logger.debug('Request completed', meta);
    }
  });

  next();
}
