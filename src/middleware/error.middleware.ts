import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppException, ErrorCode, UpstreamDataException } from '../utils/exceptions';
import { logger } from '../config/logger.config';
import { env } from '../config/env.config';

export const errorHandler = (
  err: Error | AppException,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  // Handle custom AppException instances
  if (err instanceof AppException) {
    const logPayload: Record<string, unknown> = {
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    };
    if (err instanceof UpstreamDataException) {
      logPayload.provider = err.providerId;
      logPayload.operation = err.operation;
      logPayload.cause = err.originalError?.message;
    }
    logger.warn('Application error', logPayload);

    return res.status(err.statusCode).json({
      error: {
        code: err.errorCode,
        message: err.message,
      },
    });
  }

  // Schemas re-parsed inside controllers surface here
  if (err instanceof ZodError) {
    const firstIssue = err.issues[0];
    return res.status(400).json({
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: firstIssue ? firstIssue.message : 'Validation failed',
      },
    });
  }

  // Handle unexpected errors
  // Only log full stack traces outside production
  const logPayload: Record<string, unknown> = {
    error: err.message,
    path: req.path,
    method: req.method,
    requestId: req.requestId,
  };

  if (env.NODE_ENV !== 'production') {
    logPayload.stack = err.stack;
  } else {
    logPayload.errorType = err.constructor.name;
  }

  logger.error('Unexpected error', logPayload);

  return res.status(500).json({
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An error occurred while processing your request',
    },
  });
};
