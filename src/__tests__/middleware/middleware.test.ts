import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodIssueCode } from 'zod';
import { errorHandler } from '../../middleware/error.middleware';
import { validateRequest } from '../../middleware/validation.middleware';
import { requestLoggingMiddleware } from '../../middleware/request-logging.middleware';
import { asyncHandler } from '../../shared/async-handler';
import {
  OutOfRangeException,
  UpstreamDataException,
  ValidationException,
} from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

jest.mock('../../config/logger.config', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Default to non-production for most tests; individual tests override as needed
let mockNodeEnv = 'development';
jest.mock('../../config/env.config', () => ({
  get env() {
    return { NODE_ENV: mockNodeEnv };
  },
}));

// ---------- Helpers ----------

function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    headers: {},
    path: '/api/projections/team',
    method: 'POST',
    body: {},
    query: {},
    params: {},
    requestId: 'req-1',
    ...overrides,
  } as unknown as Request;
}

function createMockResponse(): Response {
  const res: Partial<Response> = {};
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  res.setHeader = jest.fn().mockReturnValue(res);
  return res as Response;
}

function createMockNext(): NextFunction {
  return jest.fn();
}

// ===========================
// Error Handler Tests
// ===========================
describe('errorHandler', () => {
  let res: Response;
  let next: NextFunction;

  beforeEach(() => {
    res = createMockResponse();
    next = createMockNext();
    mockNodeEnv = 'development';
  });

  it('should map ValidationException to 400', () => {
    errorHandler(new ValidationException('Team and opponent are required'), createMockRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: { code: 'VALIDATION_ERROR', message: 'Team and opponent are required' },
    });
  });

  it('should map OutOfRangeException to 422', () => {
    errorHandler(new OutOfRangeException('TE', 0, 0), createMockRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(422);
    expect(res.json).toHaveBeenCalledWith({
      error: {
        code: 'DEPTH_CHART_OUT_OF_RANGE',
        message: 'Depth chart lists 0 player(s) at TE; cannot fill depth slot 1',
      },
    });
  });

  it('should map upstream timeouts to 504 and log the provider', () => {
    const err = UpstreamDataException.timeout('live', 'fetchWeather', 5000, 'DAL');

    errorHandler(err, createMockRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(504);
    expect(res.json).toHaveBeenCalledWith({
      error: {
        code: 'UPSTREAM_TIMEOUT',
        message: '[live] fetchWeather (DAL): Request timed out after 5000ms',
      },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Application error',
      expect.objectContaining({ provider: 'live', operation: 'fetchWeather', cause: 'Timeout', requestId: 'req-1' })
    );
  });

  it('should map ZodError to 400 with the first issue', () => {
    const err = new ZodError([
      { code: ZodIssueCode.custom, message: 'Home and away teams must differ', path: ['away', 'team'] },
    ]);

    errorHandler(err, createMockRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: { code: 'VALIDATION_ERROR', message: 'Home and away teams must differ' },
    });
  });

  it('should hide unexpected errors behind a 500', () => {
    errorHandler(new Error('secret detail'), createMockRequest(), res, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An error occurred while processing your request',
      },
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Unexpected error',
      expect.objectContaining({ error: 'secret detail', stack: expect.any(String) })
    );
  });

  it('should omit stack traces in production', () => {
    mockNodeEnv = 'production';

    errorHandler(new TypeError('bad'), createMockRequest(), res, next);

    const payload = (logger.error as jest.Mock).mock.calls[0][1];
    expect(payload.stack).toBeUndefined();
    expect(payload.errorType).toBe('TypeError');
  });
});

// ===========================
// Validation Middleware Tests
// ===========================
describe('validateRequest', () => {
  const schema = z.object({
    team: z.string().trim().min(2),
    week: z.coerce.number().int().min(1),
  });

  it('should replace the body with the parsed value and call next', async () => {
    const req = createMockRequest({ body: { team: ' DAL ', week: '4' } });
    const res = createMockResponse();
    const next = createMockNext();

    await validateRequest(schema)(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.body).toEqual({ team: 'DAL', week: 4 });
  });

  it('should return 400 naming the offending field', async () => {
    const req = createMockRequest({ body: { team: 'DAL', week: 0 } });
    const res = createMockResponse();
    const next = createMockNext();

    await validateRequest(schema)(req, res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'week: Number must be greater than or equal to 1',
      },
    });
  });

  it('should write query defaults back onto req.query', async () => {
    const querySchema = z.object({ format: z.enum(['json', 'csv']).default('json') });
    const req = createMockRequest({ query: {} });
    const res = createMockResponse();
    const next = createMockNext();

    await validateRequest(querySchema, 'query')(req, res, next);

    expect(next).toHaveBeenCalledWith();
    expect(req.query).toEqual({ format: 'json' });
  });
});

// ===========================
// Async Handler Tests
// ===========================
describe('asyncHandler', () => {
  it('should forward rejections to next', async () => {
    const err = new ValidationException('nope');
    const next = createMockNext();
    const handler = asyncHandler(async () => {
      throw err;
    });

    handler(createMockRequest(), createMockResponse(), next);
    await new Promise((resolve) => setImmediate(resolve));

    expect(next).toHaveBeenCalledWith(err);
  });
});

// ===========================
// Request Logging Tests
// ===========================
describe('requestLoggingMiddleware', () => {
  function createLoggingResponse() {
    const listeners: Record<string, () => void> = {};
    const res = createMockResponse();
    res.on = jest.fn().mockImplementation((event: string, listener: () => void) => {
      listeners[event] = listener;
      return res;
    });
    return { res, listeners };
  }

  it('should keep a well-formed client request id', () => {
    const req = createMockRequest({ header: jest.fn().mockReturnValue('abc-123') });
    const { res } = createLoggingResponse();
    const next = createMockNext();

    requestLoggingMiddleware(req, res, next);

    expect(req.requestId).toBe('abc-123');
    expect(res.setHeader).toHaveBeenCalledWith('X-Request-ID', 'abc-123');
    expect(next).toHaveBeenCalled();
  });

  it('should generate an id when the client id is malformed', () => {
    const req = createMockRequest({ header: jest.fn().mockReturnValue('not valid!') });
    const { res } = createLoggingResponse();

    requestLoggingMiddleware(req, res, createMockNext());

    expect(req.requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('should log the request when the response finishes', () => {
    const req = createMockRequest({ header: jest.fn().mockReturnValue(undefined) });
    const { res, listeners } = createLoggingResponse();

    requestLoggingMiddleware(req, res, createMockNext());
    listeners.finish();

    expect(logger.debug).toHaveBeenCalledWith(
      'Request completed',
      expect.objectContaining({ method: 'POST', path: '/api/projections/team' })
    );
  });
});
