/**
 * Error codes returned to API clients so they can tell failure kinds apart.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Starter resolution
  STARTER_NOT_ON_DEPTH_CHART: 'STARTER_NOT_ON_DEPTH_CHART',
  DEPTH_CHART_OUT_OF_RANGE: 'DEPTH_CHART_OUT_OF_RANGE',

  // Sports data collaborators
  UPSTREAM_DATA_ERROR: 'UPSTREAM_DATA_ERROR',
  UPSTREAM_TIMEOUT: 'UPSTREAM_TIMEOUT',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when input is structurally malformed or a declared starter is not on the depth chart
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when a depth-chart fallback asks for more players than the chart lists
 */
export class OutOfRangeException extends AppException {
  public readonly position: string;
  public readonly index: number;
  public readonly available: number;

  constructor(position: string, index: number, available: number) {
    super(
      `Depth chart lists ${available} player(s) at ${position}; cannot fill depth slot ${index + 1}`,
      422,
      ErrorCode.DEPTH_CHART_OUT_OF_RANGE
    );
    this.position = position;
    this.index = index;
    this.available = available;
  }
}

/**
 * Thrown when a sports-data collaborator fails, times out, or returns malformed data.
 * Aborts the projection for the team it was fetching for.
 */
export class UpstreamDataException extends AppException {
  public readonly originalError?: Error;
  public readonly providerId: string;
  public readonly operation: string;
  public readonly team?: string;

  constructor(
    providerId: string,
    operation: string,
    message: string,
    options: {
      statusCode?: number;
      errorCode?: ErrorCodeType;
      team?: string;
      originalError?: Error;
    } = {}
  ) {
    const scope = options.team ? ` (${options.team})` : '';
    super(
      `[${providerId}] ${operation}${scope}: ${message}`,
      options.statusCode ?? 502,
      options.errorCode ?? ErrorCode.UPSTREAM_DATA_ERROR
    );
    this.providerId = providerId;
    this.operation = operation;
    this.team = options.team;
    this.originalError = options.originalError;
  }

  /**
   * Wraps a caught error. Errors that already are upstream errors pass through.
   */
  static fromError(
    providerId: string,
    operation: string,
    error: unknown,
    team?: string
  ): UpstreamDataException {
    if (error instanceof UpstreamDataException) return error;
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new UpstreamDataException(providerId, operation, originalError.message || 'Unknown error', {
      team,
      originalError,
    });
  }

  static timeout(providerId: string, operation: string, timeoutMs: number, team?: string): UpstreamDataException {
    return new UpstreamDataException(providerId, operation, `Request timed out after ${timeoutMs}ms`, {
      statusCode: 504,
      errorCode: ErrorCode.UPSTREAM_TIMEOUT,
      team,
      originalError: new Error('Timeout'),
    });
  }

  static malformed(providerId: string, operation: string, detail: string, team?: string): UpstreamDataException {
    return new UpstreamDataException(providerId, operation, `Malformed payload: ${detail}`, { team });
  }
}

export const StarterErrors = {
  notOnDepthChart: (player: string, position: string) =>
    new ValidationException(
      `${player} is not listed at ${position} on the depth chart`,
      ErrorCode.STARTER_NOT_ON_DEPTH_CHART
    ),
  outOfRange: (position: string, index: number, available: number) =>
    new OutOfRangeException(position, index, available),
};
