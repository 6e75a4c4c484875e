/**
 * Base application error. Routes map `statusCode` onto the HTTP response;
 * anything that is not an AppError is treated as a 500.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.statusCode = options.statusCode ?? 500;
    this.context = options.context;
  }
}

/**
 * Search or travel parameters outside their valid ranges. Fatal to the run:
 * raised before any adapter or price lookup is called.
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      statusCode: 400,
      context: { issues },
    });
    this.issues = issues;
  }
}

/** Invalid input on a non-search request (saved-search term, composer fields). */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'VALIDATION_ERROR', statusCode: 400, context });
  }
}

/** A marketplace or pricing API returned an error response. */
export class ExternalApiError extends AppError {
  public readonly service: string;

  constructor(service: string, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(`${service}: ${message}`, {
      code: 'EXTERNAL_API_ERROR',
      statusCode: 502,
      context: { service, upstreamStatus: options.statusCode },
      cause: options.cause,
    });
    this.service = service;
  }
}
