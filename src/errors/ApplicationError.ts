/**
 * Unified Error Hierarchy for mb-lookup
 *
 * Every error thrown by the client extends ApplicationError and carries:
 * - Machine-readable error codes
 * - Rich context metadata
 * - A retryable hint for callers that implement their own retry
 * - The HTTP status it corresponds to (0 when there is none)
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Resource Errors
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  // Network Errors (retryable)
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',
  NETWORK_DNS_FAILED = 'NETWORK_DNS_FAILED',
  NETWORK_CANCELLED = 'NETWORK_CANCELLED',

  // Provider Errors
  PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
  PROVIDER_SERVER_ERROR = 'PROVIDER_SERVER_ERROR',
  PROVIDER_INVALID_RESPONSE = 'PROVIDER_INVALID_RESPONSE',

  // Configuration Errors (permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'searchArtists') */
  operation?: string;

  /** Entity type being operated on (e.g., 'artist', 'recording') */
  entityType?: string;

  /** Entity ID if applicable */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 */
export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;

  /**
   * HTTP status code this error maps to (0 for non-HTTP errors)
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether repeating the same call could succeed
   */
  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// RESOURCE ERRORS
// ============================================

export class ResourceNotFoundError extends ApplicationError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string | number,
    message?: string,
    context?: ErrorContext
  ) {
    super(message || `${resourceType} not found: ${resourceId}`, ErrorCode.RESOURCE_NOT_FOUND, 404, {
      isOperational: true,
      retryable: false,
      context: { ...context, entityType: resourceType, entityId: resourceId },
    });
  }
}

/**
 * Raised by strict-match lookups when the search did not return exactly one result
 */
export class MatchNotFoundError extends ResourceNotFoundError {
  constructor(
    resourceType: string,
    public readonly query: string,
    public readonly matchCount: number,
    context?: ErrorContext
  ) {
    super(
      resourceType,
      query,
      `No match found for ${resourceType} query '${query}' (${matchCount} result(s))`,
      { ...context, metadata: { ...context?.metadata, matchCount } }
    );
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Transport Errors
export class TransportError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    public readonly url?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      503,
      true,
      { ...context, metadata: { ...context?.metadata, url } },
      cause
    );
  }
}

export class TimeoutError extends TransportError {
  constructor(
    public readonly timeoutMs: number,
    url?: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Request timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      url,
      { ...context, durationMs: timeoutMs },
      cause
    );
  }
}

export class RequestCancelledError extends TransportError {
  constructor(url?: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Request cancelled: ${url ?? 'unknown url'}`,
      ErrorCode.NETWORK_CANCELLED,
      url,
      context,
      cause
    );
  }
}

// Provider Errors
export class ProviderError extends OperationalError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode,
    statusCode: number,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      statusCode,
      retryable,
      { ...context, service: providerName },
      cause
    );
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    providerName: string,
    public readonly retryAfter?: number,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Rate limit exceeded for provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_RATE_LIMIT,
      429,
      true, // Retryable after delay
      { ...context, metadata: { ...context?.metadata, retryAfter } }
    );
  }
}

export class ProviderServerError extends ProviderError {
  constructor(
    providerName: string,
    public readonly httpStatusCode: number,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider server error (${httpStatusCode}): ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_SERVER_ERROR,
      httpStatusCode,
      httpStatusCode >= 500, // 5xx are retryable, 4xx are not
      { ...context, metadata: { ...context?.metadata, httpStatusCode } },
      cause
    );
  }
}

export interface DecodeIssue {
  path: string;
  message: string;
}

/**
 * Response body was not JSON, or its JSON did not have the expected shape
 */
export class DecodeError extends ProviderError {
  public readonly body: string;
  public readonly position?: number;
  public readonly issues: DecodeIssue[];

  constructor(
    providerName: string,
    details: { body: string; position?: number; issues?: DecodeIssue[] },
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Invalid response from provider: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_INVALID_RESPONSE,
      502,
      false,
      {
        ...context,
        metadata: {
          ...context?.metadata,
          ...(details.position !== undefined && { position: details.position }),
          ...(details.issues && { issues: details.issues }),
        },
      },
      cause
    );
    this.body = details.body;
    if (details.position !== undefined) {
      this.position = details.position;
    }
    this.issues = details.issues ?? [];
  }
}

// ============================================
// PERMANENT ERRORS (not retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, statusCode, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      500,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}
