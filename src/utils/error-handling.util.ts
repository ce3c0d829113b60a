import { HttpStatus } from '@nestjs/common';

/**
 * Centralized error handling utilities for the gateway.
 *
 * Every request-scoped failure is an {@link ApplicationError} whose `type`
 * decides the HTTP status it is rendered with.
 */

export class ErrorType {
  // Client errors
  static readonly VALIDATION_ERROR = 'ValidationError';
  static readonly AUTHENTICATION_ERROR = 'AuthenticationError';
  static readonly PAYMENT_REQUIRED = 'PaymentRequired';
  static readonly AUTHORIZATION_ERROR = 'AuthorizationError';
  static readonly NOT_FOUND = 'NotFound';
  static readonly CONFLICT = 'Conflict';
  static readonly CANCELLED = 'Cancelled';

  // Upstream and resource errors
  static readonly UPSTREAM_ERROR = 'UpstreamError';
  static readonly POOL_EXHAUSTED = 'PoolExhausted';
  static readonly NOT_CONFIGURED = 'NotConfigured';

  // Startup
  static readonly CONFIGURATION_ERROR = 'ConfigurationError';
}

const STATUS_BY_TYPE: Record<string, HttpStatus> = {
  [ErrorType.VALIDATION_ERROR]: HttpStatus.BAD_REQUEST,
  [ErrorType.AUTHENTICATION_ERROR]: HttpStatus.UNAUTHORIZED,
  [ErrorType.PAYMENT_REQUIRED]: HttpStatus.PAYMENT_REQUIRED,
  [ErrorType.AUTHORIZATION_ERROR]: HttpStatus.FORBIDDEN,
  [ErrorType.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ErrorType.CONFLICT]: HttpStatus.CONFLICT,
  [ErrorType.CANCELLED]: HttpStatus.REQUEST_TIMEOUT,
  [ErrorType.UPSTREAM_ERROR]: HttpStatus.BAD_GATEWAY,
  [ErrorType.POOL_EXHAUSTED]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorType.NOT_CONFIGURED]: HttpStatus.SERVICE_UNAVAILABLE,
};

export class ApplicationError extends Error {
  public readonly type: string;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    type: string,
    message: string,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.type = type;
    this.code = code;
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ApplicationError.prototype);
  }

  /** HTTP status this error is rendered with; unknown types are internal errors. */
  get status(): HttpStatus {
    return STATUS_BY_TYPE[this.type] ?? HttpStatus.INTERNAL_SERVER_ERROR;
  }

  get isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

export function isApplicationError(error: unknown, type?: string): error is ApplicationError {
  return error instanceof ApplicationError && (type === undefined || error.type === type);
}

/** Message of any thrown value, for log lines. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

/**
 * Factory functions for creating specific error types
 */
export const ErrorFactory = {
  validation: (message: string, details?: Record<string, unknown>) =>
    new ApplicationError(ErrorType.VALIDATION_ERROR, message, 'VAL_001', details),

  authentication: (message: string, details?: Record<string, unknown>) =>
    new ApplicationError(ErrorType.AUTHENTICATION_ERROR, message, 'AUTH_001', details),

  noSession: () =>
    new ApplicationError(ErrorType.AUTHENTICATION_ERROR, 'no active session', 'AUTH_002'),

  accessDenied: (address: string, message = 'access denied') =>
    new ApplicationError(ErrorType.AUTHORIZATION_ERROR, message, 'AUTH_003', {
      address,
      tier: 'denied',
    }),

  paymentRequired: (message: string) =>
    new ApplicationError(ErrorType.PAYMENT_REQUIRED, message, 'PAY_001'),

  notFound: (message: string) =>
    new ApplicationError(ErrorType.NOT_FOUND, message, 'NF_001'),

  conflict: (message: string) =>
    new ApplicationError(ErrorType.CONFLICT, message, 'CONF_001'),

  cancelled: (operation: string) =>
    new ApplicationError(ErrorType.CANCELLED, `${operation} cancelled`, 'CANCEL_001'),

  upstream: (message: string, details?: Record<string, unknown>) =>
    new ApplicationError(ErrorType.UPSTREAM_ERROR, message, 'UP_001', details),

  timeout: (operation: string, ms: number) =>
    new ApplicationError(ErrorType.UPSTREAM_ERROR, `${operation} timed out after ${ms}ms`, 'UP_002'),

  poolExhausted: (capacity: number) =>
    new ApplicationError(ErrorType.POOL_EXHAUSTED, 'IP pool exhausted', 'POOL_001', { capacity }),

  notConfigured: (feature: string) =>
    new ApplicationError(ErrorType.NOT_CONFIGURED, `${feature} not configured`, 'CFG_002'),

  configuration: (message: string) =>
    new ApplicationError(ErrorType.CONFIGURATION_ERROR, message, 'CFG_001'),
};
