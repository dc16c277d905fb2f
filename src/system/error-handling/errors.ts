/**
 * Error types raised by the weather alert pipeline
 */

export enum AlertErrorType {
  /** No response: DNS failure, refused connection, timeout */
  NETWORK_ERROR = 'network_error',

  /** Upstream 5xx */
  SERVER_ERROR = 'server_error',

  /** Upstream rejected the request (4xx, rate limit) */
  API_ERROR = 'api_error',

  /** Response body could not be understood */
  DATA_PARSING_ERROR = 'data_parsing_error',

  /** Missing or invalid settings, bad API key, unknown location */
  CONFIGURATION_ERROR = 'configuration_error',

  /** Delivery through a notification channel failed */
  NOTIFICATION_ERROR = 'notification_error',

  UNKNOWN_ERROR = 'unknown_error'
}

export interface AlertErrorContext {
  errorType: AlertErrorType;
  retryable: boolean;
  operation?: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export interface AlertErrorOptions {
  retryable?: boolean;
  operation?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

const RETRYABLE_BY_DEFAULT: ReadonlySet<AlertErrorType> = new Set([
  AlertErrorType.NETWORK_ERROR,
  AlertErrorType.SERVER_ERROR
]);

export class AlertError extends Error {
  public readonly context: AlertErrorContext;

  constructor(message: string, errorType: AlertErrorType, options: AlertErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AlertError';
    this.context = {
      errorType,
      retryable: options.retryable ?? RETRYABLE_BY_DEFAULT.has(errorType),
      operation: options.operation,
      timestamp: new Date(),
      details: options.details
    };
  }

  get errorType(): AlertErrorType {
    return this.context.errorType;
  }

  get retryable(): boolean {
    return this.context.retryable;
  }

  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Operation: ${this.context.operation || 'unknown'})`;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Errors that are not AlertErrors are treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AlertError) {
    return error.retryable;
  }
  return true;
}
