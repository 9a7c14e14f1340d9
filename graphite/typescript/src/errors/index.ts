/**
 * Error types for the Graphite exporter.
 *
 * Connection and write failures are retryable by the caller; the exporter
 * itself never retries inside a flush cycle.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'registration'
  | 'connection'
  | 'write';

/**
 * Base error class for all exporter errors
 */
export abstract class GraphiteError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;

  constructor(message: string, options?: { cause?: Error | undefined }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration error - invalid or missing configuration
 */
export class ConfigurationError extends GraphiteError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;
  readonly issues: string[];

  constructor(message: string, options?: { issues?: string[]; cause?: Error | undefined }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.issues = options?.issues ?? [];
  }
}

/**
 * Registration error - metric name already registered
 */
export class RegistrationError extends GraphiteError {
  readonly category = 'registration' as const;
  readonly isRetryable = false;
  readonly metricName: string;

  constructor(message: string, metricName: string) {
    super(message);
    this.metricName = metricName;
  }
}

/**
 * Connection error - the transport for a flush cycle could not be established
 */
export class ConnectionError extends GraphiteError {
  readonly category = 'connection' as const;
  readonly isRetryable = true;
  readonly host: string;
  readonly port: number;

  constructor(
    message: string,
    options: { host: string; port: number; cause?: Error | undefined }
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.host = options.host;
    this.port = options.port;
  }

  static refused(host: string, port: number, cause: Error): ConnectionError {
    return new ConnectionError(`Unable to connect to ${host}:${port}: ${cause.message}`, {
      host,
      port,
      cause,
    });
  }

  static timedOut(host: string, port: number, timeoutMs: number): ConnectionError {
    return new ConnectionError(
      `Connection to ${host}:${port} timed out after ${timeoutMs}ms`,
      { host, port }
    );
  }
}

/**
 * Write error - a chunk could not be written to an open connection
 */
export class WriteError extends GraphiteError {
  readonly category = 'write' as const;
  readonly isRetryable = true;

  constructor(message: string, options?: { cause?: Error | undefined }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
  }
}

export function isGraphiteError(error: unknown): error is GraphiteError {
  return error instanceof GraphiteError;
}

export function isRetryableError(error: unknown): boolean {
  return isGraphiteError(error) && error.isRetryable;
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof GraphiteError) {
    return `[${error.category.toUpperCase()}] ${error.name}: ${error.message}`;
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
