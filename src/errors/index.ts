/**
 * Error types for the registry exporter.
 *
 * Unsupported gauge values are not errors: they surface as skipped write
 * outcomes. Only configuration problems and sink failures are thrown.
 */

/**
 * Error category for classification
 */
export type ErrorCategory = 'configuration' | 'output';

/**
 * Base error class for all exporter errors
 */
export abstract class MetricsError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration error - invalid exporter or reporter configuration
 */
export class ConfigurationError extends MetricsError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;
  readonly issues: string[];

  constructor(message: string, options?: { issues?: string[] | undefined; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.issues = options?.issues ?? [];
  }
}

/**
 * Output error - the line writer behind a text sink failed
 */
export class OutputError extends MetricsError {
  readonly category = 'output' as const;
  readonly isRetryable = true;
  readonly metricName?: string;

  constructor(message: string, options?: { metricName?: string | undefined; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    if (options?.metricName !== undefined) {
      this.metricName = options.metricName;
    }
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof MetricsError) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Check if an error is an exporter error
 */
export function isMetricsError(error: unknown): error is MetricsError {
  return error instanceof MetricsError;
}

/**
 * Get the error category from an error
 */
export function getErrorCategory(error: unknown): ErrorCategory | undefined {
  if (error instanceof MetricsError) {
    return error.category;
  }
  return undefined;
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof MetricsError) {
    const parts = [`[${error.category.toUpperCase()}]`, `${error.name}:`, error.message];
    if (error instanceof OutputError && error.metricName !== undefined) {
      parts.push(`(metric ${error.metricName})`);
    }
    return parts.join(' ');
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
