/**
 * Configuration for rendering a registry as Prometheus text.
 *
 * Provides a validated configuration class with a builder and an
 * environment loader.
 */

import { z } from 'zod';

import { ConfigurationError } from '../errors/index.js';
import type { LogLevel } from '../observability/index.js';

/**
 * Configuration options for the reporter
 */
export interface ExporterConfigOptions {
  /** Dot-separated namespace prepended to every registry name (default: none) */
  prefix?: string;
  /** Minimum level for exporter log output (default: warn) */
  logLevel?: LogLevel;
  /** Write metrics of each kind in name order (default: true) */
  sortNames?: boolean;
}

const DEFAULT_CONFIG: Required<ExporterConfigOptions> = {
  prefix: '',
  logLevel: 'warn',
  sortNames: true,
};

/**
 * Zod schema for resolved options.
 */
const configSchema = z
  .object({
    prefix: z
      .string()
      .refine((p) => !p.startsWith('.') && !p.endsWith('.'), {
        message: 'Prefix must not start or end with "."',
      }),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'off']),
    sortNames: z.boolean(),
  })
  .strict();

/**
 * Validated reporter configuration
 */
export class ExporterConfig {
  readonly prefix: string;
  readonly logLevel: LogLevel;
  readonly sortNames: boolean;

  private constructor(options: Required<ExporterConfigOptions>) {
    this.prefix = options.prefix;
    this.logLevel = options.logLevel;
    this.sortNames = options.sortNames;
  }

  /**
   * Create configuration from options
   * @throws {ConfigurationError} if an option is invalid
   */
  static create(options: ExporterConfigOptions = {}): ExporterConfig {
    const result = configSchema.safeParse({ ...DEFAULT_CONFIG, ...options });
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new ConfigurationError(`Invalid exporter configuration: ${issues.join('; ')}`, {
        issues,
        cause: result.error,
      });
    }
    return new ExporterConfig(result.data);
  }

  /**
   * Create configuration from environment variables
   *
   * Environment variables:
   * - METRICS_PREFIX: namespace prepended to registry names
   * - METRICS_LOG_LEVEL: debug, info, warn, error or off
   * - METRICS_SORT_NAMES: true/false
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
    const options: Record<string, unknown> = {};

    if (env['METRICS_PREFIX'] !== undefined) {
      options['prefix'] = env['METRICS_PREFIX'];
    }

    if (env['METRICS_LOG_LEVEL']) {
      options['logLevel'] = env['METRICS_LOG_LEVEL'].toLowerCase();
    }

    if (env['METRICS_SORT_NAMES']) {
      const value = env['METRICS_SORT_NAMES'];
      if (value !== 'true' && value !== 'false') {
        throw new ConfigurationError('METRICS_SORT_NAMES must be "true" or "false"');
      }
      options['sortNames'] = value === 'true';
    }

    const result = configSchema.partial().safeParse(options);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `METRICS_${toEnvSuffix(issue.path.join('.'))}: ${issue.message}`
      );
      throw new ConfigurationError(`Invalid exporter environment: ${issues.join('; ')}`, {
        issues,
        cause: result.error,
      });
    }

    return ExporterConfig.create(stripUndefined(result.data));
  }

  toOptions(): Required<ExporterConfigOptions> {
    return { prefix: this.prefix, logLevel: this.logLevel, sortNames: this.sortNames };
  }
}

function toEnvSuffix(key: string): string {
  return key.replace(/([A-Z])/g, '_$1').toUpperCase();
}

function stripUndefined(options: {
  prefix?: string | undefined;
  logLevel?: LogLevel | undefined;
  sortNames?: boolean | undefined;
}): ExporterConfigOptions {
  const result: ExporterConfigOptions = {};
  if (options.prefix !== undefined) result.prefix = options.prefix;
  if (options.logLevel !== undefined) result.logLevel = options.logLevel;
  if (options.sortNames !== undefined) result.sortNames = options.sortNames;
  return result;
}

/**
 * Builder for creating reporter configuration with fluent API
 */
export class ExporterConfigBuilder {
  private options: ExporterConfigOptions = {};

  /**
   * Set the namespace prepended to registry names
   */
  prefix(prefix: string): this {
    this.options.prefix = prefix;
    return this;
  }

  /**
   * Set the minimum log level
   */
  logLevel(level: LogLevel): this {
    this.options.logLevel = level;
    return this;
  }

  /**
   * Enable or disable name ordering within each kind
   */
  sortNames(enabled: boolean): this {
    this.options.sortNames = enabled;
    return this;
  }

  /**
   * Build the configuration
   */
  build(): ExporterConfig {
    return ExporterConfig.create(this.options);
  }
}
