/**
 * Tests for exporter error types.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  OutputError,
  formatError,
  getErrorCategory,
  isMetricsError,
  isRetryableError,
} from '../index.js';

describe('errors', () => {
  it('should classify output errors as retryable', () => {
    const error = new OutputError('write failed', { metricName: 'up' });
    expect(error.name).toBe('OutputError');
    expect(isMetricsError(error)).toBe(true);
    expect(isRetryableError(error)).toBe(true);
    expect(getErrorCategory(error)).toBe('output');
  });

  it('should classify configuration errors as permanent', () => {
    const error = new ConfigurationError('bad prefix', { issues: ['prefix: bad'] });
    expect(isRetryableError(error)).toBe(false);
    expect(getErrorCategory(error)).toBe('configuration');
    expect(error.issues).toEqual(['prefix: bad']);
  });

  it('should keep the cause', () => {
    const cause = new Error('EPIPE');
    expect(new OutputError('write failed', { cause }).cause).toBe(cause);
  });

  it('should not classify foreign errors', () => {
    expect(isMetricsError(new Error('x'))).toBe(false);
    expect(isRetryableError(new Error('x'))).toBe(false);
    expect(getErrorCategory('x')).toBeUndefined();
  });

  describe('formatError', () => {
    it('should format exporter errors with category and metric', () => {
      expect(formatError(new OutputError('write failed', { metricName: 'up' }))).toBe(
        '[OUTPUT] OutputError: write failed (metric up)'
      );
      expect(formatError(new ConfigurationError('bad prefix'))).toBe(
        '[CONFIGURATION] ConfigurationError: bad prefix'
      );
    });

    it('should format other values', () => {
      expect(formatError(new TypeError('nope'))).toBe('TypeError: nope');
      expect(formatError(42)).toBe('42');
    });
  });
});
