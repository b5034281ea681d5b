/**
 * Tests for ExporterConfig.
 */

import { describe, it, expect } from 'vitest';
import { ExporterConfig, ExporterConfigBuilder } from '../index.js';
import { ConfigurationError } from '../../errors/index.js';

describe('ExporterConfig', () => {
  describe('create', () => {
    it('should apply defaults', () => {
      expect(ExporterConfig.create().toOptions()).toEqual({
        prefix: '',
        logLevel: 'warn',
        sortNames: true,
      });
    });

    it('should keep provided options', () => {
      const config = ExporterConfig.create({ prefix: 'app.web', logLevel: 'debug', sortNames: false });
      expect(config.prefix).toBe('app.web');
      expect(config.logLevel).toBe('debug');
      expect(config.sortNames).toBe(false);
    });

    it('should reject a prefix ending with a dot', () => {
      expect(() => ExporterConfig.create({ prefix: 'app.' })).toThrow(ConfigurationError);
    });

    it('should list every issue', () => {
      let caught: unknown;
      try {
        ExporterConfig.fromEnv({ METRICS_PREFIX: '.app', METRICS_LOG_LEVEL: 'verbose' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({
        category: 'configuration',
        issues: [expect.stringMatching(/^METRICS_PREFIX: /), expect.stringMatching(/^METRICS_LOG_LEVEL: /)],
      });
    });
  });

  describe('fromEnv', () => {
    it('should read every variable', () => {
      const config = ExporterConfig.fromEnv({
        METRICS_PREFIX: 'svc',
        METRICS_LOG_LEVEL: 'ERROR',
        METRICS_SORT_NAMES: 'false',
      });

      expect(config.toOptions()).toEqual({ prefix: 'svc', logLevel: 'error', sortNames: false });
    });

    it('should fall back to defaults for missing variables', () => {
      expect(ExporterConfig.fromEnv({}).toOptions()).toEqual({
        prefix: '',
        logLevel: 'warn',
        sortNames: true,
      });
    });

    it('should reject an unknown log level', () => {
      expect(() => ExporterConfig.fromEnv({ METRICS_LOG_LEVEL: 'loud' })).toThrow(
        /METRICS_LOG_LEVEL/
      );
    });

    it('should reject a non-boolean sort flag', () => {
      expect(() => ExporterConfig.fromEnv({ METRICS_SORT_NAMES: 'yes' })).toThrow(
        'METRICS_SORT_NAMES must be "true" or "false"'
      );
    });
  });

  describe('ExporterConfigBuilder', () => {
    it('should build a validated configuration', () => {
      const config = new ExporterConfigBuilder().prefix('jobs').logLevel('info').sortNames(false).build();
      expect(config.toOptions()).toEqual({ prefix: 'jobs', logLevel: 'info', sortNames: false });
    });

    it('should validate on build', () => {
      expect(() => new ExporterConfigBuilder().prefix('.jobs').build()).toThrow(
        'Invalid exporter configuration: prefix: Prefix must not start or end with "."'
      );
    });
  });
});
