/**
 * Tests for the configuration loader
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  applyPipelineOverrides,
  clearConfigFileCache,
  generateSampleConfig,
  getMergedLogConfig,
  getMergedPipelineConfig,
  getMergedProvidersConfig,
  getMergedRateLimitConfig,
  parseConfigFileContent,
  setConfigFile,
  stripJsonComments,
} from '../../src/utils/config-loader.js';
import { ConfigValidationError } from '../../src/utils/config-schemas.js';

const ENV_VARS = [
  'LOG_LEVEL',
  'LOG_PRETTY',
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'ANTHROPIC_API_KEY',
  'ANTHROPIC_MODEL',
  'SITESCOPE_CONCURRENCY',
  'SITESCOPE_RENDER_MODE',
  'SITESCOPE_PAGE_SELECTION_PRIMARY',
  'SITESCOPE_SYNTHESIS_SECONDARY',
  'SITESCOPE_RPM',
];

describe('config-loader', () => {
  beforeEach(() => {
    for (const name of ENV_VARS) {
      vi.stubEnv(name, '');
    }
    setConfigFile({});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigFileCache();
  });

  describe('stripJsonComments', () => {
    it('should remove line and block comments', () => {
      expect(stripJsonComments('{\n  // note\n  "a": 1 /* inline */\n}')).toBe('{\n  \n  "a": 1 \n}');
    });

    it('should leave comment markers inside strings alone', () => {
      expect(stripJsonComments('{"url": "https://example.com/*x*/"} // trailing')).toBe(
        '{"url": "https://example.com/*x*/"} '
      );
    });
  });

  describe('parseConfigFileContent', () => {
    it('should parse commented JSON', () => {
      const config = parseConfigFileContent('{\n  // tuning\n  "pipeline": { "concurrency": 4 }\n}');

      expect(config).toEqual({ pipeline: { concurrency: 4 } });
    });

    it('should ignore invalid JSON', () => {
      expect(parseConfigFileContent('{ "pipeline": ')).toEqual({});
    });

    it('should ignore content that fails validation', () => {
      expect(parseConfigFileContent('{ "pipeline": { "concurrency": "five" } }')).toEqual({});
    });

    it('should accept the generated sample', () => {
      const config = parseConfigFileContent(generateSampleConfig());

      expect(config.pipeline?.concurrency).toBe(10);
      expect(config.pipeline?.routes?.synthesis).toEqual({ primary: 'anthropic', secondary: 'openai' });
    });
  });

  describe('getMergedPipelineConfig', () => {
    it('should fall back to defaults', () => {
      const config = getMergedPipelineConfig();

      expect(config.concurrency).toBe(10);
      expect(config.maxPrioritizedPages).toBe(25);
      expect(config.globalTimeoutMs).toBe(0);
      expect(config.renderMode).toBe('never');
      expect(config.routes.synthesis).toEqual({ primary: 'anthropic', secondary: 'openai' });
      expect(config.routes.embedding).toEqual({ primary: 'openai' });
    });

    it('should read values from the config file', () => {
      setConfigFile({
        pipeline: { concurrency: 5, routes: { synthesis: { primary: 'openai', secondary: 'none' } } },
      });

      const config = getMergedPipelineConfig();

      expect(config.concurrency).toBe(5);
      expect(config.routes.synthesis).toEqual({ primary: 'openai' });
    });

    it('should prefer environment variables over the file', () => {
      setConfigFile({ pipeline: { concurrency: 5 } });
      vi.stubEnv('SITESCOPE_CONCURRENCY', '7');
      vi.stubEnv('SITESCOPE_PAGE_SELECTION_PRIMARY', 'anthropic');
      vi.stubEnv('SITESCOPE_SYNTHESIS_SECONDARY', 'none');

      const config = getMergedPipelineConfig();

      expect(config.concurrency).toBe(7);
      expect(config.routes['page-selection']).toEqual({ primary: 'anthropic', secondary: 'anthropic' });
      expect(config.routes.synthesis).toEqual({ primary: 'anthropic' });
    });

    it('should apply per-call overrides last', () => {
      vi.stubEnv('SITESCOPE_CONCURRENCY', '7');

      const config = getMergedPipelineConfig({
        concurrency: 3,
        routes: { 'page-selection': { primary: 'anthropic' } },
      });

      expect(config.concurrency).toBe(3);
      expect(config.routes['page-selection']).toEqual({ primary: 'anthropic' });
    });

    it('should reject invalid values', () => {
      vi.stubEnv('SITESCOPE_CONCURRENCY', '0');

      expect(() => getMergedPipelineConfig()).toThrow(ConfigValidationError);
      expect(() => getMergedPipelineConfig()).toThrow(/Configuration validation failed for pipeline:\n {2}- concurrency: /);
    });

    it('should reject an unknown render mode', () => {
      vi.stubEnv('SITESCOPE_RENDER_MODE', 'sometimes');

      expect(() => getMergedPipelineConfig()).toThrow(ConfigValidationError);
    });
  });

  describe('applyPipelineOverrides', () => {
    it('should keep base values for undefined overrides', () => {
      const base = getMergedPipelineConfig({ concurrency: 4 });

      const config = applyPipelineOverrides(base, { concurrency: undefined, perPageTimeoutMs: undefined, maxLinks: 50 });

      expect(config.concurrency).toBe(4);
      expect(config.perPageTimeoutMs).toBe(15000);
      expect(config.maxLinks).toBe(50);
    });

    it('should replace only the overridden routes', () => {
      const base = getMergedPipelineConfig();

      const config = applyPipelineOverrides(base, { routes: { synthesis: { primary: 'openai' } } });

      expect(config.routes.synthesis).toEqual({ primary: 'openai' });
      expect(config.routes['page-selection']).toEqual(base.routes['page-selection']);
    });

    it.each([{ concurrency: 0 }, { perPageTimeoutMs: 10 }, { concurrency: 2.5 }])(
      'should reject the out-of-range override %o',
      (overrides) => {
        expect(() => applyPipelineOverrides(getMergedPipelineConfig(), overrides)).toThrow(ConfigValidationError);
      }
    );
  });

  describe('getMergedProvidersConfig', () => {
    it('should combine keys from the environment with file settings', () => {
      setConfigFile({ providers: { anthropic: { model: 'claude-3-5-haiku-latest' } } });
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');

      const config = getMergedProvidersConfig();

      expect(config.openai).toEqual({
        apiKey: 'test-secret',
        model: 'gpt-4o-mini',
        embeddingModel: 'text-embedding-3-small',
      });
      expect(config.anthropic.model).toBe('claude-3-5-haiku-latest');
      expect(config.anthropic.apiKey).toBeUndefined();
    });
  });

  describe('getMergedRateLimitConfig', () => {
    it('should read limits from the environment', () => {
      setConfigFile({ rateLimit: { tokensPerMinute: 50000 } });
      vi.stubEnv('SITESCOPE_RPM', '120');

      expect(getMergedRateLimitConfig()).toEqual({ requestsPerMinute: 120, tokensPerMinute: 50000, maxQueueWaitMs: 60000 });
    });
  });

  describe('getMergedLogConfig', () => {
    it('should merge level from the environment and pretty printing from the file', () => {
      setConfigFile({ log: { level: 'warn', prettyPrint: true } });
      vi.stubEnv('LOG_LEVEL', 'debug');

      expect(getMergedLogConfig()).toEqual({ level: 'debug', prettyPrint: true });
    });
  });
});
