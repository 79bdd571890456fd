/**
 * @module @sprig/plugin-execution/__tests__/config
 */

import { describe, expect, it } from 'vitest';
import { ConfigError } from '@sprig/plugin-contracts';
import { configFromEnv, resolveConfig } from '../config.js';

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      manual: false,
      theme: 'one-dark',
      selector: 'pre code',
      cdn: 'jsdelivr',
      version: 'latest',
      timeoutMs: 10_000,
      isolation: 'process',
      injectionDepth: 3,
      logLevel: 'warn',
    });
  });

  it('should let explicit options override the environment', () => {
    const config = resolveConfig({ cdn: 'unpkg' }, { SPRIG_CDN: 'jsdelivr', SPRIG_VERSION: '1.0.0' });

    expect(config.cdn).toBe('unpkg');
    expect(config.version).toBe('1.0.0');
  });

  it('should ignore undefined options', () => {
    expect(resolveConfig({ version: undefined }, { SPRIG_VERSION: '2.0.0' }).version).toBe('2.0.0');
  });

  it('should reject invalid values', () => {
    expect(() => resolveConfig({ pluginsUrl: 'not a url' }, {})).toThrow(ConfigError);
    expect(() => resolveConfig({}, { SPRIG_LOG_LEVEL: 'loud' })).toThrow(/^Invalid highlighter config: logLevel: /);
    expect(() => resolveConfig({}, { SPRIG_ISOLATION: 'thread' })).toThrow(/^Invalid highlighter config: isolation: /);
  });
});

describe('configFromEnv', () => {
  it('should read SPRIG_ variables', () => {
    expect(
      configFromEnv({
        SPRIG_PLUGINS_URL: 'https://grammars.test/plugins.json',
        SPRIG_TIMEOUT_MS: '500',
        SPRIG_ISOLATION: 'none',
        SPRIG_LOG_LEVEL: 'debug',
        HOME: '/home/test',
      })
    ).toEqual({
      pluginsUrl: 'https://grammars.test/plugins.json',
      timeoutMs: 500,
      isolation: 'none',
      logLevel: 'debug',
    });
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => configFromEnv({ SPRIG_TIMEOUT_MS: 'soon' })).toThrow(
      'SPRIG_TIMEOUT_MS must be a number, got "soon"'
    );
  });
});
