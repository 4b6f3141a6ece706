/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({}, {});

    expect(config).toEqual({
      apiKey: '',
      verify: true,
      timeout: 30000,
      baseUrl: 'https://zonecruncher.com/api/v1',
      userAgent: 'zetalytics-connector/1.0.0',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should read the environment', () => {
    const config = loadConfig(
      {},
      {
        ZETALYTICS_API_KEY: 'test-key',
        ZETALYTICS_VERIFY: 'false',
        ZETALYTICS_TIMEOUT_MS: '5000',
        ZETALYTICS_BASE_URL: 'https://api.test/v1/',
      }
    );

    expect(config.apiKey).toBe('test-key');
    expect(config.verify).toBe(false);
    expect(config.timeout).toBe(5000);
    expect(config.baseUrl).toBe('https://api.test/v1');
  });

  it('should let explicit options win over the environment', () => {
    const config = loadConfig(
      { apiKey: 'override-key', verify: true },
      { ZETALYTICS_API_KEY: 'test-key', ZETALYTICS_VERIFY: '0' }
    );

    expect(config.apiKey).toBe('override-key');
    expect(config.verify).toBe(true);
  });

  it('should treat a blank API key as missing', () => {
    expect(loadConfig({ apiKey: '   ' }, {}).apiKey).toBe('');
  });

  it('should reject a non-positive timeout', () => {
    expect(() => loadConfig({ timeout: -5 }, {})).toThrow(ConfigError);

    try {
      loadConfig({ timeout: -5 }, {});
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].startsWith('timeout: ')).toBe(true);
      }
    }
  });

  it('should reject an unknown boolean in the environment', () => {
    expect(() => loadConfig({}, { ZETALYTICS_VERIFY: 'maybe' })).toThrow(ConfigError);
  });

  it('should reject a base URL that is not a URL', () => {
    expect(() => loadConfig({ baseUrl: 'zonecruncher' }, {})).toThrow(ConfigError);
  });
});
