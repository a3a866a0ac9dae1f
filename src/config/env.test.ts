/**
 * Unit tests for configuration loading
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadConfig } from './env.js';

const VARIABLES = [
  'GOOGLE_DEV_KEY',
  'WUNDERGROUND_API_KEY',
  'GEOCODE_REGION_BIAS',
  'SKYCAST_DB_PATH',
  'SKYCAST_LOG_LEVEL',
  'SKYCAST_PORT',
  'SKYCAST_URL_SHORTENER',
];

describe('loadConfig', () => {
  beforeEach(() => {
    for (const name of VARIABLES) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should apply defaults and leave keys unset', () => {
    const config = loadConfig();

    expect(config).toEqual({
      googleDevKey: undefined,
      wundergroundApiKey: undefined,
      geocodeRegionBias: undefined,
      port: undefined,
      logLevel: 'info',
      urlShortener: 'isgd',
      serverName: 'skycast-weather',
      serverVersion: '0.1.0',
      dbPath: './data/weather.db',
    });
  });

  it('should read keys, region bias and port', () => {
    vi.stubEnv('GOOGLE_DEV_KEY', 'test-google-key');
    vi.stubEnv('WUNDERGROUND_API_KEY', ' test-wu-key ');
    vi.stubEnv('GEOCODE_REGION_BIAS', 'uk');
    vi.stubEnv('SKYCAST_PORT', '3100');
    vi.stubEnv('SKYCAST_URL_SHORTENER', 'none');

    const config = loadConfig();

    expect(config.googleDevKey).toBe('test-google-key');
    expect(config.wundergroundApiKey).toBe('test-wu-key');
    expect(config.geocodeRegionBias).toBe('uk');
    expect(config.port).toBe(3100);
    expect(config.urlShortener).toBe('none');
  });

  it('should reject an unknown log level', () => {
    vi.stubEnv('SKYCAST_LOG_LEVEL', 'verbose');

    expect(() => loadConfig()).toThrow('Invalid SKYCAST_LOG_LEVEL: verbose');
  });

  it('should reject an unknown shortener', () => {
    vi.stubEnv('SKYCAST_URL_SHORTENER', 'bitly');

    expect(() => loadConfig()).toThrow('Invalid SKYCAST_URL_SHORTENER: bitly');
  });

  it('should reject a port that is not a number', () => {
    vi.stubEnv('SKYCAST_PORT', 'http');

    expect(() => loadConfig()).toThrow('Invalid SKYCAST_PORT: http');
  });
});
