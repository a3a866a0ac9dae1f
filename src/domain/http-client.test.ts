/**
 * Unit tests for HttpClient
 * Tests request building and error mapping with mocked fetch
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient } from './http-client.js';
import { TransportError } from './errors.js';

vi.mock('./logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    logUpstreamCall: vi.fn(),
  },
}));

import { logger } from './logger.js';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('HttpClient', () => {
  let client: HttpClient;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubGlobal('fetch', mockFetch);
    client = new HttpClient('skycast-test/1.0');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('getJson()', () => {
    it('should append query parameters and parse JSON', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ status: 'OK' }));

      const body = await client.getJson('https://maps.example.test/geocode/json', {
        provider: 'Google Geocoding',
        params: { address: 'Saint-Étienne', key: 'test-key' },
      });

      expect(body).toEqual({ status: 'OK' });
      const [url, init] = mockFetch.mock.calls[0];
      expect(String(url)).toBe(
        'https://maps.example.test/geocode/json?address=Saint-%C3%89tienne&key=test-key'
      );
      expect(init).toEqual({
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'User-Agent': 'skycast-test/1.0',
        },
      });
    });

    it('should log the provider and host but not the path', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}));

      await client.getJson('http://api.example.test/api/test-key/forecast.json', {
        provider: 'Weather Underground',
      });

      expect(logger.logUpstreamCall).toHaveBeenCalledWith(
        'Weather Underground',
        'api.example.test',
        200,
        expect.any(Number),
        expect.any(String)
      );
    });

    it('should throw TransportError on non-2xx responses', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 500, 'Internal Server Error'));

      const promise = client.getJson('http://api.example.test/x.json', {
        provider: 'Weather Underground',
      });

      await expect(promise).rejects.toBeInstanceOf(TransportError);
      await expect(promise).rejects.toMatchObject({
        details: { provider: 'Weather Underground', upstreamStatus: 500 },
      });
    });

    it('should throw TransportError on network failure', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      await expect(
        client.getJson('http://api.example.test/x.json', { provider: 'Weather Underground' })
      ).rejects.toMatchObject({
        message: 'Unable to reach Weather Underground.',
        details: { networkError: 'fetch failed' },
      });
    });

    it('should call fetch exactly once on failure', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 503, 'Service Unavailable'));

      await expect(
        client.getJson('http://api.example.test/x.json', { provider: 'Weather Underground' })
      ).rejects.toBeInstanceOf(TransportError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('getText()', () => {
    it('should return the body as text', async () => {
      mockFetch.mockResolvedValue(new Response('https://is.gd/abc123\n', { status: 200 }));

      const text = await client.getText('https://is.gd/create.php', {
        provider: 'is.gd',
        params: { format: 'simple', url: 'http://example.test/a?b=c' },
      });

      expect(text).toBe('https://is.gd/abc123\n');
      expect(String(mockFetch.mock.calls[0][0])).toBe(
        'https://is.gd/create.php?format=simple&url=http%3A%2F%2Fexample.test%2Fa%3Fb%3Dc'
      );
    });
  });
});
