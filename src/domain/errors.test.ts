/**
 * Unit tests for the error types
 */

import { describe, it, expect } from 'vitest';
import {
  GeocodeError,
  MissingApiKeyError,
  MissingFieldError,
  TransportError,
  isDomainError,
} from './errors.js';

describe('errors', () => {
  it('should keep the payload of each error as a field', () => {
    expect(new GeocodeError('OVER_QUERY_LIMIT')).toMatchObject({
      kind: 'geocode',
      status: 'OVER_QUERY_LIMIT',
      message: 'The geocode API quota has run out.',
    });
    expect(new MissingApiKeyError('Weather Underground')).toMatchObject({
      kind: 'missing-api-key',
      provider: 'Weather Underground',
      name: 'MissingApiKeyError',
    });
    expect(new MissingFieldError('url')).toMatchObject({ kind: 'missing-field', field: 'url' });
    expect(
      new TransportError('Unable to reach Weather Underground.', {
        provider: 'Weather Underground',
        networkError: 'fetch failed',
      }).details
    ).toEqual({ provider: 'Weather Underground', networkError: 'fetch failed' });
  });

  it('should treat only geocode and missing-key errors as domain errors', () => {
    expect(isDomainError(new GeocodeError('ZERO_RESULTS'))).toBe(true);
    expect(isDomainError(new MissingApiKeyError('Google Developers Console'))).toBe(true);
    expect(isDomainError(new TransportError('down', { provider: 'Google Geocoding' }))).toBe(false);
    expect(isDomainError(new MissingFieldError('place'))).toBe(false);
  });
});
