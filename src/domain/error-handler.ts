/**
 * Transport error mapping for upstream providers
 */

import { TransportError } from './errors.js';
import { logger } from './logger.js';

/**
 * Describe an HTTP status from an upstream provider
 *
 * @param status - HTTP status code from upstream
 * @returns Short human-readable reason
 */
export function describeHttpStatus(status: number): string {
  if (status === 400 || status === 404) {
    return 'rejected the request';
  }
  if (status === 401 || status === 403) {
    return 'refused the credentials';
  }
  if (status === 429) {
    return 'is rate limiting requests';
  }
  if (status >= 500) {
    return 'is currently unavailable';
  }
  return 'answered unexpectedly';
}

/**
 * Handle a non-2xx HTTP response
 *
 * @param provider - Provider label (e.g. "Google Geocoding")
 * @param status - HTTP status code
 * @param statusText - HTTP status text
 * @param requestId - Optional request ID for tracking
 */
export function handleHttpError(
  provider: string,
  status: number,
  statusText: string,
  requestId?: string
): TransportError {
  logger.warn('HTTP error from upstream', {
    provider,
    status,
    statusText,
    requestId,
  });

  return new TransportError(
    `${provider} ${describeHttpStatus(status)} (HTTP ${status} ${statusText})`,
    { provider, upstreamStatus: status, requestId }
  );
}

/**
 * Handle network errors (connection refused, DNS failure, etc.)
 */
export function handleNetworkError(
  provider: string,
  error: Error,
  requestId?: string
): TransportError {
  logger.error('Network error calling upstream', {
    provider,
    error: error.message,
    requestId,
  });

  return new TransportError(`Unable to reach ${provider}.`, {
    provider,
    requestId,
    networkError: error.message,
  });
}
