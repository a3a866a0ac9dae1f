/**
 * Error types for the weather lookup core
 *
 * Domain errors (GeocodeError, MissingApiKeyError) carry only their payload.
 * Localized text comes from render() in i18n/messages.ts; the default
 * `message` is the English rendering.
 */

import { renderGeocodeStatus, renderMissingApiKey } from '../i18n/messages.js';

/** Provider status codes with a dedicated message */
export const KNOWN_GEOCODE_STATUSES = [
  'REQUEST_DENIED',
  'ZERO_RESULTS',
  'OVER_QUERY_LIMIT',
  'UNKNOWN_ERROR',
  'INVALID_REQUEST',
] as const;

export type KnownGeocodeStatus = (typeof KNOWN_GEOCODE_STATUSES)[number];

export type ApiProvider = 'Weather Underground' | 'Google Developers Console';

/**
 * Raised when the geocoding API answers with a status other than OK
 */
export class GeocodeError extends Error {
  readonly kind = 'geocode';
  readonly status: string;

  constructor(status: string) {
    super(renderGeocodeStatus(status, 'en'));
    this.name = 'GeocodeError';
    this.status = status;
  }
}

/**
 * Raised before any work when a provider API key is not configured
 */
export class MissingApiKeyError extends Error {
  readonly kind = 'missing-api-key';
  readonly provider: ApiProvider;

  constructor(provider: ApiProvider) {
    super(renderMissingApiKey(provider, 'en'));
    this.name = 'MissingApiKeyError';
    this.provider = provider;
  }
}

export type DomainError = GeocodeError | MissingApiKeyError;

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof GeocodeError || error instanceof MissingApiKeyError;
}

/**
 * Upstream HTTP or network failure. Never retried and never localized.
 */
export interface TransportErrorDetails {
  provider: string;
  upstreamStatus?: number;
  requestId?: string;
  networkError?: string;
}

export class TransportError extends Error {
  readonly kind = 'transport';
  readonly details: TransportErrorDetails;

  constructor(message: string, details: TransportErrorDetails) {
    super(message);
    this.name = 'TransportError';
    this.details = details;
  }
}

/**
 * A formatted template referenced a field the record does not carry.
 * This is a pipeline defect, not a user error.
 */
export class MissingFieldError extends Error {
  readonly kind = 'missing-field';
  readonly field: string;

  constructor(field: string) {
    super(`Weather record is missing field "${field}"`);
    this.name = 'MissingFieldError';
    this.field = field;
  }
}
