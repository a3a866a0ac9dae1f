/**
 * Geocoder - free-text location to coordinates via the Google Geocoding API
 */

import { GeocodeError } from '../domain/errors.js';
import type { HttpClient } from '../domain/http-client.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import { GeocodeCandidateSchema, GeocodeResponseSchema, type Coordinates } from './schemas.js';

export const GEOCODE_API_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

export class Geocoder {
  private readonly http: HttpClient;
  private readonly baseUrl: string;

  constructor(http: HttpClient, baseUrl = GEOCODE_API_URL) {
    this.http = http;
    this.baseUrl = baseUrl;
  }

  /**
   * Resolve a location to the first candidate's coordinates
   *
   * @param regionBias - ccTLD code (e.g. "uk") used to favour one country
   * @throws GeocodeError when the provider status is not OK
   * @throws TransportError on HTTP or network failure
   */
  async resolve(location: string, apiKey: string, regionBias?: string): Promise<Coordinates> {
    const params: Record<string, string> = { address: location, key: apiKey };
    if (regionBias) {
      params.region = regionBias;
    }

    const body = GeocodeResponseSchema.parse(
      await this.http.getJson(this.baseUrl, { provider: 'Google Geocoding', params })
    );
    metrics.incrementGeocodeStatus(body.status);

    if (body.status !== 'OK') {
      logger.info('Geocoding failed', { location, status: body.status });
      throw new GeocodeError(body.status);
    }

    if (body.results.length === 0) {
      logger.info('Geocoding returned OK without results', { location });
      throw new GeocodeError('ZERO_RESULTS');
    }

    const first = GeocodeCandidateSchema.parse(body.results[0]);

    return {
      latitude: first.geometry.location.lat,
      longitude: first.geometry.location.lng,
    };
  }
}
