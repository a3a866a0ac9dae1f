/**
 * WeatherPipeline - API key check, saved location, geocode, fetch, remember
 */

import { MissingApiKeyError } from '../domain/errors.js';
import { logger } from '../domain/logger.js';
import { PROVIDER_LANGUAGE_CODES, type Language } from '../i18n/messages.js';
import type { LocationStore } from '../store/types.js';
import type { Geocoder } from './geocoder.js';
import type { LocationCache } from './location-cache.js';
import type { NormalizedWeather } from './schemas.js';
import type { WeatherFetcher } from './weather-fetcher.js';

export interface PipelineKeys {
  googleDevKey?: string;
  wundergroundApiKey?: string;
  geocodeRegionBias?: string;
}

export interface PipelineDeps {
  cache: LocationCache;
  store: LocationStore;
  geocoder: Geocoder;
  fetcher: WeatherFetcher;
  keys: PipelineKeys;
}

export interface LookupRequest {
  /** Free-text location; empty means "use my saved location" */
  text: string;
  userId: string;
  language: Language;
  /** Called once when no text was given and nothing is saved for the user */
  onNoLocation: () => void;
}

export type LookupOutcome =
  | { kind: 'weather'; weather: NormalizedWeather }
  | { kind: 'message'; message: string }
  | { kind: 'no-location' };

export class WeatherPipeline {
  private readonly deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  /**
   * @throws MissingApiKeyError before any other work when a key is absent
   * @throws GeocodeError from the geocoder, unmodified
   * @throws TransportError on upstream failure
   */
  async lookup(request: LookupRequest): Promise<LookupOutcome> {
    const { cache, store, geocoder, fetcher, keys } = this.deps;

    if (!keys.wundergroundApiKey) {
      throw new MissingApiKeyError('Weather Underground');
    }
    if (!keys.googleDevKey) {
      throw new MissingApiKeyError('Google Developers Console');
    }

    const text = request.text.trim();
    let location: string;
    if (text) {
      location = text;
    } else {
      const saved = cache.get(request.userId);
      if (!saved) {
        logger.debug('No saved location', { nick: request.userId });
        request.onNoLocation();
        return { kind: 'no-location' };
      }
      location = saved;
    }

    const coordinates = await geocoder.resolve(location, keys.googleDevKey, keys.geocodeRegionBias);

    const result = await fetcher.fetch(
      coordinates,
      PROVIDER_LANGUAGE_CODES[request.language],
      keys.wundergroundApiKey
    );
    if (result.kind === 'message') {
      return result;
    }

    if (text) {
      cache.set(request.userId, location, store);
    }

    return result;
  }
}
