/**
 * WeatherFetcher - current conditions and two-day forecast from Weather Underground
 */

import type { HttpClient } from '../domain/http-client.js';
import { logger } from '../domain/logger.js';
import { FORECAST_UNAVAILABLE } from '../i18n/messages.js';
import {
  ForecastDaySchema,
  ForecastListSchema,
  ObservationBlockSchema,
  WundergroundEnvelopeSchema,
  type Coordinates,
  type CurrentObservation,
  type NormalizedWeather,
} from './schemas.js';
import type { UrlShortener } from './url-shortener.js';

export const WUNDERGROUND_API_URL = 'http://api.wunderground.com/api';

/** Marks an observation URL that does not point at a specific station */
export const PLACEHOLDER_URL_MARKER = '?query=,';

/**
 * Result of a fetch: the normalized record, or a terminal message for the user
 */
export type FetchResult =
  | { kind: 'weather'; weather: NormalizedWeather }
  | { kind: 'message'; message: string };

export function formatCoordinates(coordinates: Coordinates): string {
  return `${coordinates.latitude},${coordinates.longitude}`;
}

export function buildForecastUrl(
  apiKey: string,
  languageCode: string,
  coordinates: Coordinates,
  baseUrl = WUNDERGROUND_API_URL
): string {
  return `${baseUrl}/${apiKey}/forecast/lang:${languageCode}/geolookup/conditions/q/${formatCoordinates(coordinates)}.json`;
}

/**
 * Prefer the station observation URL unless it is the generic placeholder
 */
export function selectDisplayUrl(observation: Pick<CurrentObservation, 'ob_url' | 'forecast_url'>): string {
  if (observation.ob_url.includes(PLACEHOLDER_URL_MARKER)) {
    return observation.forecast_url;
  }
  return observation.ob_url;
}

export class WeatherFetcher {
  private readonly http: HttpClient;
  private readonly shortener: UrlShortener;
  private readonly baseUrl: string;

  constructor(http: HttpClient, shortener: UrlShortener, baseUrl = WUNDERGROUND_API_URL) {
    this.http = http;
    this.shortener = shortener;
    this.baseUrl = baseUrl;
  }

  /**
   * @param languageCode - Weather Underground language code (EN, FR)
   * @throws TransportError on HTTP or network failure
   */
  async fetch(coordinates: Coordinates, languageCode: string, apiKey: string): Promise<FetchResult> {
    const url = buildForecastUrl(apiKey, languageCode, coordinates, this.baseUrl);
    const body = await this.http.getJson(url, { provider: 'Weather Underground' });

    const envelope = WundergroundEnvelopeSchema.parse(body);
    if (envelope.response.error) {
      logger.info('Weather provider reported an error', {
        type: envelope.response.error.type,
        description: envelope.response.error.description,
      });
      return { kind: 'message', message: envelope.response.error.description };
    }

    const days = ForecastListSchema.parse(body).forecast.simpleforecast.forecastday;
    if (days.length < 2) {
      logger.info('Weather provider returned no usable forecast', {
        coordinates: formatCoordinates(coordinates),
        days: days.length,
      });
      return { kind: 'message', message: FORECAST_UNAVAILABLE };
    }
    const [today, tomorrow] = days.slice(0, 2).map(day => ForecastDaySchema.parse(day));

    const observation = ObservationBlockSchema.parse(body).current_observation;

    const weather: NormalizedWeather = {
      place: observation.display_location.full,
      conditions: observation.weather,
      temp_f: observation.temp_f,
      temp_c: observation.temp_c,
      humidity: observation.relative_humidity,
      wind_kph: observation.wind_kph,
      wind_mph: observation.wind_mph,
      wind_direction: observation.wind_dir,
      today_conditions: today.conditions,
      today_high_f: today.high.fahrenheit,
      today_high_c: today.high.celsius,
      today_low_f: today.low.fahrenheit,
      today_low_c: today.low.celsius,
      tomorrow_conditions: tomorrow.conditions,
      tomorrow_high_f: tomorrow.high.fahrenheit,
      tomorrow_high_c: tomorrow.high.celsius,
      tomorrow_low_f: tomorrow.low.fahrenheit,
      tomorrow_low_c: tomorrow.low.celsius,
      url: await this.shortener.tryShorten(selectDisplayUrl(observation)),
    };

    return { kind: 'weather', weather };
  }
}
