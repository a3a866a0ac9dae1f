/**
 * Zod schemas for the provider payloads and the normalized weather record
 */

import { z } from 'zod';

/**
 * Coordinates produced by the geocoder
 */
export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Google Geocoding API response (only the fields used here)
 *
 * Candidates stay unchecked: only the first one is ever read.
 */
export const GeocodeResponseSchema = z.object({
  status: z.string(),
  results: z.array(z.unknown()).default([]),
});

export const GeocodeCandidateSchema = z.object({
  geometry: z.object({
    location: z.object({
      lat: z.number(),
      lng: z.number(),
    }),
  }),
});

/** Weather Underground sends numbers and numeric strings interchangeably */
const DisplayValue = z.union([z.string(), z.number()]);

const TemperatureSchema = z.object({
  fahrenheit: DisplayValue,
  celsius: DisplayValue,
});

export const ForecastDaySchema = z.object({
  conditions: z.string(),
  high: TemperatureSchema,
  low: TemperatureSchema,
});

export type ForecastDay = z.infer<typeof ForecastDaySchema>;

export const CurrentObservationSchema = z.object({
  display_location: z.object({
    full: z.string(),
  }),
  weather: z.string(),
  temp_f: DisplayValue,
  temp_c: DisplayValue,
  relative_humidity: DisplayValue,
  wind_kph: DisplayValue,
  wind_mph: DisplayValue,
  wind_dir: z.string(),
  ob_url: z.string(),
  forecast_url: z.string(),
});

export type CurrentObservation = z.infer<typeof CurrentObservationSchema>;

/**
 * Envelope checked first: a provider error object short-circuits everything else
 */
export const WundergroundEnvelopeSchema = z.object({
  response: z.object({
    error: z
      .object({
        type: z.string().optional(),
        description: z.string(),
      })
      .optional(),
  }),
});

export const ForecastListSchema = z.object({
  forecast: z.object({
    simpleforecast: z.object({
      // Days after tomorrow are never read
      forecastday: z.array(z.unknown()),
    }),
  }),
});

export const ObservationBlockSchema = z.object({
  current_observation: CurrentObservationSchema,
});

/**
 * Flat weather record consumed by the presenter
 */
export const NormalizedWeatherSchema = z.object({
  place: z.string(),
  conditions: z.string(),
  temp_f: DisplayValue,
  temp_c: DisplayValue,
  humidity: DisplayValue,
  wind_kph: DisplayValue,
  wind_mph: DisplayValue,
  wind_direction: z.string(),
  today_conditions: z.string(),
  today_high_f: DisplayValue,
  today_high_c: DisplayValue,
  today_low_f: DisplayValue,
  today_low_c: DisplayValue,
  tomorrow_conditions: z.string(),
  tomorrow_high_f: DisplayValue,
  tomorrow_high_c: DisplayValue,
  tomorrow_low_f: DisplayValue,
  tomorrow_low_c: DisplayValue,
  url: z.string(),
});

export type NormalizedWeather = z.infer<typeof NormalizedWeatherSchema>;
