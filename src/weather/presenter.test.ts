/**
 * Unit tests for the weather line presenter
 */

import { describe, it, expect } from 'vitest';
import { fillTemplate, formatWeather } from './presenter.js';
import { MissingFieldError } from '../domain/errors.js';
import type { NormalizedWeather } from './schemas.js';

const WEATHER: NormalizedWeather = {
  place: 'Paris, France',
  conditions: 'Partly Cloudy',
  temp_f: 64.4,
  temp_c: 18,
  humidity: '68%',
  wind_kph: 15,
  wind_mph: 9.3,
  wind_direction: 'WSW',
  today_conditions: 'Chance of Rain',
  today_high_f: '68',
  today_high_c: '20',
  today_low_f: '54',
  today_low_c: '12',
  tomorrow_conditions: 'Clear',
  tomorrow_high_f: '72',
  tomorrow_high_c: '22',
  tomorrow_low_f: '57',
  tomorrow_low_c: '14',
  url: 'https://is.gd/Wx42ab',
};

describe('formatWeather', () => {
  it('should render the English line', () => {
    expect(formatWeather(WEATHER, 'en')).toBe(
      'Paris, France - \x02Current:\x02 Partly Cloudy, 64.4F/18C, 68%, ' +
        'Wind: 9.3MPH/15KPH WSW, \x02Today:\x02 Chance of Rain, High: 68F/20C, Low: 54F/12C. ' +
        '\x02Tomorrow:\x02 Clear, High: 72F/22C, Low: 57F/14C - https://is.gd/Wx42ab'
    );
  });

  it('should render the French line', () => {
    expect(formatWeather(WEATHER, 'fr')).toBe(
      'Paris, France - \x02Actuelle:\x02 Partly Cloudy, 64.4F/18C, 68%, ' +
        "Vent: 9.3MPH/15KPH WSW, \x02Aujourd'hui:\x02 Chance of Rain, Haute: 68F/20C, Basse: 54F/12C. " +
        '\x02Demain:\x02 Clear, Haute: 72F/22C, Basse: 57F/14C - https://is.gd/Wx42ab'
    );
  });

  it('should not interpret placeholders inside values', () => {
    const line = formatWeather({ ...WEATHER, place: '{url}' }, 'en');

    expect(line.startsWith('{url} - ')).toBe(true);
  });
});

describe('fillTemplate', () => {
  it('should throw MissingFieldError for an absent field', () => {
    expect(() => fillTemplate('{place} {humidity}', { place: 'Paris' })).toThrow(
      new MissingFieldError('humidity')
    );
  });

  it('should throw for a field that is present but undefined', () => {
    expect(() => fillTemplate('{url}', { url: undefined })).toThrow(MissingFieldError);
  });

  it('should keep zero values', () => {
    expect(fillTemplate('{temp_c}C', { temp_c: 0 })).toBe('0C');
  });
});
