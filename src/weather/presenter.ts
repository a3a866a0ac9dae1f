/**
 * Presenter - one-line weather reply in English or French
 *
 * \x02 toggles bold in IRC clients.
 */

import { MissingFieldError } from '../domain/errors.js';
import type { Language } from '../i18n/messages.js';
import type { NormalizedWeather } from './schemas.js';

export const WEATHER_TEMPLATES: Record<Language, string> = {
  en:
    '{place} - \x02Current:\x02 {conditions}, ' +
    '{temp_f}F/{temp_c}C, {humidity}, ' +
    'Wind: {wind_mph}MPH/{wind_kph}KPH {wind_direction}, ' +
    '\x02Today:\x02 {today_conditions}, ' +
    'High: {today_high_f}F/{today_high_c}C, ' +
    'Low: {today_low_f}F/{today_low_c}C. ' +
    '\x02Tomorrow:\x02 {tomorrow_conditions}, ' +
    'High: {tomorrow_high_f}F/{tomorrow_high_c}C, ' +
    'Low: {tomorrow_low_f}F/{tomorrow_low_c}C - {url}',
  fr:
    '{place} - \x02Actuelle:\x02 {conditions}, ' +
    '{temp_f}F/{temp_c}C, {humidity}, ' +
    'Vent: {wind_mph}MPH/{wind_kph}KPH {wind_direction}, ' +
    "\x02Aujourd'hui:\x02 {today_conditions}, " +
    'Haute: {today_high_f}F/{today_high_c}C, ' +
    'Basse: {today_low_f}F/{today_low_c}C. ' +
    '\x02Demain:\x02 {tomorrow_conditions}, ' +
    'Haute: {tomorrow_high_f}F/{tomorrow_high_c}C, ' +
    'Basse: {tomorrow_low_f}F/{tomorrow_low_c}C - {url}',
};

/**
 * Substitute `{field}` placeholders; throws MissingFieldError on any gap
 */
export function fillTemplate(
  template: string,
  values: Readonly<Record<string, string | number | undefined>>
): string {
  return template.replace(/\{(\w+)\}/g, (_match, field: string) => {
    const value = Object.prototype.hasOwnProperty.call(values, field) ? values[field] : undefined;
    if (value === undefined) {
      throw new MissingFieldError(field);
    }
    return String(value);
  });
}

export function formatWeather(weather: NormalizedWeather, language: Language): string {
  return fillTemplate(WEATHER_TEMPLATES[language], weather);
}
