/**
 * English and French renderings for everything the commands say
 */

import type { ApiProvider, DomainError, KnownGeocodeStatus } from '../domain/errors.js';

export type Language = 'en' | 'fr';

/** Weather Underground language codes */
export const PROVIDER_LANGUAGE_CODES: Record<Language, string> = {
  en: 'EN',
  fr: 'FR',
};

export const FORECAST_UNAVAILABLE = 'Unable to retrieve forecast data.';
export const FORECAST_UNAVAILABLE_FR = 'Impossible de récupérer les données météorologiques.';

export const COMMAND_USAGE: Record<Language, string> = {
  en: '<location> - Gets weather data for <location>.',
  fr: '<lieu> - Quel temps fait-il à <lieu>?',
};

const GEOCODE_MESSAGES: Record<KnownGeocodeStatus, Record<Language, string>> = {
  REQUEST_DENIED: {
    en: 'The geocode API is off in the Google Developers Console.',
    fr: "L'API de géocodage est désactivée dans la console des développeurs Google.",
  },
  ZERO_RESULTS: {
    en: 'No results found.',
    fr: "Aucun resultat n'a été trouvé.",
  },
  OVER_QUERY_LIMIT: {
    en: 'The geocode API quota has run out.',
    fr: 'Le quota de API de géocodage est épuisé.',
  },
  UNKNOWN_ERROR: {
    en: 'Unknown Error.',
    fr: 'Quelque chose a mal tourné.',
  },
  INVALID_REQUEST: {
    en: 'Invalid Request.',
    fr: 'Il y a eu une demande invalide.',
  },
};

function isKnownStatus(status: string): status is KnownGeocodeStatus {
  return Object.prototype.hasOwnProperty.call(GEOCODE_MESSAGES, status);
}

/**
 * Quote a raw status the way it is echoed back: single quotes, or double
 * quotes when the status holds a single quote and no double quote
 */
function quote(value: string): string {
  const escaped = value.replace(/\\/g, '\\\\');
  if (escaped.includes("'") && !escaped.includes('"')) {
    return `"${escaped}"`;
  }
  return `'${escaped.replace(/'/g, "\\'")}'`;
}

export function renderGeocodeStatus(status: string, language: Language): string {
  if (isKnownStatus(status)) {
    return GEOCODE_MESSAGES[status][language];
  }
  return language === 'fr' ? `La France a été trahie! ${quote(status)}` : quote(status);
}

export function renderMissingApiKey(provider: ApiProvider, language: Language): string {
  return language === 'fr'
    ? `Cette commande nécessite une clé API ${provider}.`
    : `This command requires a ${provider} API key.`;
}

/**
 * Render a domain error in the caller's language
 */
export function render(error: DomainError, language: Language): string {
  switch (error.kind) {
    case 'geocode':
      return renderGeocodeStatus(error.status, language);
    case 'missing-api-key':
      return renderMissingApiKey(error.provider, language);
  }
}

/**
 * Localize a terminal message from the weather provider.
 *
 * The fetcher only ever produces the English forecast-unavailable text, so the
 * French command swaps it by exact string match. Provider error descriptions
 * pass through untouched.
 */
export function localizeTerminalMessage(message: string, language: Language): string {
  if (language === 'fr' && message === FORECAST_UNAVAILABLE) {
    return FORECAST_UNAVAILABLE_FR;
  }
  return message;
}
