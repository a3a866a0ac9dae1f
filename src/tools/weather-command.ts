/**
 * weather / meteo command handlers
 * English and French front ends over the same lookup pipeline
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isDomainError } from '../domain/errors.js';
import { logger } from '../domain/logger.js';
import { buildCommandReply, buildErrorReply } from '../domain/response-builder.js';
import {
  COMMAND_USAGE,
  localizeTerminalMessage,
  render,
  type Language,
} from '../i18n/messages.js';
import type { WeatherPipeline } from '../weather/pipeline.js';
import { formatWeather } from '../weather/presenter.js';

/**
 * Tool input schema shared by both commands
 */
export const WeatherCommandInputSchema = z.object({
  nick: z
    .string()
    .min(1, 'Nick must not be empty')
    .max(64, 'Nick too long')
    .describe('Caller identifier; the last location used is remembered per nick'),
  location: z
    .string()
    .max(200, 'Location too long')
    .default('')
    .describe('Free-text location (e.g. "Paris", "10001"). Empty to use the saved location.'),
});

export type WeatherCommandInput = z.infer<typeof WeatherCommandInputSchema>;

export const WEATHER_COMMAND_DESCRIPTIONS: Record<Language, string> = {
  en: `${COMMAND_USAGE.en} Current conditions plus today's and tomorrow's forecast.`,
  fr: `${COMMAND_USAGE.fr} Conditions actuelles et prévisions pour aujourd'hui et demain.`,
};

/**
 * Run one weather command in the given language
 */
export async function handleWeatherCommand(
  input: WeatherCommandInput,
  pipeline: WeatherPipeline,
  language: Language
): Promise<CallToolResult> {
  let notice: string | undefined;

  try {
    const outcome = await pipeline.lookup({
      text: input.location,
      userId: input.nick,
      language,
      onNoLocation: () => {
        notice = COMMAND_USAGE[language];
      },
    });

    switch (outcome.kind) {
      case 'no-location':
        return buildCommandReply(notice ?? COMMAND_USAGE[language]);
      case 'message':
        return buildCommandReply(localizeTerminalMessage(outcome.message, language));
      case 'weather':
        return buildCommandReply(formatWeather(outcome.weather, language), {
          weather: outcome.weather,
        });
    }
  } catch (error) {
    if (isDomainError(error)) {
      logger.info('Weather command failed', { kind: error.kind, language });
      const details =
        error.kind === 'geocode' ? { status: error.status } : { provider: error.provider };
      return buildErrorReply(render(error, language), error.kind, details);
    }
    throw error;
  }
}
