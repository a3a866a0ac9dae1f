/**
 * Shared MCP server factory
 * Wires the lookup pipeline and registers the weather commands as tools.
 * Used by both stdio and HTTP transports.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from './domain/logger.js';
import type { ServerConfig } from './config/env.js';
import { HttpClient } from './domain/http-client.js';
import { wrapTool } from './domain/tool-wrapper.js';
import type { Language } from './i18n/messages.js';
import type { LocationStore } from './store/types.js';
import {
  WEATHER_COMMAND_DESCRIPTIONS,
  WeatherCommandInputSchema,
  handleWeatherCommand,
} from './tools/weather-command.js';
import { Geocoder } from './weather/geocoder.js';
import { LocationCache } from './weather/location-cache.js';
import { WeatherPipeline } from './weather/pipeline.js';
import { IsgdShortener, PassthroughShortener } from './weather/url-shortener.js';
import { WeatherFetcher } from './weather/weather-fetcher.js';

/** Tool name and language of every registered command */
export const WEATHER_COMMANDS: ReadonlyArray<{ name: string; language: Language }> = [
  { name: 'weather', language: 'en' },
  { name: 'meteo', language: 'fr' },
];

/**
 * Build the pipeline and load saved locations from the store
 */
export function createPipeline(config: ServerConfig, store: LocationStore): WeatherPipeline {
  const http = new HttpClient(`${config.serverName}/${config.serverVersion}`);
  const shortener =
    config.urlShortener === 'isgd' ? new IsgdShortener(http) : new PassthroughShortener();

  const cache = new LocationCache();
  cache.load(store);
  logger.info('Saved locations loaded', { count: cache.size });

  if (!config.wundergroundApiKey || !config.googleDevKey) {
    logger.warn('Weather API keys missing; commands will answer with a configuration message', {
      hasWundergroundKey: !!config.wundergroundApiKey,
      hasGoogleKey: !!config.googleDevKey,
    });
  }

  return new WeatherPipeline({
    cache,
    store,
    geocoder: new Geocoder(http),
    fetcher: new WeatherFetcher(http, shortener),
    keys: {
      googleDevKey: config.googleDevKey,
      wundergroundApiKey: config.wundergroundApiKey,
      geocodeRegionBias: config.geocodeRegionBias,
    },
  });
}

/**
 * Create and configure the MCP server with the weather commands
 * Returns the configured server (not yet connected to any transport)
 */
export function createMcpServer(config: ServerConfig, pipeline: WeatherPipeline): McpServer {
  logger.info('Creating MCP server', {
    serverName: config.serverName,
    serverVersion: config.serverVersion,
  });

  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  for (const command of WEATHER_COMMANDS) {
    server.registerTool(
      command.name,
      {
        description: WEATHER_COMMAND_DESCRIPTIONS[command.language],
        inputSchema: WeatherCommandInputSchema.shape,
      },
      wrapTool(command.name, async (args: unknown) => {
        const input = WeatherCommandInputSchema.parse(args);
        return handleWeatherCommand(input, pipeline, command.language);
      })
    );

    logger.debug('Registered weather command', { name: command.name, language: command.language });
  }

  logger.info('MCP server created successfully', { tools: WEATHER_COMMANDS.length });

  return server;
}

/**
 * Close the MCP server (when one is connected) and then the location store
 */
export async function shutdownServer(store: { close(): void }, server?: McpServer): Promise<void> {
  if (server) {
    await server.close();
  }
  store.close();
  logger.info('Location store closed');
}
