/**
 * Configuration management for the Skycast weather server
 * Loads and validates environment variables
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const UrlShortenerSchema = z.enum(['isgd', 'none']);

export interface ServerConfig {
  // Provider API keys. Absence is reported per command, not at startup.
  googleDevKey?: string;
  wundergroundApiKey?: string;

  // ccTLD region code (e.g. uk, nz) to bias geocoding results
  geocodeRegionBias?: string;

  // Server configuration
  port?: number;
  logLevel: z.infer<typeof LogLevelSchema>;
  urlShortener: z.infer<typeof UrlShortenerSchema>;

  // Server metadata
  serverName: string;
  serverVersion: string;

  // Saved locations database
  dbPath: string;
}

/**
 * Treat empty strings the same as unset variables
 */
function optionalEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(): ServerConfig {
  const logLevel = LogLevelSchema.safeParse(process.env.SKYCAST_LOG_LEVEL || 'info');
  if (!logLevel.success) {
    throw new Error(`Invalid SKYCAST_LOG_LEVEL: ${process.env.SKYCAST_LOG_LEVEL}`);
  }

  const urlShortener = UrlShortenerSchema.safeParse(process.env.SKYCAST_URL_SHORTENER || 'isgd');
  if (!urlShortener.success) {
    throw new Error(`Invalid SKYCAST_URL_SHORTENER: ${process.env.SKYCAST_URL_SHORTENER}`);
  }

  // Optional: HTTP transport port
  let port: number | undefined;
  const rawPort = optionalEnv('SKYCAST_PORT');
  if (rawPort) {
    port = parseInt(rawPort, 10);
    if (isNaN(port) || port <= 0 || port > 65535) {
      throw new Error(`Invalid SKYCAST_PORT: ${rawPort}`);
    }
  }

  return {
    googleDevKey: optionalEnv('GOOGLE_DEV_KEY'),
    wundergroundApiKey: optionalEnv('WUNDERGROUND_API_KEY'),
    geocodeRegionBias: optionalEnv('GEOCODE_REGION_BIAS'),
    port,
    logLevel: logLevel.data,
    urlShortener: urlShortener.data,
    serverName: 'skycast-weather',
    serverVersion: '0.1.0',
    dbPath: optionalEnv('SKYCAST_DB_PATH') || './data/weather.db',
  };
}

// Singleton config instance
let configInstance: ServerConfig | null = null;

/**
 * Get the current configuration (loads on first call)
 */
export function getConfig(): ServerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
