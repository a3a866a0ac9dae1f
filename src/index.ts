#!/usr/bin/env node
/**
 * Skycast weather server
 * Entry point for the Model Context Protocol server
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getConfig } from './config/env.js';
import { logger } from './domain/logger.js';
import { createPipeline, shutdownServer } from './server.js';
import { LocationDB } from './store/location-db.js';
import { startStdioServer } from './transport/stdio.js';
import { startHttpServer } from './transport/http.js';

async function main() {
  try {
    const config = getConfig();

    logger.setLevel(config.logLevel);

    logger.info('Starting Skycast weather server', {
      version: config.serverVersion,
      logLevel: config.logLevel,
      urlShortener: config.urlShortener,
      regionBias: config.geocodeRegionBias,
    });

    const store = new LocationDB(config.dbPath);
    const pipeline = createPipeline(config, store);

    let server: McpServer | undefined;
    if (config.port) {
      logger.info('Using HTTP transport', { port: config.port });
      await startHttpServer(config, pipeline);
    } else {
      logger.info('Using stdio transport');
      server = await startStdioServer(config, pipeline);
    }

    const shutdown = async () => {
      logger.info('Shutdown signal received, closing server...');
      try {
        await shutdownServer(store, server);
        logger.info('Server closed successfully');
        process.exit(0);
      } catch (error) {
        logger.logError(error, { context: 'shutdown' });
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    process.on('uncaughtException', (error: Error) => {
      logger.logError(error, { context: 'uncaughtException' });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.logError(reason, { context: 'unhandledRejection' });
      process.exit(1);
    });

    logger.info('Skycast weather server is ready');
  } catch (error) {
    logger.logError(error, { context: 'startup' });
    process.exit(1);
  }
}

void main();
