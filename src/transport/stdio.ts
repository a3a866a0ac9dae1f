/**
 * Stdio transport for the Skycast weather server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../domain/logger.js';
import type { ServerConfig } from '../config/env.js';
import { createMcpServer } from '../server.js';
import type { WeatherPipeline } from '../weather/pipeline.js';

/**
 * Start the MCP server with stdio transport
 */
export async function startStdioServer(
  config: ServerConfig,
  pipeline: WeatherPipeline
): Promise<McpServer> {
  logger.info('Initializing MCP server with stdio transport');

  const server = createMcpServer(config, pipeline);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('MCP server connected via stdio transport');

  return server;
}
