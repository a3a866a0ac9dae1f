/**
 * HTTP transport for the Skycast weather server
 * Handles communication via HTTP using StreamableHTTPServerTransport
 */

import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import type { ServerConfig } from '../config/env.js';
import { createMcpServer } from '../server.js';
import type { WeatherPipeline } from '../weather/pipeline.js';

/**
 * Start the MCP server with HTTP transport
 * Uses Express + StreamableHTTPServerTransport in stateless mode
 */
export async function startHttpServer(config: ServerConfig, pipeline: WeatherPipeline): Promise<void> {
  const port = config.port;
  if (!port) {
    throw new Error('SKYCAST_PORT must be set for HTTP transport');
  }

  logger.info('Initializing MCP server with HTTP transport', { port });

  // One server (and one saved-location cache) shared by every request
  const server: McpServer = createMcpServer(config, pipeline);

  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', transport: 'http' });
  });

  app.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(metrics.exportPrometheus());
  });

  // Stateless mode: a fresh transport per request so JSON-RPC ids from
  // different clients never collide
  app.post('/mcp', async (req, res) => {
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        transport.close().catch((error: unknown) => {
          logger.warn('Error closing MCP transport', { error: String(error) });
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', { error: String(error) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: 'Internal server error',
          },
          id: null,
        });
      }
    }
  });

  app.listen(port, () => {
    logger.info('MCP server listening on HTTP transport', {
      port,
      endpoint: `http://localhost:${port}/mcp`,
      health: `http://localhost:${port}/health`,
      metrics: `http://localhost:${port}/metrics`,
    });
  }).on('error', (error) => {
    logger.error('HTTP server error', { error: String(error) });
    process.exit(1);
  });
}
