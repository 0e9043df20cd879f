/**
 * HTTP transport for the Stedsnavn OSM server
 * Serves MCP over StreamableHTTPServerTransport in stateless mode
 */

import express from 'express';
import type { Server } from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import type { ServerConfig } from '../config/env.js';
import { createMcpServer } from '../server.js';

/**
 * Build the express app around one MCP server instance
 */
export function createHttpApp(server: McpServer, config: ServerConfig): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', transport: 'http', sourceMode: config.sourceMode });
  });

  app.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(metrics.exportPrometheus());
  });

  app.post('/mcp', async (req, res) => {
    // One transport per request: clients may reuse JSON-RPC ids
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        transport.close().catch((error: unknown) => {
          logger.warn('Error closing MCP transport', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', {
        error: error instanceof Error ? error.message : String(error),
      });
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

  return app;
}

/**
 * Start the MCP server with HTTP transport on the configured port
 */
export async function startHttpServer(config: ServerConfig): Promise<Server> {
  const port = config.port;
  if (port === undefined) {
    throw new Error('SSR_MCP_PORT must be set for HTTP transport');
  }

  logger.info('Initializing MCP server with HTTP transport', { port });

  const app = createHttpApp(createMcpServer(config), config);

  return new Promise((resolve, reject) => {
    const listener = app
      .listen(port, () => {
        logger.info('MCP server listening on HTTP transport', {
          port,
          endpoint: `http://localhost:${port}/mcp`,
          health: `http://localhost:${port}/health`,
          metrics: `http://localhost:${port}/metrics`,
        });
        resolve(listener);
      })
      .on('error', reject);
  });
}
