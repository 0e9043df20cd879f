#!/usr/bin/env node
/**
 * Stedsnavn OSM MCP Server
 * Entry point for the Model Context Protocol server
 */

import { getConfig } from './config/env.js';
import { logger } from './domain/logger.js';
import { startHttpServer } from './transport/http.js';
import { startStdioServer } from './transport/stdio.js';

async function main(): Promise<void> {
  const config = getConfig();

  logger.setLevel(config.logLevel);

  logger.info('Starting Stedsnavn OSM MCP Server', {
    version: config.serverVersion,
    logLevel: config.logLevel,
    sourceMode: config.sourceMode,
  });

  if (config.port !== undefined) {
    logger.info('Using HTTP transport', { port: config.port });
    const listener = await startHttpServer(config);

    const shutdown = () => {
      logger.info('Shutdown signal received, closing HTTP listener...');
      listener.close(() => process.exit(0));
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } else {
    logger.info('Using stdio transport');
    const server = await startStdioServer(config);

    const shutdown = async () => {
      logger.info('Shutdown signal received, closing server...');
      try {
        await server.close();
        logger.info('Server closed successfully');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  }

  process.on('uncaughtException', (error: Error) => {
    logger.logError(error, { context: 'uncaughtException' });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    process.exit(1);
  });

  logger.info('Stedsnavn OSM MCP Server is ready');
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    logger.logError(error, { context: 'startup' });
  } else {
    logger.error('Unknown error during startup', { error: String(error) });
  }
  process.exit(1);
});
