/**
 * Remote access server entry point.
 *
 * Loads configuration, starts telemetry, wires the runtime and serves the
 * Hono app. /health reports "starting" until the listener is up.
 */
import dotenv from 'dotenv';
dotenv.config();

import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig, validateConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { createRuntime } from './runtime';
import { initTelemetry } from './telemetry';

async function main() {
  const config = loadConfig();
  validateConfig(config);

  const telemetry = initTelemetry(config.telemetry, logger);
  const { pipelines } = await createRuntime(config, logger);

  let ready = false;
  const app = createApp({
    pipelines,
    logger,
    keepAliveMs: config.server.keepAliveMs,
    isReady: () => ready,
  });

  logger.info(`Marketing crew server starting on ${config.server.host}:${config.server.port}`);
  logger.info(`Environment: ${config.env}`);

  const server = serve(
    {
      fetch: app.fetch,
      port: config.server.port,
      hostname: config.server.host,
    },
    (info) => {
      ready = true;
      logger.info(`Marketing crew server running at http://localhost:${info.port}`);
      logger.info(`Health check: http://localhost:${info.port}/health`);
      logger.info(`SSE endpoint: http://localhost:${info.port}/sse`);
    }
  );

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    ready = false;
    server.close();
    await telemetry.shutdown();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, 'Fatal error starting server');
  process.exit(1);
});
