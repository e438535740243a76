import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Logger } from './logger';
import { McpDispatcher, SessionRegistry } from './mcp';
import { errorHandler } from './middleware/errorHandler';
import type { Pipelines } from './pipelines';
import { createHealthRoutes } from './routes/health';
import { createMcpRoutes } from './routes/mcp';

export const SERVICE_NAME = 'marketing-crew';

export interface AppDeps {
  pipelines: Pipelines;
  logger: Logger;
  keepAliveMs: number;
  isReady?: () => boolean;
  sessions?: SessionRegistry;
}

export function createApp({ pipelines, logger, keepAliveMs, isReady = () => true, sessions }: AppDeps) {
  const app = new Hono();
  const dispatcher = new McpDispatcher({ pipelines, logger, serverName: SERVICE_NAME });

  // Remote clients connect from anywhere
  app.use('*', cors({ origin: '*', allowMethods: ['GET', 'POST', 'OPTIONS'], allowHeaders: ['*'] }));
  app.onError(errorHandler);

  app.route('/health', createHealthRoutes({ service: SERVICE_NAME, isReady }));
  app.route(
    '/',
    createMcpRoutes({ dispatcher, sessions: sessions ?? new SessionRegistry(), keepAliveMs, logger })
  );

  return app;
}
