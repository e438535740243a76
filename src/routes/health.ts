import { Hono } from 'hono';
import { REMOTE_TOOL_NAMES, type RemoteToolName } from '../mcp/tools';

export interface HealthResponse {
  status: 'ok';
  service: string;
  tools: readonly RemoteToolName[];
  timestamp: string;
}

export interface HealthOptions {
  service: string;
  /** False until startup has completed */
  isReady: () => boolean;
}

export function createHealthRoutes({ service, isReady }: HealthOptions) {
  const app = new Hono();

  app.get('/', (c) => {
    if (!isReady()) {
      return c.json({ status: 'starting' }, 503);
    }

    const response: HealthResponse = {
      status: 'ok',
      service,
      tools: REMOTE_TOOL_NAMES,
      timestamp: new Date().toISOString(),
    };

    return c.json(response);
  });

  return app;
}
