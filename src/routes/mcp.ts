/**
 * Remote tool protocol over SSE.
 *
 * GET /sse opens a session. The first event ("endpoint") tells the client
 * where to POST its JSON-RPC messages; responses come back on the same
 * stream as "message" events. Keep-alive "ping" events are sent while the
 * session is open.
 *
 * POST /messages/?sessionId=... answers 202 immediately and dispatches in
 * the background, since a pipeline run can take minutes.
 */
import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { McpDispatcher } from '../mcp/dispatcher';
import { jsonRpcMessageSchema } from '../mcp/protocol';
import type { SessionRegistry } from '../mcp/sessions';

export const MESSAGES_PATH = '/messages/';

export interface McpRoutesOptions {
  dispatcher: McpDispatcher;
  sessions: SessionRegistry;
  keepAliveMs: number;
  logger: Logger;
}

export function createMcpRoutes({ dispatcher, sessions, keepAliveMs, logger }: McpRoutesOptions) {
  const app = new Hono();
  const log = logger.child({ component: 'sse' });

  app.get('/sse', (c) => {
    return streamSSE(
      c,
      async (stream) => {
        const session = sessions.open(async (message) => {
          await stream.writeSSE({ event: 'message', data: JSON.stringify(message) });
        });

        // Resolves when the client disconnects
        let resolveClosed: () => void = () => undefined;
        const closed = new Promise<void>((resolve) => {
          resolveClosed = resolve;
        });

        const keepAlive = setInterval(() => {
          stream.writeSSE({ event: 'ping', data: '' }).catch((error: unknown) => {
            log.debug({ sessionId: session.id, error: errorMessage(error) }, 'Keep-alive failed');
          });
        }, keepAliveMs);
        keepAlive.unref();

        stream.onAbort(() => {
          clearInterval(keepAlive);
          resolveClosed();
        });

        log.info({ sessionId: session.id, open: sessions.size }, 'SSE session opened');
        try {
          await stream.writeSSE({ event: 'endpoint', data: `${MESSAGES_PATH}?sessionId=${session.id}` });
          await closed;
        } finally {
          clearInterval(keepAlive);
          sessions.close(session.id);
          log.info({ sessionId: session.id }, 'SSE session closed');
        }
      },
      async (error) => {
        log.error({ error: error.message }, 'SSE stream error');
      }
    );
  });

  const handleMessage = async (c: Context) => {
    const sessionId = c.req.query('sessionId');
    if (!sessionId) {
      return c.json({ error: 'sessionId is required' }, 400);
    }

    const session = sessions.get(sessionId);
    if (!session) {
      return c.json({ error: 'Session not found' }, 404);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Invalid JSON' }, 400);
    }

    const parsed = jsonRpcMessageSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid JSON-RPC message' }, 400);
    }

    const message = parsed.data;
    void dispatcher
      .handle(message)
      .then(async (response) => {
        if (response) await session.send(response);
      })
      .catch((error: unknown) => {
        log.error({ sessionId, method: message.method, error: errorMessage(error) }, 'Failed to deliver response');
      });

    return c.text('Accepted', 202);
  };

  app.post('/messages', handleMessage);
  app.post(MESSAGES_PATH, handleMessage);

  return app;
}
