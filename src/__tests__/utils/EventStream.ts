/**
 * SSE test reader.
 *
 * Parses Server-Sent Events from a fetch Response body, one event at a time.
 */

export interface SSEMessage {
  event: string;
  data: string;
}

function parseBlock(block: string): SSEMessage {
  let event = 'message';
  const data: string[] = [];
  for (const line of block.split('\n')) {
    if (line.startsWith('event:')) {
      event = line.slice('event:'.length).trim();
    } else if (line.startsWith('data:')) {
      data.push(line.slice('data:'.length).replace(/^ /, ''));
    }
  }
  return { event, data: data.join('\n') };
}

export function openEventStream(response: Response) {
  if (!response.body) {
    throw new Error('Response has no body');
  }
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  async function next(): Promise<SSEMessage> {
    for (;;) {
      const end = buffer.indexOf('\n\n');
      if (end !== -1) {
        const block = buffer.slice(0, end);
        buffer = buffer.slice(end + 2);
        return parseBlock(block);
      }
      const { done, value } = await reader.read();
      if (done) {
        throw new Error('Event stream ended');
      }
      buffer += decoder.decode(value, { stream: true });
    }
  }

  /** Next event with the given name, skipping others (keep-alive pings) */
  async function nextOf(event: string): Promise<SSEMessage> {
    for (;;) {
      const message = await next();
      if (message.event === event) return message;
    }
  }

  async function close(): Promise<void> {
    await reader.cancel();
  }

  return { next, nextOf, close };
}

export type EventStream = ReturnType<typeof openEventStream>;
