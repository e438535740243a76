/**
 * Registry of open SSE sessions.
 *
 * A session is created when a client opens GET /sse and removed when the
 * stream closes. Responses to POSTed messages are delivered through the
 * session's send function.
 */
import { randomUUID } from 'node:crypto';
import type { JsonRpcResponse } from './protocol';

export type SendFn = (message: JsonRpcResponse) => Promise<void>;

export interface Session {
  id: string;
  send: SendFn;
  openedAt: Date;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  open(send: SendFn): Session {
    const session: Session = { id: randomUUID(), send, openedAt: new Date() };
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  close(id: string): void {
    this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
