// This module tracks live SSE sessions and their outbound queues for the lifetime of each stream.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { SessionQueue } from './session-queue.js';

export interface Session {
  id: string;
  queue: SessionQueue;
  createdAt: string;
}

export interface SessionDirectoryOptions {
  queueCapacity: number;
  logger?: FastifyBaseLogger;
  generateId?: () => string;
}

// This class maps session ids to queues; one instance is injected per server so tests stay isolated.
export class SessionDirectory {
  private readonly sessions = new Map<string, Session>();
  private readonly queueCapacity: number;
  private readonly generateId: () => string;
  private readonly logger?: FastifyBaseLogger;

  public constructor(options: SessionDirectoryOptions) {
    this.queueCapacity = options.queueCapacity;
    this.generateId = options.generateId ?? randomUUID;
    this.logger = options.logger?.child({
      component: 'session_directory'
    });
  }

  public get size(): number {
    return this.sessions.size;
  }

  // This method allocates one session with a fresh unguessable id and an empty bounded queue.
  public create(): Session {
    let id = this.generateId();
    while (this.sessions.has(id)) {
      id = this.generateId();
    }

    const session: Session = {
      id,
      queue: new SessionQueue(this.queueCapacity),
      createdAt: new Date().toISOString()
    };

    this.sessions.set(id, session);
    this.logger?.debug(
      {
        event: 'mcp_session_created',
        sessionId: id,
        activeSessions: this.sessions.size
      },
      'mcp_session_created'
    );

    return session;
  }

  public lookup(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  // This method deregisters a session and closes its queue so late producers see a closed queue.
  public remove(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }

    this.sessions.delete(id);
    session.queue.close();
    this.logger?.debug(
      {
        event: 'mcp_session_removed',
        sessionId: id,
        activeSessions: this.sessions.size
      },
      'mcp_session_removed'
    );

    return true;
  }

  // This method ends every open stream loop, used when the server shuts down.
  public closeAll(): void {
    for (const id of [...this.sessions.keys()]) {
      this.remove(id);
    }
  }
}
