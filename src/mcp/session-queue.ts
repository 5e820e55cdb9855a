// This module implements the bounded per-session outbound queue consumed by one SSE stream.

import { AppError } from '../utils/errors.js';

// This type reports what happened to one pushed message so producers can log drops.
export type PushOutcome = 'queued' | 'full' | 'closed';

type Waiter = (message: string | null) => void;

// This class buffers serialized JSON-RPC messages for a single consumer and many producers.
// Overflow policy: when the buffer is full the newest message is rejected and earlier ones are kept.
export class SessionQueue {
  public readonly capacity: number;
  private readonly buffer: string[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  public constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new AppError(500, 'invalid_queue_capacity', `Session queue capacity must be a positive integer, got ${capacity}.`);
    }

    this.capacity = capacity;
  }

  public get size(): number {
    return this.buffer.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  // This method hands a message straight to a waiting consumer, or buffers it while capacity remains.
  public push(message: string): PushOutcome {
    if (this.closed) {
      return 'closed';
    }

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(message);
      return 'queued';
    }

    if (this.buffer.length >= this.capacity) {
      return 'full';
    }

    this.buffer.push(message);
    return 'queued';
  }

  // This method resolves with the next message, or null once the queue is closed or the signal aborts.
  public next(signal?: AbortSignal): Promise<string | null> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }

    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    if (this.waiter) {
      throw new AppError(500, 'queue_consumer_busy', 'Session queue already has a pending consumer.');
    }

    return new Promise<string | null>((resolve) => {
      const onAbort = (): void => {
        if (this.waiter === settle) {
          this.waiter = null;
        }
        resolve(null);
      };

      const settle: Waiter = (message) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(message);
      };

      this.waiter = settle;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  // This method discards buffered messages and releases a waiting consumer.
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.buffer.length = 0;

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(null);
    }
  }
}
