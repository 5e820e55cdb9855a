// This test suite verifies session allocation, lookup, removal, and shutdown behavior of the session directory.

import { describe, expect, it } from 'vitest';
import { SessionDirectory } from '../src/mcp/session-directory.js';
import { silentLogger } from './helpers/fixtures.js';

describe('session directory', () => {
  it('creates sessions with distinct uuid identifiers and bounded queues', () => {
    const directory = new SessionDirectory({ queueCapacity: 4, logger: silentLogger() });
    const first = directory.create();
    const second = directory.create();

    expect(first.id).not.toBe(second.id);
    expect(first.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first.queue.capacity).toBe(4);
    expect(directory.size).toBe(2);
  });

  it('looks up live sessions and returns undefined for unknown ids', () => {
    const directory = new SessionDirectory({ queueCapacity: 1 });
    const session = directory.create();

    expect(directory.lookup(session.id)).toBe(session);
    expect(directory.lookup('missing')).toBeUndefined();
  });

  it('retries id generation on collision', () => {
    const ids = ['dup', 'dup', 'fresh'];
    const directory = new SessionDirectory({
      queueCapacity: 1,
      generateId: () => ids.shift() ?? 'exhausted'
    });

    expect(directory.create().id).toBe('dup');
    expect(directory.create().id).toBe('fresh');
  });

  it('closes the queue when a session is removed', async () => {
    const directory = new SessionDirectory({ queueCapacity: 2 });
    const session = directory.create();
    const pending = session.queue.next();

    expect(directory.remove(session.id)).toBe(true);
    expect(directory.remove(session.id)).toBe(false);
    expect(directory.lookup(session.id)).toBeUndefined();
    await expect(pending).resolves.toBeNull();
    expect(session.queue.push('late')).toBe('closed');
  });

  it('keeps instances isolated from each other', () => {
    const left = new SessionDirectory({ queueCapacity: 1 });
    const right = new SessionDirectory({ queueCapacity: 1 });
    const session = left.create();

    expect(right.lookup(session.id)).toBeUndefined();
  });

  it('closes every session on closeAll', () => {
    const directory = new SessionDirectory({ queueCapacity: 1 });
    const sessions = [directory.create(), directory.create(), directory.create()];

    directory.closeAll();
    expect(directory.size).toBe(0);
    expect(sessions.every((session) => session.queue.isClosed)).toBe(true);
  });
});
