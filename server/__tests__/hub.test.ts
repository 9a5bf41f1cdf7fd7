/**
 * Broadcast Hub Tests
 *
 * Tests cover:
 * - Fan-out limited to the jam's subscribers
 * - Failed or hanging connections are dropped and closed without affecting others
 * - Idempotent unsubscribe
 * - Per-jam delivery order
 */

import { describe, test, expect, afterEach, jest } from '@jest/globals';
import { createBroadcastHub } from '../hub';
import type { HubConnection } from '../hub';
import type { JamEvent } from '@/conductor/types';

type Recorder = HubConnection & { received: JamEvent[]; closed: number };

function recorder(id: string, send?: (event: JamEvent) => void | Promise<void>): Recorder {
  const received: JamEvent[] = [];
  const connection: Recorder = {
    id,
    received,
    closed: 0,
    send(event) {
      if (send) return send(event);
      received.push(event);
      return undefined;
    },
    close() {
      connection.closed++;
    },
  };
  return connection;
}

function voteUpdate(songId: string, voteCount: number): JamEvent {
  return { event: 'vote_update', data: { songId, voteCount } };
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('Broadcast Hub', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('delivers only to subscribers of the published jam', async () => {
    const hub = createBroadcastHub();
    const a = recorder('a');
    const b = recorder('b');
    const c = recorder('c');
    hub.subscribe('jam-1', a);
    hub.subscribe('jam-1', b);
    hub.subscribe('jam-2', c);

    const result = await hub.publish('jam-1', voteUpdate('song-a', 1));

    expect(result).toEqual({ delivered: 2, failed: 0 });
    expect(a.received).toEqual([voteUpdate('song-a', 1)]);
    expect(b.received).toEqual([voteUpdate('song-a', 1)]);
    expect(c.received).toEqual([]);
  });

  test('publishing to a jam nobody watches is a no-op', async () => {
    const hub = createBroadcastHub();

    expect(await hub.publish('jam-1', voteUpdate('song-a', 1))).toEqual({ delivered: 0, failed: 0 });
  });

  test('a failing connection is dropped and the rest still receive', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const hub = createBroadcastHub();
    const healthy = recorder('healthy');
    const broken = recorder('broken', () => {
      throw new Error('socket closed');
    });
    hub.subscribe('jam-1', broken);
    hub.subscribe('jam-1', healthy);

    const first = await hub.publish('jam-1', voteUpdate('song-a', 1));
    const second = await hub.publish('jam-1', voteUpdate('song-a', 2));

    expect(first).toEqual({ delivered: 1, failed: 1 });
    expect(second).toEqual({ delivered: 1, failed: 0 });
    expect(healthy.received).toHaveLength(2);
    expect(hub.subscriberCount('jam-1')).toBe(1);
    expect(broken.closed).toBe(1);
    expect(healthy.closed).toBe(0);
  });

  test('a connection that never settles times out and is dropped', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const hub = createBroadcastHub({ sendTimeoutMs: 20 });
    const healthy = recorder('healthy');
    const stuck = recorder('stuck', () => new Promise<void>(() => undefined));
    hub.subscribe('jam-1', stuck);
    hub.subscribe('jam-1', healthy);

    const result = await hub.publish('jam-1', voteUpdate('song-a', 1));

    expect(result).toEqual({ delivered: 1, failed: 1 });
    expect(hub.subscriberCount('jam-1')).toBe(1);
    expect(stuck.closed).toBe(1);
  });

  test('an error while closing a dropped connection is logged', async () => {
    const errors = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const hub = createBroadcastHub();
    hub.subscribe('jam-1', {
      id: 'stubborn',
      send() {
        throw new Error('socket closed');
      },
      close() {
        throw new Error('already gone');
      },
    });

    const result = await hub.publish('jam-1', voteUpdate('song-a', 1));

    expect(result).toEqual({ delivered: 0, failed: 1 });
    expect(errors).toHaveBeenLastCalledWith('[Hub] Closing connection stubborn failed:', new Error('already gone'));
  });

  test('idle waits for queued deliveries to finish', async () => {
    const hub = createBroadcastHub();
    const slow: Recorder = recorder('slow', async event => {
      await delay(20);
      slow.received.push(event);
    });
    hub.subscribe('jam-1', slow);

    const pending = hub.publish('jam-1', voteUpdate('song-a', 1));
    const queued = hub.publish('jam-1', voteUpdate('song-a', 2));
    await hub.idle();

    expect(slow.received).toEqual([voteUpdate('song-a', 1), voteUpdate('song-a', 2)]);
    await expect(Promise.all([pending, queued])).resolves.toEqual([
      { delivered: 1, failed: 0 },
      { delivered: 1, failed: 0 },
    ]);
  });

  test('unsubscribe is idempotent and empties the shard', () => {
    const hub = createBroadcastHub();
    const handle = hub.subscribe('jam-1', recorder('a'));

    expect(hub.activeJams()).toEqual(['jam-1']);
    expect(hub.unsubscribe(handle)).toBe(true);
    expect(hub.unsubscribe(handle)).toBe(false);
    expect(hub.subscriberCount()).toBe(0);
    expect(hub.activeJams()).toEqual([]);
  });

  test('unsubscribing one handle leaves the same connection subscribed elsewhere', async () => {
    const hub = createBroadcastHub();
    const a = recorder('a');
    const first = hub.subscribe('jam-1', a);
    hub.subscribe('jam-2', a);

    hub.unsubscribe(first);
    await hub.publish('jam-1', voteUpdate('song-a', 1));
    await hub.publish('jam-2', voteUpdate('song-b', 1));

    expect(a.received).toEqual([voteUpdate('song-b', 1)]);
    expect(hub.subscriberCount()).toBe(1);
  });

  test('events reach a connection in publish order even when sends are slow', async () => {
    const hub = createBroadcastHub();
    const received: number[] = [];
    const delays = [30, 0, 10];
    let call = 0;

    hub.subscribe('jam-1', recorder('slow', async event => {
      const wait = delays[call++] ?? 0;
      await delay(wait);
      if (event.event === 'vote_update') {
        received.push(event.data.voteCount);
      }
    }));

    await Promise.all([
      hub.publish('jam-1', voteUpdate('song-a', 1)),
      hub.publish('jam-1', voteUpdate('song-a', 2)),
      hub.publish('jam-1', voteUpdate('song-a', 3)),
    ]);

    expect(received).toEqual([1, 2, 3]);
  });

  test('counts subscribers per jam and in total', () => {
    const hub = createBroadcastHub();
    hub.subscribe('jam-1', recorder('a'));
    hub.subscribe('jam-1', recorder('b'));
    hub.subscribe('jam-2', recorder('c'));

    expect(hub.subscriberCount('jam-1')).toBe(2);
    expect(hub.subscriberCount('jam-3')).toBe(0);
    expect(hub.subscriberCount()).toBe(3);
  });
});
