/**
 * Broadcast Hub
 *
 * Fans jam events out to every live connection watching that jam.
 *
 * - Subscribers are sharded by jam id: each jam has its own subscriber map
 *   and its own delivery chain, so a slow jam never delays another.
 * - Within one jam, events are delivered in the order publish() was called.
 * - Delivery is at-most-once and best-effort. A connection whose send fails
 *   or does not settle within `sendTimeoutMs` is logged, removed and closed;
 *   publish() itself never rejects. The closed client reconnects and
 *   refetches, which recovers the events it missed.
 *
 * Debug logging: Enable with DEBUG=jam:hub
 */

import createDebug from 'debug';
import type { JamEvent, JamId } from '../conductor/types';

const debug = createDebug('jam:hub');

/**
 * Anything that can receive a pushed frame (a Socket.IO socket adapter,
 * a test double, ...)
 */
export interface HubConnection {
  readonly id: string;
  send(event: JamEvent): void | Promise<void>;
  /** Called once when the hub drops the connection after a failed send */
  close(): void;
}

export interface SubscriptionHandle {
  readonly id: string;
  readonly jamId: JamId;
}

export interface PublishResult {
  delivered: number;
  failed: number;
}

export interface BroadcastHub {
  subscribe(jamId: JamId, connection: HubConnection): SubscriptionHandle;
  /** Safe to call repeatedly; returns whether anything was removed */
  unsubscribe(handle: SubscriptionHandle): boolean;
  publish(jamId: JamId, event: JamEvent): Promise<PublishResult>;
  /** Subscribers of one jam, or of all jams when omitted */
  subscriberCount(jamId?: JamId): number;
  /** Jams with at least one subscriber */
  activeJams(): JamId[];
  /** Resolves once every event published so far has been delivered or dropped */
  idle(): Promise<void>;
}

export interface BroadcastHubOptions {
  /** Upper bound for one connection's send; 0 disables the bound */
  sendTimeoutMs?: number;
}

interface JamShard {
  subscribers: Map<string, HubConnection>;
  /** Tail of this jam's delivery chain; keeps per-jam publish order */
  tail: Promise<void>;
}

export const DEFAULT_SEND_TIMEOUT_MS = 5000;

export function createBroadcastHub(options: BroadcastHubOptions = {}): BroadcastHub {
  const sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  const shards = new Map<JamId, JamShard>();
  /** Deliveries not yet finished, across all jams */
  const inFlight = new Set<Promise<void>>();
  let handleCounter = 0;

  function sendBounded(connection: HubConnection, event: JamEvent): Promise<void> {
    const sending = Promise.resolve().then(() => connection.send(event));
    if (sendTimeoutMs <= 0) return sending;

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`send timed out after ${sendTimeoutMs}ms`)), sendTimeoutMs);
    });
    return Promise.race([sending, expired]).finally(() => clearTimeout(timer));
  }

  function closeQuietly(connection: HubConnection): void {
    try {
      connection.close();
    } catch (err) {
      console.error(`[Hub] Closing connection ${connection.id} failed:`, err);
    }
  }

  function removeFromShard(jamId: JamId, handleId: string): boolean {
    const shard = shards.get(jamId);
    if (!shard) return false;

    const removed = shard.subscribers.delete(handleId);
    if (shard.subscribers.size === 0) {
      shards.delete(jamId);
    }
    return removed;
  }

  async function deliver(jamId: JamId, shard: JamShard, event: JamEvent): Promise<PublishResult> {
    const targets = Array.from(shard.subscribers.entries());

    const outcomes = await Promise.allSettled(
      targets.map(([, connection]) => sendBounded(connection, event))
    );

    let delivered = 0;
    let failed = 0;

    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        delivered++;
        return;
      }
      failed++;
      const [handleId, connection] = targets[index];
      console.error(`[Hub] Dropping connection ${connection.id} from jam ${jamId}:`, outcome.reason);
      if (removeFromShard(jamId, handleId)) {
        closeQuietly(connection);
      }
    });

    debug('%s -> jam %s: delivered=%d failed=%d', event.event, jamId, delivered, failed);
    return { delivered, failed };
  }

  return {
    subscribe(jamId: JamId, connection: HubConnection): SubscriptionHandle {
      let shard = shards.get(jamId);
      if (!shard) {
        shard = { subscribers: new Map(), tail: Promise.resolve() };
        shards.set(jamId, shard);
      }

      const handle: SubscriptionHandle = { id: `sub-${++handleCounter}`, jamId };
      shard.subscribers.set(handle.id, connection);

      debug('subscribe %s (%s) to jam %s, %d watching', handle.id, connection.id, jamId, shard.subscribers.size);
      return handle;
    },

    unsubscribe(handle: SubscriptionHandle): boolean {
      const removed = removeFromShard(handle.jamId, handle.id);
      if (removed) {
        debug('unsubscribe %s from jam %s', handle.id, handle.jamId);
      }
      return removed;
    },

    publish(jamId: JamId, event: JamEvent): Promise<PublishResult> {
      const shard = shards.get(jamId);
      if (!shard) {
        debug('%s -> jam %s: no subscribers', event.event, jamId);
        return Promise.resolve({ delivered: 0, failed: 0 });
      }

      const delivery = shard.tail.then(() => deliver(jamId, shard, event));
      const tail: Promise<void> = delivery.then(() => {
        inFlight.delete(tail);
      });
      shard.tail = tail;
      inFlight.add(tail);
      return delivery;
    },

    subscriberCount(jamId?: JamId): number {
      if (jamId !== undefined) {
        return shards.get(jamId)?.subscribers.size ?? 0;
      }
      let total = 0;
      for (const shard of shards.values()) {
        total += shard.subscribers.size;
      }
      return total;
    },

    activeJams(): JamId[] {
      return Array.from(shards.keys());
    },

    async idle(): Promise<void> {
      while (inFlight.size > 0) {
        await Promise.all(inFlight);
      }
    },
  };
}
