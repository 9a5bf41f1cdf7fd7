/**
 * Jam Feed Client
 *
 * Subscribes to a jam's push channel and keeps a local view fresh.
 * Events carry only hints (which song changed); on every event, and on
 * every (re)connect, the client calls `refetch` to reload the
 * authoritative state over HTTP. Missed events are therefore harmless.
 *
 * Reconnection is manual with exponential backoff (1s, 2s, 4s, ... capped
 * at 10s) and gives up after `maxReconnectAttempts` consecutive failures.
 */

import { io } from 'socket.io-client';
import { z } from 'zod';
import createDebug from 'debug';
import type { JamEvent, JamId } from '../conductor/types';
import { JAM_STATUSES } from '../conductor/types';

const debug = createDebug('jam:feed');

export type FeedState = 'idle' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

const MAX_BACKOFF_MS = 10000; // 10 seconds
const INITIAL_BACKOFF_MS = 1000; // 1 second
export const DEFAULT_MAX_RECONNECT_ATTEMPTS = 5;

/**
 * The slice of a Socket.IO client socket the feed needs
 */
export interface FeedSocket {
  onConnect(listener: () => void): void;
  onDisconnect(listener: (reason: string) => void): void;
  onConnectError(listener: (error: Error) => void): void;
  onMessage(listener: (frame: unknown) => void): void;
  close(): void;
}

export type FeedSocketFactory = (channelUrl: string) => FeedSocket;

export interface JamFeedOptions {
  /** Server base URL, e.g. http://localhost:4000 */
  url: string;
  jamId: JamId;
  /** Reload authoritative state; called on connect and after every event */
  refetch: () => void | Promise<void>;
  onEvent?: (event: JamEvent) => void;
  onStateChange?: (state: FeedState) => void;
  maxReconnectAttempts?: number;
  socketFactory?: FeedSocketFactory;
}

export interface JamFeed {
  readonly state: FeedState;
  readonly reconnectAttempts: number;
  connect(): void;
  close(): void;
}

const jamEventSchema = z.discriminatedUnion('event', [
  z.object({
    event: z.literal('vote_update'),
    data: z.object({ songId: z.string(), voteCount: z.number() }),
  }),
  z.object({
    event: z.literal('performance_update'),
    data: z.object({ songId: z.string(), attendeeId: z.string(), registered: z.boolean() }),
  }),
  z.object({
    event: z.literal('song_added'),
    data: z.object({ songId: z.string() }),
  }),
  z.object({
    event: z.literal('attendee_registered'),
    data: z.object({ attendeeId: z.string(), name: z.string() }),
  }),
  z.object({
    event: z.literal('song_played'),
    data: z.object({ songId: z.string() }),
  }),
  z.object({
    event: z.literal('jam_status'),
    data: z.object({ status: z.enum(JAM_STATUSES) }),
  }),
]);

/**
 * Exponential backoff for the given zero-based attempt
 */
export function getBackoffDelay(attempt: number): number {
  return Math.min(INITIAL_BACKOFF_MS * Math.pow(2, attempt), MAX_BACKOFF_MS);
}

export function channelUrl(baseUrl: string, jamId: JamId): string {
  return `${baseUrl.replace(/\/+$/, '')}/ws/${jamId}`;
}

/**
 * Default factory: a real socket.io-client connection with its own
 * reconnection disabled (the feed schedules reconnects itself)
 */
export const socketIoFactory: FeedSocketFactory = (url) => {
  const socket = io(url, {
    transports: ['websocket', 'polling'],
    reconnection: false,
    forceNew: true,
  });

  return {
    onConnect: (listener) => {
      socket.on('connect', listener);
    },
    onDisconnect: (listener) => {
      socket.on('disconnect', (reason) => listener(reason));
    },
    onConnectError: (listener) => {
      socket.on('connect_error', listener);
    },
    onMessage: (listener) => {
      socket.on('message', (frame: unknown) => listener(frame));
    },
    close: () => {
      socket.disconnect();
    },
  };
};

export function createJamFeed(options: JamFeedOptions): JamFeed {
  const maxReconnectAttempts = options.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS;
  const socketFactory = options.socketFactory ?? socketIoFactory;
  const url = channelUrl(options.url, options.jamId);

  let state: FeedState = 'idle';
  let socket: FeedSocket | null = null;
  let reconnectAttempts = 0;
  let reconnectTimer: NodeJS.Timeout | null = null;
  let closed = false;

  function setState(next: FeedState): void {
    if (state === next) return;
    state = next;
    debug('jam %s feed %s', options.jamId, next);
    options.onStateChange?.(next);
  }

  function refetch(): void {
    Promise.resolve()
      .then(() => options.refetch())
      .catch((err: unknown) => {
        console.error('[Feed] Refetch failed:', err);
      });
  }

  function dropSocket(): void {
    if (socket) {
      socket.close();
      socket = null;
    }
  }

  function scheduleReconnect(): void {
    if (closed || reconnectTimer) return;

    if (reconnectAttempts >= maxReconnectAttempts) {
      console.error(`[Feed] Giving up on jam ${options.jamId} after ${reconnectAttempts} attempts`);
      setState('failed');
      return;
    }

    const delay = getBackoffDelay(reconnectAttempts);
    reconnectAttempts++;
    setState('reconnecting');
    console.log(`[Feed] Reconnecting in ${delay}ms (attempt ${reconnectAttempts}/${maxReconnectAttempts})`);

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      open();
    }, delay);
  }

  function open(): void {
    if (closed) return;
    dropSocket();

    if (reconnectAttempts === 0) {
      setState('connecting');
    }

    const current = socketFactory(url);
    socket = current;

    current.onConnect(() => {
      if (socket !== current) return;
      reconnectAttempts = 0;
      setState('connected');
      refetch();
    });

    current.onMessage((frame) => {
      if (socket !== current) return;
      const parsed = jamEventSchema.safeParse(frame);
      if (!parsed.success) {
        debug('ignoring malformed frame %o', frame);
        return;
      }
      options.onEvent?.(parsed.data);
      refetch();
    });

    current.onConnectError((error) => {
      if (socket !== current) return;
      console.error(`[Feed] Connection error for jam ${options.jamId}:`, error.message);
      dropSocket();
      scheduleReconnect();
    });

    current.onDisconnect((reason) => {
      if (socket !== current) return;
      console.log(`[Feed] Disconnected from jam ${options.jamId}: ${reason}`);
      socket = null;
      // Manual disconnects are not retried
      if (reason !== 'io client disconnect') {
        scheduleReconnect();
      }
    });
  }

  return {
    get state() {
      return state;
    },

    get reconnectAttempts() {
      return reconnectAttempts;
    },

    connect(): void {
      if (closed || socket || reconnectTimer) return;
      reconnectAttempts = 0;
      open();
    },

    close(): void {
      closed = true;
      if (reconnectTimer) {
        clearTimeout(reconnectTimer);
        reconnectTimer = null;
      }
      dropSocket();
      setState('idle');
    },
  };
}
