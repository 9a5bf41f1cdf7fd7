/**
 * Server assembly
 *
 * Wires persistence, the vote store, identity, the jam catalogue, the
 * broadcast hub and the mutation API into one HTTP server carrying both
 * the Express API and the Socket.IO push channel.
 */

import { createServer } from 'http';
import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import type { Express } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import type { ServerConfig } from './config';
import { createPersistence } from './persistence';
import type { PersistenceLayer } from './persistence';
import { createVoteStore } from './store';
import type { VoteStore } from './store';
import { createIdentityResolver } from './identity';
import { createJamService } from './jams';
import type { JamService } from './jams';
import { createBroadcastHub } from './hub';
import type { BroadcastHub } from './hub';
import { createMutationApi } from './mutations';
import type { MutationApi } from './mutations';
import { createApp } from './app';
import { setupSocketHandlers } from './socket';

export interface JamServer {
  app: Express;
  httpServer: HttpServer;
  io: SocketIOServer;
  hub: BroadcastHub;
  persistence: PersistenceLayer;
  store: VoteStore;
  jams: JamService;
  api: MutationApi;
  /** Defaults to config.port / config.host; port 0 picks a free port */
  listen(port?: number, host?: string): Promise<AddressInfo>;
  close(): Promise<void>;
}

export function createJamServer(config: ServerConfig): JamServer {
  console.log('[Server] Initializing persistence layer...');
  const persistence = createPersistence(config.dbPath, { busyTimeoutMs: config.dbBusyTimeoutMs });

  const store = createVoteStore(persistence, {
    maxPerformances: config.maxPerformances,
    maxRetries: config.storeMaxRetries,
  });
  const identity = createIdentityResolver(persistence, { maxRetries: config.storeMaxRetries });
  const jams = createJamService(persistence, { maxRetries: config.storeMaxRetries });
  const hub = createBroadcastHub({ sendTimeoutMs: config.broadcastSendTimeoutMs });
  const api = createMutationApi({ identity, store, jams, hub, timeoutMs: config.mutationTimeoutMs });

  const app = createApp({
    api,
    jams,
    identity,
    store,
    hub,
    managerToken: config.managerToken,
    corsOrigin: config.corsOrigin,
  });

  const httpServer = createServer(app);

  const io = new SocketIOServer(httpServer, {
    cors: { origin: config.corsOrigin },
    pingTimeout: config.socketPingTimeoutMs,
    pingInterval: config.socketPingIntervalMs,
    // Remove a jam's namespace once its last socket leaves
    cleanupEmptyChildNamespaces: true,
  });

  console.log('[Server] Setting up Socket.IO handlers...');
  setupSocketHandlers(io, hub, jams);

  let closed = false;

  return {
    app,
    httpServer,
    io,
    hub,
    persistence,
    store,
    jams,
    api,

    listen(port = config.port, host = config.host): Promise<AddressInfo> {
      return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(port, host, () => {
          httpServer.off('error', reject);
          const address = httpServer.address();
          if (address === null || typeof address === 'string') {
            reject(new Error(`Unexpected server address: ${String(address)}`));
            return;
          }
          resolve(address);
        });
      });
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;

      const wasListening = httpServer.listening;
      // io.close() disconnects every socket and closes the HTTP server
      await new Promise<void>((resolve, reject) => {
        io.close((err) => {
          if (err && wasListening) {
            reject(err);
            return;
          }
          resolve();
        });
      });

      persistence.close();
      console.log('[Server] Database closed');
    },
  };
}
