/**
 * Socket.IO Push Channel
 *
 * One dynamic namespace per jam: clients connect to `/ws/<jamId>` and
 * receive every event published for that jam as a `message` frame shaped
 * `{ event, data }`. The channel is push-only; all mutations go through
 * the HTTP API.
 *
 * Connection liveness is Socket.IO's own ping/pong (pingInterval and
 * pingTimeout on the server). A dropped socket is unsubscribed from the
 * hub on `disconnect`; a socket the hub gives up on is disconnected so the
 * client reconnects and refetches.
 */

import type { Server as SocketIOServer } from 'socket.io';
import type { BroadcastHub } from './hub';
import type { JamService } from './jams';
import { isJamError } from '../conductor/errors';

/** Namespace pattern for per-jam channels */
export const JAM_CHANNEL_PATTERN = /^\/ws\/[^/]+$/;

const CHANNEL_PREFIX = '/ws/';

export function jamIdFromNamespace(name: string): string {
  return name.startsWith(CHANNEL_PREFIX) ? name.slice(CHANNEL_PREFIX.length) : name;
}

/**
 * Setup Socket.IO handlers for the per-jam push channel
 *
 * @param io - Socket.IO server instance
 * @param hub - Broadcast hub the sockets subscribe to
 * @param jams - Used to reject channels for jams that do not exist
 */
export function setupSocketHandlers(
  io: SocketIOServer,
  hub: BroadcastHub,
  jams: Pick<JamService, 'getJam'>
): void {
  const channels = io.of(JAM_CHANNEL_PATTERN);

  channels.use((socket, next) => {
    const jamId = jamIdFromNamespace(socket.nsp.name);
    try {
      jams.getJam(jamId);
      next();
    } catch (err) {
      if (!isJamError(err)) {
        console.error(`[Socket] Channel lookup failed for jam ${jamId}:`, err);
      }
      next(new Error(isJamError(err) ? err.code : 'INTERNAL'));
    }
  });

  channels.on('connection', (socket) => {
    const jamId = jamIdFromNamespace(socket.nsp.name);
    console.log(`[Socket] Client connected: ${socket.id} (jam ${jamId})`);

    const handle = hub.subscribe(jamId, {
      id: socket.id,
      send(event) {
        if (!socket.connected) {
          throw new Error('socket closed');
        }
        socket.send(event);
      },
      close() {
        socket.disconnect(true);
      },
    });

    socket.on('disconnect', (reason) => {
      hub.unsubscribe(handle);
      console.log(`[Socket] Client disconnected: ${socket.id} (jam ${jamId}, ${reason})`);
    });
  });
}
