/**
 * Shared fixtures for server tests: an in-memory database seeded with one
 * jam and a small queue.
 */

import { createPersistence } from '../persistence';
import type { PersistenceLayer } from '../persistence';
import type { Attendee, JamId, Song } from '@/conductor/types';
import type { ServerConfig } from '../config';

export const JAM_ID = 'jam-1';
export const SEEDED_AT = '2024-01-01T00:00:00.000Z';

export const SONGS: Song[] = [
  { id: 'song-a', title: 'Autumn Leaves', artist: 'Kosma' },
  { id: 'song-b', title: 'Blue Bossa', artist: 'Dorham' },
  { id: 'song-c', title: 'Cantaloupe Island', artist: 'Hancock' },
  { id: 'song-d', title: 'Doxy', artist: 'Rollins' },
];

export function createTestPersistence(): PersistenceLayer {
  return createPersistence(':memory:');
}

export function seedJam(persistence: PersistenceLayer, jamId: JamId = JAM_ID, songs: Song[] = SONGS): void {
  persistence.insertJam({
    id: jamId,
    name: 'Test Jam',
    slug: jamId,
    venue: null,
    jamDate: null,
    status: 'waiting',
    createdAt: SEEDED_AT,
  });

  for (const song of songs) {
    if (!persistence.getSong(song.id)) {
      persistence.insertSong(song);
    }
    persistence.insertJamSong(jamId, song.id, SEEDED_AT);
  }
}

export function seedAttendee(
  persistence: PersistenceLayer,
  id: string,
  name: string,
  sessionId: string,
  jamId: JamId = JAM_ID
): Attendee {
  const attendee: Attendee = { id, jamId, name, sessionId, registeredAt: SEEDED_AT };
  persistence.insertAttendee(attendee);
  return attendee;
}

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    dataDir: ':memory:',
    dbPath: ':memory:',
    maxPerformances: 3,
    storeMaxRetries: 3,
    dbBusyTimeoutMs: 1000,
    mutationTimeoutMs: 5000,
    broadcastSendTimeoutMs: 1000,
    managerToken: 'test-secret',
    corsOrigin: '*',
    socketPingIntervalMs: 15000,
    socketPingTimeoutMs: 5000,
    ...overrides,
  };
}
