/**
 * Persistence Layer Tests
 *
 * Tests cover:
 * - Database initialization on a file (schema applied twice is harmless)
 * - Jam, song and queue rows
 * - Vote uniqueness enforced by the schema
 * - Claiming anonymous votes
 * - Performer listings
 * - Transaction atomicity
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import { createPersistence } from '../persistence';
import type { PersistenceLayer, NewVote } from '../persistence';
import type { ActorKey } from '@/conductor/types';
import { JAM_ID, SEEDED_AT, createTestPersistence, seedAttendee, seedJam } from './fixtures';

function vote(songId: string, actorKey: ActorKey, id = `${songId}-${actorKey}`): NewVote {
  return {
    id,
    jamId: JAM_ID,
    songId,
    actorKey,
    attendeeId: null,
    sessionId: null,
    votedAt: SEEDED_AT,
  };
}

describe('Persistence Layer', () => {
  describe('file database', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'jam-persistence-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test('creates the database and reopens it with data intact', () => {
      const dbPath = join(dir, 'jams.db');

      const first = createPersistence(dbPath);
      seedJam(first);
      first.close();

      expect(existsSync(dbPath)).toBe(true);

      const second = createPersistence(dbPath);
      expect(second.getJam(JAM_ID)?.name).toBe('Test Jam');
      expect(second.listJamSongs(JAM_ID)).toHaveLength(4);
      second.close();
    });
  });

  describe('in-memory database', () => {
    let persistence: PersistenceLayer;

    beforeEach(() => {
      persistence = createTestPersistence();
      seedJam(persistence);
    });

    afterEach(() => {
      persistence.close();
    });

    test('round-trips a jam and finds it by slug', () => {
      const jam = persistence.getJam(JAM_ID);

      expect(jam).toEqual({
        id: JAM_ID,
        name: 'Test Jam',
        slug: JAM_ID,
        venue: null,
        jamDate: null,
        status: 'waiting',
        createdAt: SEEDED_AT,
      });
      expect(persistence.getJamBySlug(JAM_ID)?.id).toBe(JAM_ID);
      expect(persistence.getJam('missing')).toBeNull();
    });

    test('lists slugs sharing a prefix', () => {
      seedJam(persistence, 'jam-1-2', []);
      seedJam(persistence, 'other', []);

      expect(persistence.slugsStartingWith('jam-1').sort()).toEqual(['jam-1', 'jam-1-2']);
    });

    test('updates jam status', () => {
      expect(persistence.setJamStatus(JAM_ID, 'playing')).toBe(true);
      expect(persistence.getJam(JAM_ID)?.status).toBe('playing');
      expect(persistence.setJamStatus('missing', 'playing')).toBe(false);
    });

    test('queue rows carry vote counts', () => {
      persistence.insertVote(vote('song-b', 'session:s1'));
      persistence.insertVote(vote('song-b', 'session:s2'));
      persistence.insertVote(vote('song-c', 'session:s1'));

      const counts = Object.fromEntries(
        persistence.listJamSongs(JAM_ID).map(song => [song.songId, song.voteCount])
      );
      expect(counts).toEqual({ 'song-a': 0, 'song-b': 2, 'song-c': 1, 'song-d': 0 });
    });

    test('marks a song played', () => {
      expect(persistence.markSongPlayed(JAM_ID, 'song-a', '2024-01-01T21:00:00.000Z')).toBe(true);

      const entry = persistence.listJamSongs(JAM_ID).find(song => song.songId === 'song-a');
      expect(entry?.played).toBe(true);
      expect(entry?.playedAt).toBe('2024-01-01T21:00:00.000Z');
      expect(persistence.markSongPlayed(JAM_ID, 'not-in-jam', SEEDED_AT)).toBe(false);
    });

    test('a second vote by the same actor violates the unique key', () => {
      persistence.insertVote(vote('song-a', 'session:s1', 'v1'));

      let caught: unknown;
      try {
        persistence.insertVote(vote('song-a', 'session:s1', 'v2'));
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(Database.SqliteError);
      expect(caught instanceof Database.SqliteError ? caught.code : null).toBe('SQLITE_CONSTRAINT_UNIQUE');
      expect(persistence.countVotes(JAM_ID, 'song-a')).toBe(1);
    });

    test('votes for songs outside the jam are rejected', () => {
      expect(() => persistence.insertVote(vote('not-in-jam', 'session:s1'))).toThrow(Database.SqliteError);
    });

    test('deleteVote reports whether a row was removed', () => {
      persistence.insertVote(vote('song-a', 'session:s1'));

      expect(persistence.deleteVote(JAM_ID, 'song-a', 'session:s1')).toBe(true);
      expect(persistence.deleteVote(JAM_ID, 'song-a', 'session:s1')).toBe(false);
      expect(persistence.hasVote(JAM_ID, 'song-a', 'session:s1')).toBe(false);
    });

    test('claimVotes re-keys session votes and drops duplicates', () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');
      persistence.insertVote(vote('song-a', 'session:sess-1'));
      persistence.insertVote(vote('song-b', 'session:sess-1'));
      persistence.insertVote(vote('song-b', 'attendee:att-1'));

      const result = persistence.claimVotes(JAM_ID, 'session:sess-1', 'attendee:att-1', 'att-1');

      expect(result).toEqual({ claimed: 1, droppedSongIds: ['song-b'] });
      expect(persistence.votedSongIds(JAM_ID, 'session:sess-1')).toEqual([]);
      expect(persistence.votedSongIds(JAM_ID, 'attendee:att-1').sort()).toEqual(['song-a', 'song-b']);
      expect(persistence.countVotes(JAM_ID, 'song-b')).toBe(1);
    });

    test('performers are listed in registration order and grouped by song', () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');
      seedAttendee(persistence, 'att-2', 'Bob', 'sess-2');
      persistence.insertRegistration({
        id: 'r1', jamId: JAM_ID, songId: 'song-a', attendeeId: 'att-2', instrument: 'Bass', registeredAt: SEEDED_AT,
      });
      persistence.insertRegistration({
        id: 'r2', jamId: JAM_ID, songId: 'song-a', attendeeId: 'att-1', instrument: 'Piano', registeredAt: SEEDED_AT,
      });
      persistence.insertRegistration({
        id: 'r3', jamId: JAM_ID, songId: 'song-c', attendeeId: 'att-1', instrument: 'Piano', registeredAt: SEEDED_AT,
      });

      expect(persistence.listPerformers(JAM_ID, 'song-a').map(p => p.name)).toEqual(['Bob', 'Alice']);
      expect(persistence.countRegistrations(JAM_ID, 'att-1')).toBe(2);
      expect(persistence.listRegistrations(JAM_ID, 'att-1').map(r => r.songId)).toEqual(['song-a', 'song-c']);

      const bySong = persistence.listPerformersByJam(JAM_ID);
      expect(Array.from(bySong.keys())).toEqual(['song-a', 'song-c']);
      expect(bySong.get('song-c')).toEqual([
        { attendeeId: 'att-1', name: 'Alice', instrument: 'Piano', registeredAt: SEEDED_AT },
      ]);
    });

    test('transaction rolls back every write when the callback throws', () => {
      expect(() =>
        persistence.transaction(() => {
          persistence.insertVote(vote('song-a', 'session:s1'));
          throw new Error('abort');
        })
      ).toThrow('abort');

      expect(persistence.countVotes(JAM_ID, 'song-a')).toBe(0);
    });

    test('attendee names are unique per jam', () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');

      expect(() => seedAttendee(persistence, 'att-2', 'Alice', 'sess-2')).toThrow(Database.SqliteError);
      expect(persistence.findAttendeeByName(JAM_ID, 'Alice')?.id).toBe('att-1');
      expect(persistence.findAttendeeBySession(JAM_ID, 'sess-1')?.name).toBe('Alice');
    });
  });
});
