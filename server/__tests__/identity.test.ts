/**
 * Identity Resolver Tests
 *
 * Tests cover:
 * - Actor resolution for attendees and anonymous sessions
 * - Registration claims the session's anonymous votes
 * - Duplicate anonymous votes are dropped on claim
 * - Name/session conflicts
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { createIdentityResolver } from '../identity';
import type { IdentityResolver } from '../identity';
import { createVoteStore } from '../store';
import type { VoteStore } from '../store';
import type { PersistenceLayer } from '../persistence';
import { attendeeActor, sessionActor } from '@/conductor/actors';
import { InvalidRequest, NameTaken, UnknownAttendee, UnknownJam } from '@/conductor/errors';
import { JAM_ID, createTestPersistence, seedAttendee, seedJam } from './fixtures';

describe('Identity Resolver', () => {
  let persistence: PersistenceLayer;
  let identity: IdentityResolver;
  let store: VoteStore;

  beforeEach(() => {
    persistence = createTestPersistence();
    seedJam(persistence);
    seedJam(persistence, 'jam-2');
    identity = createIdentityResolver(persistence);
    store = createVoteStore(persistence);
  });

  afterEach(() => {
    persistence.close();
  });

  describe('resolve', () => {
    test('an attendee id resolves to the attendee actor', () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');

      expect(identity.resolve(JAM_ID, 'sess-other', 'att-1')).toEqual(attendeeActor('att-1'));
    });

    test('an unregistered session resolves to a session actor', () => {
      expect(identity.resolve(JAM_ID, 'sess-1')).toEqual({
        kind: 'session',
        sessionToken: 'sess-1',
        key: 'session:sess-1',
      });
    });

    test('a registered session resolves to its attendee', () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');

      expect(identity.resolve(JAM_ID, 'sess-1').key).toBe('attendee:att-1');
    });

    test('session bindings are per jam', () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');

      expect(identity.resolve('jam-2', 'sess-1').key).toBe('session:sess-1');
    });

    test('rejects unknown jams, foreign attendees and missing identity', () => {
      seedAttendee(persistence, 'att-9', 'Other', 'sess-9', 'jam-2');

      expect(() => identity.resolve('missing', 'sess-1')).toThrow(UnknownJam);
      expect(() => identity.resolve(JAM_ID, null, 'att-9')).toThrow(UnknownAttendee);
      expect(() => identity.resolve(JAM_ID, null, null)).toThrow(InvalidRequest);
    });
  });

  describe('registerAttendee', () => {
    test('creates an attendee and claims the session votes', async () => {
      await store.toggleVote(JAM_ID, 'song-a', sessionActor('sess-1'));
      await store.toggleVote(JAM_ID, 'song-b', sessionActor('sess-1'));

      const result = await identity.registerAttendee(JAM_ID, '  Alice ', 'sess-1');

      expect(result.created).toBe(true);
      expect(result.attendee.name).toBe('Alice');
      expect(result.claimedVotes).toBe(2);
      expect(result.droppedSongIds).toEqual([]);

      const actor = attendeeActor(result.attendee.id);
      expect(store.votedSongIds(JAM_ID, actor).sort()).toEqual(['song-a', 'song-b']);
      expect(store.votedSongIds(JAM_ID, sessionActor('sess-1'))).toEqual([]);
    });

    test('after registration the session toggles the claimed vote', async () => {
      await store.toggleVote(JAM_ID, 'song-a', sessionActor('sess-1'));
      await identity.registerAttendee(JAM_ID, 'Alice', 'sess-1');

      const actor = identity.resolve(JAM_ID, 'sess-1');
      const result = await store.toggleVote(JAM_ID, 'song-a', actor);

      expect(result).toEqual({ voted: false, voteCount: 0 });
    });

    test('returning attendee on a new session keeps one vote per song', async () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');
      await store.toggleVote(JAM_ID, 'song-b', attendeeActor('att-1'));
      await store.toggleVote(JAM_ID, 'song-b', sessionActor('sess-2'));
      await store.toggleVote(JAM_ID, 'song-c', sessionActor('sess-2'));

      const result = await identity.registerAttendee(JAM_ID, 'Alice', 'sess-2');

      expect(result.created).toBe(false);
      expect(result.attendee.id).toBe('att-1');
      expect(result.attendee.sessionId).toBe('sess-2');
      expect(result.claimedVotes).toBe(1);
      expect(result.droppedSongIds).toEqual(['song-b']);
      expect(persistence.countVotes(JAM_ID, 'song-b')).toBe(1);
      expect(identity.resolve(JAM_ID, 'sess-2').key).toBe('attendee:att-1');
    });

    test('renaming from the same session updates the attendee', async () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');

      const result = await identity.registerAttendee(JAM_ID, 'Alicia', 'sess-1');

      expect(result.created).toBe(false);
      expect(persistence.getAttendee('att-1')?.name).toBe('Alicia');
    });

    test('a name held by another session holder is taken', async () => {
      seedAttendee(persistence, 'att-1', 'Alice', 'sess-1');
      seedAttendee(persistence, 'att-2', 'Bob', 'sess-2');

      await expect(identity.registerAttendee(JAM_ID, 'Alice', 'sess-2')).rejects.toBeInstanceOf(NameTaken);
    });

    test('requires a name and a session', async () => {
      await expect(identity.registerAttendee(JAM_ID, '   ', 'sess-1')).rejects.toBeInstanceOf(InvalidRequest);
      await expect(identity.registerAttendee(JAM_ID, 'Alice', '')).rejects.toBeInstanceOf(InvalidRequest);
    });

    test('rejects unknown jams', async () => {
      await expect(identity.registerAttendee('missing', 'Alice', 'sess-1')).rejects.toBeInstanceOf(UnknownJam);
    });
  });
});
