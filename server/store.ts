/**
 * Vote/Registration Store
 *
 * Applies vote toggles and performance registrations under the schema's
 * uniqueness constraints. Each mutation is one SQLite transaction; a
 * unique-constraint conflict or a busy database (another process holding
 * the write lock) is retried a bounded number of times, then surfaces as
 * StoreUnavailable. There is no in-process lock: unrelated songs and jams
 * never wait on each other.
 *
 * Debug logging: Enable with DEBUG=jam:store
 */

import createDebug from 'debug';
import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import type { PersistenceLayer } from './persistence';
import type {
  Actor,
  AttendeeId,
  JamId,
  Performer,
  Registration,
  SongId,
  VoteResult,
} from '../conductor/types';
import {
  DuplicateRegistration,
  NotRegistered,
  PerformanceLimitExceeded,
  StoreUnavailable,
  UnknownAttendee,
  UnknownSong,
  isJamError,
} from '../conductor/errors';

const debug = createDebug('jam:store');

export const DEFAULT_MAX_PERFORMANCES = 3;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_INSTRUMENT = 'Unknown';

export interface VoteStoreOptions {
  /** Concurrent registrations one attendee may hold per jam */
  maxPerformances?: number;
  /** Extra attempts after a conflicting or busy transaction */
  maxRetries?: number;
}

export interface VoteStore {
  readonly maxPerformances: number;
  toggleVote(jamId: JamId, songId: SongId, actor: Actor): Promise<VoteResult>;
  voteStatus(jamId: JamId, songId: SongId, actor: Actor): VoteResult;
  votedSongIds(jamId: JamId, actor: Actor): SongId[];
  registerPerformance(jamId: JamId, songId: SongId, attendeeId: AttendeeId, instrument?: string): Promise<Registration>;
  unregisterPerformance(jamId: JamId, songId: SongId, attendeeId: AttendeeId): Promise<void>;
  performersForSong(jamId: JamId, songId: SongId): Performer[];
  registrationsForJam(jamId: JamId, attendeeId?: AttendeeId): Registration[];
}

/**
 * Conflicts and lock contention are worth another attempt; everything else is not.
 */
export function isRetryableStoreError(err: unknown): boolean {
  if (!(err instanceof Database.SqliteError)) return false;
  return (
    err.code === 'SQLITE_CONSTRAINT_UNIQUE' ||
    err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
    err.code.startsWith('SQLITE_BUSY') ||
    err.code.startsWith('SQLITE_LOCKED')
  );
}

/**
 * Run a transactional unit, retrying on retryable SQLite errors.
 * Domain errors (JamError) are never retried.
 */
export async function withRetry<T>(label: string, maxRetries: number, fn: () => T): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return fn();
    } catch (err) {
      if (isJamError(err) || !isRetryableStoreError(err)) {
        throw err;
      }
      lastError = err;
      debug('%s: retryable failure on attempt %d: %s', label, attempt + 1, String(err));
    }
  }

  console.error(`[Store] ${label} failed after ${maxRetries + 1} attempts:`, lastError);
  throw new StoreUnavailable(lastError);
}

export function createVoteStore(persistence: PersistenceLayer, options: VoteStoreOptions = {}): VoteStore {
  const maxPerformances = options.maxPerformances ?? DEFAULT_MAX_PERFORMANCES;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  function requireJamSong(jamId: JamId, songId: SongId): void {
    if (!persistence.hasJamSong(jamId, songId)) {
      throw new UnknownSong(songId);
    }
  }

  function requireJamAttendee(jamId: JamId, attendeeId: AttendeeId): void {
    const attendee = persistence.getAttendee(attendeeId);
    if (!attendee || attendee.jamId !== jamId) {
      throw new UnknownAttendee(attendeeId);
    }
  }

  return {
    maxPerformances,

    /**
     * Idempotent toggle: delete the actor's vote if present, insert it otherwise.
     * The count is re-read inside the same transaction.
     */
    toggleVote(jamId: JamId, songId: SongId, actor: Actor): Promise<VoteResult> {
      return withRetry('toggleVote', maxRetries, () =>
        persistence.transaction(() => {
          requireJamSong(jamId, songId);

          const removed = persistence.deleteVote(jamId, songId, actor.key);
          if (!removed) {
            persistence.insertVote({
              id: randomUUID(),
              jamId,
              songId,
              actorKey: actor.key,
              attendeeId: actor.kind === 'attendee' ? actor.attendeeId : null,
              sessionId: actor.kind === 'session' ? actor.sessionToken : null,
              votedAt: new Date().toISOString(),
            });
          }

          const voteCount = persistence.countVotes(jamId, songId);
          debug('toggleVote %s/%s by %s -> voted=%s count=%d', jamId, songId, actor.key, !removed, voteCount);
          return { voted: !removed, voteCount };
        })
      );
    },

    voteStatus(jamId: JamId, songId: SongId, actor: Actor): VoteResult {
      requireJamSong(jamId, songId);
      return {
        voted: persistence.hasVote(jamId, songId, actor.key),
        voteCount: persistence.countVotes(jamId, songId),
      };
    },

    votedSongIds(jamId: JamId, actor: Actor): SongId[] {
      return persistence.votedSongIds(jamId, actor.key);
    },

    /**
     * Register an attendee to perform a song. Duplicate is checked before the
     * limit, so re-registering a held song reports DuplicateRegistration.
     */
    registerPerformance(
      jamId: JamId,
      songId: SongId,
      attendeeId: AttendeeId,
      instrument?: string
    ): Promise<Registration> {
      const normalizedInstrument = instrument?.trim() || DEFAULT_INSTRUMENT;

      return withRetry('registerPerformance', maxRetries, () =>
        persistence.transaction(() => {
          requireJamSong(jamId, songId);
          requireJamAttendee(jamId, attendeeId);

          if (persistence.findRegistration(jamId, songId, attendeeId)) {
            throw new DuplicateRegistration();
          }

          const held = persistence.countRegistrations(jamId, attendeeId);
          if (held >= maxPerformances) {
            throw new PerformanceLimitExceeded(maxPerformances);
          }

          const registration: Registration = {
            id: randomUUID(),
            jamId,
            songId,
            attendeeId,
            instrument: normalizedInstrument,
            registeredAt: new Date().toISOString(),
          };
          persistence.insertRegistration(registration);

          debug('registerPerformance %s/%s by %s (%d/%d)', jamId, songId, attendeeId, held + 1, maxPerformances);
          return registration;
        })
      );
    },

    unregisterPerformance(jamId: JamId, songId: SongId, attendeeId: AttendeeId): Promise<void> {
      return withRetry('unregisterPerformance', maxRetries, () =>
        persistence.transaction(() => {
          if (!persistence.deleteRegistration(jamId, songId, attendeeId)) {
            throw new NotRegistered();
          }
          debug('unregisterPerformance %s/%s by %s', jamId, songId, attendeeId);
        })
      );
    },

    performersForSong(jamId: JamId, songId: SongId): Performer[] {
      return persistence.listPerformers(jamId, songId);
    },

    registrationsForJam(jamId: JamId, attendeeId?: AttendeeId): Registration[] {
      return persistence.listRegistrations(jamId, attendeeId);
    },
  };
}
