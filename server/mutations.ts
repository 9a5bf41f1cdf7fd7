/**
 * Mutation API
 *
 * Orchestrates every state-changing request:
 *
 *   resolve actor -> validate jam/song -> apply in store -> re-rank -> publish -> respond
 *
 * The caller gets the authoritative post-mutation state synchronously; all
 * other clients learn about the change from the broadcast and refetch. Both
 * paths read the same store, so they converge.
 *
 * Only the store and ranking steps run inside the mutation deadline. Events
 * are handed to the hub once the change is committed and the response does
 * not wait for their delivery, so a slow subscriber can neither delay nor
 * fail the request.
 */

import type { BroadcastHub } from './hub';
import type { IdentityResolver } from './identity';
import type { JamService, NewSong } from './jams';
import type { VoteStore } from './store';
import type {
  Attendee,
  AttendeeId,
  Jam,
  JamEvent,
  JamId,
  JamStatus,
  Performer,
  RankedSong,
  Registration,
  SessionToken,
  Song,
  SongId,
} from '../conductor/types';
import { MutationTimeout } from '../conductor/errors';

export const DEFAULT_MUTATION_TIMEOUT_MS = 10000;

export interface VoteInput {
  jamId: JamId;
  songId: SongId;
  attendeeId?: AttendeeId | null;
  sessionId?: SessionToken | null;
}

export interface PerformInput {
  jamId: JamId;
  songId: SongId;
  attendeeId: AttendeeId;
  instrument?: string;
}

export interface VoteResponse {
  voted: boolean;
  voteCount: number;
  queue: RankedSong[];
}

export interface PerformResponse {
  registration: Registration;
  performers: Performer[];
}

export interface UnperformResponse {
  unregistered: true;
  performers: Performer[];
}

export interface QueueResponse {
  queue: RankedSong[];
}

export interface SuggestionResponse {
  song: Song;
  created: boolean;
  added: boolean;
  queue: RankedSong[];
}

export interface AttendeeResponse {
  attendee: Attendee;
  created: boolean;
  claimedVotes: number;
  queue: RankedSong[];
}

export interface MutationApi {
  vote(input: VoteInput): Promise<VoteResponse>;
  registerPerformance(input: PerformInput): Promise<PerformResponse>;
  unregisterPerformance(input: Omit<PerformInput, 'instrument'>): Promise<UnperformResponse>;
  addSong(jamId: JamId, songId: SongId): Promise<QueueResponse>;
  suggestSong(jamId: JamId, input: NewSong): Promise<SuggestionResponse>;
  registerAttendee(jamId: JamId, name: string, sessionId: SessionToken): Promise<AttendeeResponse>;
  markPlayed(jamId: JamId, songId: SongId): Promise<QueueResponse>;
  setStatus(jamId: JamId, status: JamStatus): Promise<Jam>;
}

export interface MutationDeps {
  identity: IdentityResolver;
  store: VoteStore;
  jams: JamService;
  hub: BroadcastHub;
  /** 0 disables the bound */
  timeoutMs?: number;
}

/**
 * Reject with MutationTimeout if `work` has not settled within `ms`.
 */
export function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  if (ms <= 0) return work;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new MutationTimeout(ms)), ms);
  });
  return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}

export function createMutationApi(deps: MutationDeps): MutationApi {
  const { identity, store, jams, hub } = deps;
  const timeoutMs = deps.timeoutMs ?? DEFAULT_MUTATION_TIMEOUT_MS;

  function bounded<T>(work: () => Promise<T>): Promise<T> {
    return withTimeout(Promise.resolve().then(work), timeoutMs);
  }

  // Not awaited: publishes queue on the jam's delivery chain in call order
  function broadcast(jamId: JamId, event: JamEvent): void {
    hub.publish(jamId, event).catch((err: unknown) => {
      console.error(`[Mutations] Broadcast of ${event.event} to jam ${jamId} failed:`, err);
    });
  }

  return {
    vote(input: VoteInput): Promise<VoteResponse> {
      return bounded(async () => {
        const actor = identity.resolve(input.jamId, input.sessionId, input.attendeeId);
        const { voted, voteCount } = await store.toggleVote(input.jamId, input.songId, actor);
        const queue = jams.rankedQueue(input.jamId);

        broadcast(input.jamId, {
          event: 'vote_update',
          data: { songId: input.songId, voteCount },
        });

        return { voted, voteCount, queue };
      });
    },

    registerPerformance(input: PerformInput): Promise<PerformResponse> {
      return bounded(async () => {
        identity.requireAttendee(input.jamId, input.attendeeId);
        const registration = await store.registerPerformance(
          input.jamId,
          input.songId,
          input.attendeeId,
          input.instrument
        );
        const performers = store.performersForSong(input.jamId, input.songId);

        broadcast(input.jamId, {
          event: 'performance_update',
          data: { songId: input.songId, attendeeId: input.attendeeId, registered: true },
        });

        return { registration, performers };
      });
    },

    unregisterPerformance(input: Omit<PerformInput, 'instrument'>): Promise<UnperformResponse> {
      return bounded(async () => {
        identity.requireAttendee(input.jamId, input.attendeeId);
        await store.unregisterPerformance(input.jamId, input.songId, input.attendeeId);
        const performers = store.performersForSong(input.jamId, input.songId);

        broadcast(input.jamId, {
          event: 'performance_update',
          data: { songId: input.songId, attendeeId: input.attendeeId, registered: false },
        });

        return { unregistered: true as const, performers };
      });
    },

    addSong(jamId: JamId, songId: SongId): Promise<QueueResponse> {
      return bounded(async () => {
        await jams.addSongToJam(jamId, songId);
        const queue = jams.rankedQueue(jamId);

        broadcast(jamId, { event: 'song_added', data: { songId } });

        return { queue };
      });
    },

    suggestSong(jamId: JamId, input: NewSong): Promise<SuggestionResponse> {
      return bounded(async () => {
        const result = await jams.suggestSong(jamId, input);
        const queue = jams.rankedQueue(jamId);

        if (result.added) {
          broadcast(jamId, { event: 'song_added', data: { songId: result.song.id } });
        }

        return { ...result, queue };
      });
    },

    registerAttendee(jamId: JamId, name: string, sessionId: SessionToken): Promise<AttendeeResponse> {
      return bounded(async () => {
        const result = await identity.registerAttendee(jamId, name, sessionId);
        const queue = jams.rankedQueue(jamId);

        broadcast(jamId, {
          event: 'attendee_registered',
          data: { attendeeId: result.attendee.id, name: result.attendee.name },
        });

        // Dropping a duplicate anonymous vote lowers that song's count
        for (const songId of result.droppedSongIds) {
          const entry = queue.find(song => song.songId === songId);
          broadcast(jamId, {
            event: 'vote_update',
            data: { songId, voteCount: entry?.voteCount ?? 0 },
          });
        }

        return {
          attendee: result.attendee,
          created: result.created,
          claimedVotes: result.claimedVotes,
          queue,
        };
      });
    },

    markPlayed(jamId: JamId, songId: SongId): Promise<QueueResponse> {
      return bounded(async () => {
        jams.markPlayed(jamId, songId);
        const queue = jams.rankedQueue(jamId);

        broadcast(jamId, { event: 'song_played', data: { songId } });

        return { queue };
      });
    },

    setStatus(jamId: JamId, status: JamStatus): Promise<Jam> {
      return bounded(async () => {
        const jam = jams.setStatus(jamId, status);

        broadcast(jamId, { event: 'jam_status', data: { status } });

        return jam;
      });
    },
  };
}
