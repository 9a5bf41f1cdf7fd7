/**
 * Jam Queue: Core Type Definitions
 *
 * Shared language for the conductor (pure logic), the server layer and
 * the browser feed client.
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type JamId = string;
export type SongId = string;
export type AttendeeId = string;
export type SessionToken = string;
export type Timestamp = string; // ISO-8601

/**
 * Uniqueness key for votes: `attendee:<id>` or `session:<token>`
 */
export type ActorKey = `attendee:${string}` | `session:${string}`;

// ============================================================================
// Jam
// ============================================================================

export type JamStatus = 'waiting' | 'playing' | 'paused' | 'ended';

export const JAM_STATUSES = ['waiting', 'playing', 'paused', 'ended'] as const satisfies readonly JamStatus[];

export interface Jam {
  id: JamId;
  name: string;
  slug: string;
  venue: string | null;
  jamDate: string | null; // YYYY-MM-DD
  status: JamStatus;
  createdAt: Timestamp;
}

// ============================================================================
// Songs
// ============================================================================

export interface Song {
  id: SongId;
  title: string;
  artist: string;
}

/**
 * A song in a jam's queue. voteCount is always an aggregate over Vote rows.
 */
export interface JamSong {
  jamId: JamId;
  songId: SongId;
  title: string;
  artist: string;
  voteCount: number;
  played: boolean;
  playedAt: Timestamp | null;
}

/**
 * A queue entry with its authoritative performance order (1..N)
 */
export interface RankedSong extends JamSong {
  order: number;
}

export type DisplaySortKey = 'performance' | 'votes' | 'title' | 'artist';
export type SortDirection = 'asc' | 'desc';

// ============================================================================
// Actors
// ============================================================================

export interface Attendee {
  id: AttendeeId;
  jamId: JamId;
  name: string;
  sessionId: SessionToken;
  registeredAt: Timestamp;
}

export type Actor =
  | { kind: 'attendee'; attendeeId: AttendeeId; key: ActorKey }
  | { kind: 'session'; sessionToken: SessionToken; key: ActorKey };

// ============================================================================
// Votes & Registrations
// ============================================================================

export interface VoteResult {
  voted: boolean;
  voteCount: number;
}

export interface Registration {
  id: string;
  jamId: JamId;
  songId: SongId;
  attendeeId: AttendeeId;
  instrument: string;
  registeredAt: Timestamp;
}

export interface Performer {
  attendeeId: AttendeeId;
  name: string;
  instrument: string;
  registeredAt: Timestamp;
}

export interface AttendeeRegistrationResult {
  attendee: Attendee;
  created: boolean;
  /** Anonymous votes re-keyed to the attendee */
  claimedVotes: number;
  /** Songs where the anonymous vote duplicated an attendee vote and was dropped */
  droppedSongIds: SongId[];
}

// ============================================================================
// Broadcast Events
// ============================================================================

export interface JamEventPayloads {
  vote_update: { songId: SongId; voteCount: number };
  performance_update: { songId: SongId; attendeeId: AttendeeId; registered: boolean };
  song_added: { songId: SongId };
  attendee_registered: { attendeeId: AttendeeId; name: string };
  song_played: { songId: SongId };
  jam_status: { status: JamStatus };
}

export type JamEventName = keyof JamEventPayloads;

/**
 * Wire envelope pushed to every connection watching a jam.
 * Clients treat any event as "something changed, refetch".
 */
export type JamEvent = {
  [K in JamEventName]: { event: K; data: JamEventPayloads[K] };
}[JamEventName];
