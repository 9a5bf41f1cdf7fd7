/**
 * Persistence Layer
 *
 * Handles all database operations for jams, songs, attendees, votes and
 * performance registrations. Uses better-sqlite3 with WAL mode and a busy
 * timeout so several server processes can share one database file.
 *
 * Uniqueness (one vote per actor per song, one registration per attendee
 * per song, one attendee per name/session) is enforced by the schema, not
 * by in-process locks. Vote counts are always COUNT(*) over vote rows.
 */

import Database from 'better-sqlite3';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import type {
  ActorKey,
  Attendee,
  AttendeeId,
  Jam,
  JamId,
  JamSong,
  JamStatus,
  Performer,
  Registration,
  SessionToken,
  Song,
  SongId,
} from '../conductor/types';

// ============================================================================
// Row shapes
// ============================================================================

interface JamRow {
  id: string;
  name: string;
  slug: string;
  venue: string | null;
  jam_date: string | null;
  status: JamStatus;
  created_at: string;
}

interface SongRow {
  id: string;
  title: string;
  artist: string;
}

interface JamSongRow {
  jam_id: string;
  song_id: string;
  title: string;
  artist: string;
  vote_count: number;
  played: number;
  played_at: string | null;
}

interface AttendeeRow {
  id: string;
  jam_id: string;
  name: string;
  session_id: string;
  registered_at: string;
}

interface RegistrationRow {
  id: string;
  jam_id: string;
  song_id: string;
  attendee_id: string;
  instrument: string;
  registered_at: string;
}

interface PerformerRow {
  song_id: string;
  attendee_id: string;
  name: string;
  instrument: string;
  registered_at: string;
}

function toJam(row: JamRow): Jam {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    venue: row.venue,
    jamDate: row.jam_date,
    status: row.status,
    createdAt: row.created_at,
  };
}

function toJamSong(row: JamSongRow): JamSong {
  return {
    jamId: row.jam_id,
    songId: row.song_id,
    title: row.title,
    artist: row.artist,
    voteCount: row.vote_count,
    played: row.played === 1,
    playedAt: row.played_at,
  };
}

function toAttendee(row: AttendeeRow): Attendee {
  return {
    id: row.id,
    jamId: row.jam_id,
    name: row.name,
    sessionId: row.session_id,
    registeredAt: row.registered_at,
  };
}

function toRegistration(row: RegistrationRow): Registration {
  return {
    id: row.id,
    jamId: row.jam_id,
    songId: row.song_id,
    attendeeId: row.attendee_id,
    instrument: row.instrument,
    registeredAt: row.registered_at,
  };
}

function toPerformer(row: PerformerRow): Performer {
  return {
    attendeeId: row.attendee_id,
    name: row.name,
    instrument: row.instrument,
    registeredAt: row.registered_at,
  };
}

// ============================================================================
// Public interface
// ============================================================================

export interface NewVote {
  id: string;
  jamId: JamId;
  songId: SongId;
  actorKey: ActorKey;
  attendeeId: AttendeeId | null;
  sessionId: SessionToken | null;
  votedAt: string;
}

export interface ClaimResult {
  claimed: number;
  droppedSongIds: SongId[];
}

export interface PersistenceLayer {
  /** Run `fn` inside one SQLite transaction (nested calls become savepoints) */
  transaction<T>(fn: () => T): T;

  insertJam(jam: Jam): void;
  getJam(jamId: JamId): Jam | null;
  getJamBySlug(slug: string): Jam | null;
  slugsStartingWith(prefix: string): string[];
  setJamStatus(jamId: JamId, status: JamStatus): boolean;

  insertSong(song: Song): void;
  getSong(songId: SongId): Song | null;
  /** Case-insensitive match on both title and artist */
  findSongByTitleArtist(title: string, artist: string): Song | null;
  listSongs(): Song[];

  insertJamSong(jamId: JamId, songId: SongId, addedAt: string): void;
  hasJamSong(jamId: JamId, songId: SongId): boolean;
  markSongPlayed(jamId: JamId, songId: SongId, playedAt: string): boolean;
  listJamSongs(jamId: JamId): JamSong[];

  insertAttendee(attendee: Attendee): void;
  updateAttendee(attendeeId: AttendeeId, name: string, sessionId: SessionToken): void;
  getAttendee(attendeeId: AttendeeId): Attendee | null;
  findAttendeeByName(jamId: JamId, name: string): Attendee | null;
  findAttendeeBySession(jamId: JamId, sessionId: SessionToken): Attendee | null;
  listAttendees(jamId: JamId): Attendee[];

  insertVote(vote: NewVote): void;
  deleteVote(jamId: JamId, songId: SongId, actorKey: ActorKey): boolean;
  hasVote(jamId: JamId, songId: SongId, actorKey: ActorKey): boolean;
  countVotes(jamId: JamId, songId: SongId): number;
  votedSongIds(jamId: JamId, actorKey: ActorKey): SongId[];
  /** Re-key a session's votes to an attendee, dropping duplicates */
  claimVotes(jamId: JamId, from: ActorKey, to: ActorKey, attendeeId: AttendeeId): ClaimResult;

  insertRegistration(registration: Registration): void;
  deleteRegistration(jamId: JamId, songId: SongId, attendeeId: AttendeeId): boolean;
  findRegistration(jamId: JamId, songId: SongId, attendeeId: AttendeeId): Registration | null;
  countRegistrations(jamId: JamId, attendeeId: AttendeeId): number;
  listRegistrations(jamId: JamId, attendeeId?: AttendeeId): Registration[];
  listPerformers(jamId: JamId, songId: SongId): Performer[];
  listPerformersByJam(jamId: JamId): Map<SongId, Performer[]>;

  close(): void;
}

export interface PersistenceOptions {
  /** How long SQLite waits on a locked database before SQLITE_BUSY */
  busyTimeoutMs?: number;
  schemaPath?: string;
}

/**
 * Locate db/schema.sql both from sources (server/) and from the build (dist/server/)
 */
function resolveSchemaPath(): string {
  const candidates = [
    join(__dirname, '../db/schema.sql'),
    join(__dirname, '../../db/schema.sql'),
  ];
  const found = candidates.find(candidate => existsSync(candidate));
  if (!found) {
    throw new Error(`Schema file not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Initialize the database and return persistence layer functions
 */
export function createPersistence(dbPath: string, options: PersistenceOptions = {}): PersistenceLayer {
  const db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 });

  // Enable WAL mode for better concurrency and crash resilience
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  const schema = readFileSync(options.schemaPath ?? resolveSchemaPath(), 'utf-8');
  db.exec(schema);

  // Prepare statements for better performance
  const stmts = {
    insertJam: db.prepare(`
      INSERT INTO jams (id, name, slug, venue, jam_date, status, created_at)
      VALUES (@id, @name, @slug, @venue, @jamDate, @status, @createdAt)
    `),
    getJam: db.prepare(`SELECT * FROM jams WHERE id = ?`),
    getJamBySlug: db.prepare(`SELECT * FROM jams WHERE slug = ?`),
    slugsStartingWith: db.prepare(`SELECT slug FROM jams WHERE substr(slug, 1, length(@prefix)) = @prefix`),
    setJamStatus: db.prepare(`UPDATE jams SET status = ? WHERE id = ?`),

    insertSong: db.prepare(`INSERT INTO songs (id, title, artist) VALUES (@id, @title, @artist)`),
    getSong: db.prepare(`SELECT id, title, artist FROM songs WHERE id = ?`),
    findSongByTitleArtist: db.prepare(`
      SELECT id, title, artist FROM songs
      WHERE lower(title) = lower(?) AND lower(artist) = lower(?)
      ORDER BY created_at, id
      LIMIT 1
    `),
    listSongs: db.prepare(`SELECT id, title, artist FROM songs ORDER BY title COLLATE NOCASE, id`),

    insertJamSong: db.prepare(`INSERT INTO jam_songs (jam_id, song_id, added_at) VALUES (?, ?, ?)`),
    hasJamSong: db.prepare(`SELECT 1 FROM jam_songs WHERE jam_id = ? AND song_id = ?`),
    markSongPlayed: db.prepare(`UPDATE jam_songs SET played = 1, played_at = ? WHERE jam_id = ? AND song_id = ?`),
    listJamSongs: db.prepare(`
      SELECT js.jam_id, js.song_id, s.title, s.artist, js.played, js.played_at,
        (SELECT COUNT(*) FROM votes v WHERE v.jam_id = js.jam_id AND v.song_id = js.song_id) AS vote_count
      FROM jam_songs js
      JOIN songs s ON s.id = js.song_id
      WHERE js.jam_id = ?
    `),

    insertAttendee: db.prepare(`
      INSERT INTO attendees (id, jam_id, name, session_id, registered_at)
      VALUES (@id, @jamId, @name, @sessionId, @registeredAt)
    `),
    updateAttendee: db.prepare(`UPDATE attendees SET name = ?, session_id = ? WHERE id = ?`),
    getAttendee: db.prepare(`SELECT * FROM attendees WHERE id = ?`),
    findAttendeeByName: db.prepare(`SELECT * FROM attendees WHERE jam_id = ? AND name = ?`),
    findAttendeeBySession: db.prepare(`SELECT * FROM attendees WHERE jam_id = ? AND session_id = ?`),
    listAttendees: db.prepare(`SELECT * FROM attendees WHERE jam_id = ? ORDER BY registered_at, rowid`),

    insertVote: db.prepare(`
      INSERT INTO votes (id, jam_id, song_id, actor_key, attendee_id, session_id, voted_at)
      VALUES (@id, @jamId, @songId, @actorKey, @attendeeId, @sessionId, @votedAt)
    `),
    deleteVote: db.prepare(`DELETE FROM votes WHERE jam_id = ? AND song_id = ? AND actor_key = ?`),
    hasVote: db.prepare(`SELECT 1 FROM votes WHERE jam_id = ? AND song_id = ? AND actor_key = ?`),
    countVotes: db.prepare(`SELECT COUNT(*) AS count FROM votes WHERE jam_id = ? AND song_id = ?`),
    votedSongIds: db.prepare(`SELECT song_id FROM votes WHERE jam_id = ? AND actor_key = ? ORDER BY voted_at, rowid`),
    duplicateClaims: db.prepare(`
      SELECT s.song_id FROM votes s
      JOIN votes a ON a.jam_id = s.jam_id AND a.song_id = s.song_id AND a.actor_key = @to
      WHERE s.jam_id = @jamId AND s.actor_key = @from
      ORDER BY s.song_id
    `),
    dropDuplicateClaims: db.prepare(`
      DELETE FROM votes
      WHERE jam_id = @jamId AND actor_key = @from
        AND song_id IN (SELECT song_id FROM votes WHERE jam_id = @jamId AND actor_key = @to)
    `),
    claimVotes: db.prepare(`
      UPDATE votes SET actor_key = @to, attendee_id = @attendeeId
      WHERE jam_id = @jamId AND actor_key = @from
    `),

    insertRegistration: db.prepare(`
      INSERT INTO performance_registrations (id, jam_id, song_id, attendee_id, instrument, registered_at)
      VALUES (@id, @jamId, @songId, @attendeeId, @instrument, @registeredAt)
    `),
    deleteRegistration: db.prepare(`
      DELETE FROM performance_registrations WHERE jam_id = ? AND song_id = ? AND attendee_id = ?
    `),
    findRegistration: db.prepare(`
      SELECT * FROM performance_registrations WHERE jam_id = ? AND song_id = ? AND attendee_id = ?
    `),
    countRegistrations: db.prepare(`
      SELECT COUNT(*) AS count FROM performance_registrations WHERE jam_id = ? AND attendee_id = ?
    `),
    listRegistrations: db.prepare(`
      SELECT * FROM performance_registrations WHERE jam_id = ? ORDER BY registered_at, rowid
    `),
    listRegistrationsByAttendee: db.prepare(`
      SELECT * FROM performance_registrations WHERE jam_id = ? AND attendee_id = ? ORDER BY registered_at, rowid
    `),
    listPerformers: db.prepare(`
      SELECT r.song_id, r.attendee_id, a.name, r.instrument, r.registered_at
      FROM performance_registrations r
      JOIN attendees a ON a.id = r.attendee_id
      WHERE r.jam_id = ? AND r.song_id = ?
      ORDER BY r.registered_at, r.rowid
    `),
    listPerformersByJam: db.prepare(`
      SELECT r.song_id, r.attendee_id, a.name, r.instrument, r.registered_at
      FROM performance_registrations r
      JOIN attendees a ON a.id = r.attendee_id
      WHERE r.jam_id = ?
      ORDER BY r.registered_at, r.rowid
    `),
  };

  return {
    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },

    // ── Jams ─────────────────────────────────────────────────────────

    insertJam(jam: Jam): void {
      stmts.insertJam.run(jam);
    },

    getJam(jamId: JamId): Jam | null {
      const row = stmts.getJam.get(jamId) as JamRow | undefined;
      return row ? toJam(row) : null;
    },

    getJamBySlug(slug: string): Jam | null {
      const row = stmts.getJamBySlug.get(slug) as JamRow | undefined;
      return row ? toJam(row) : null;
    },

    slugsStartingWith(prefix: string): string[] {
      const rows = stmts.slugsStartingWith.all({ prefix }) as Array<{ slug: string }>;
      return rows.map(row => row.slug);
    },

    setJamStatus(jamId: JamId, status: JamStatus): boolean {
      return stmts.setJamStatus.run(status, jamId).changes > 0;
    },

    // ── Songs ────────────────────────────────────────────────────────

    insertSong(song: Song): void {
      stmts.insertSong.run(song);
    },

    getSong(songId: SongId): Song | null {
      const row = stmts.getSong.get(songId) as SongRow | undefined;
      return row ?? null;
    },

    findSongByTitleArtist(title: string, artist: string): Song | null {
      const row = stmts.findSongByTitleArtist.get(title, artist) as SongRow | undefined;
      return row ?? null;
    },

    listSongs(): Song[] {
      return stmts.listSongs.all() as SongRow[];
    },

    insertJamSong(jamId: JamId, songId: SongId, addedAt: string): void {
      stmts.insertJamSong.run(jamId, songId, addedAt);
    },

    hasJamSong(jamId: JamId, songId: SongId): boolean {
      return stmts.hasJamSong.get(jamId, songId) !== undefined;
    },

    markSongPlayed(jamId: JamId, songId: SongId, playedAt: string): boolean {
      return stmts.markSongPlayed.run(playedAt, jamId, songId).changes > 0;
    },

    listJamSongs(jamId: JamId): JamSong[] {
      const rows = stmts.listJamSongs.all(jamId) as JamSongRow[];
      return rows.map(toJamSong);
    },

    // ── Attendees ────────────────────────────────────────────────────

    insertAttendee(attendee: Attendee): void {
      stmts.insertAttendee.run(attendee);
    },

    updateAttendee(attendeeId: AttendeeId, name: string, sessionId: SessionToken): void {
      stmts.updateAttendee.run(name, sessionId, attendeeId);
    },

    getAttendee(attendeeId: AttendeeId): Attendee | null {
      const row = stmts.getAttendee.get(attendeeId) as AttendeeRow | undefined;
      return row ? toAttendee(row) : null;
    },

    findAttendeeByName(jamId: JamId, name: string): Attendee | null {
      const row = stmts.findAttendeeByName.get(jamId, name) as AttendeeRow | undefined;
      return row ? toAttendee(row) : null;
    },

    findAttendeeBySession(jamId: JamId, sessionId: SessionToken): Attendee | null {
      const row = stmts.findAttendeeBySession.get(jamId, sessionId) as AttendeeRow | undefined;
      return row ? toAttendee(row) : null;
    },

    listAttendees(jamId: JamId): Attendee[] {
      const rows = stmts.listAttendees.all(jamId) as AttendeeRow[];
      return rows.map(toAttendee);
    },

    // ── Votes ────────────────────────────────────────────────────────

    insertVote(vote: NewVote): void {
      stmts.insertVote.run(vote);
    },

    deleteVote(jamId: JamId, songId: SongId, actorKey: ActorKey): boolean {
      return stmts.deleteVote.run(jamId, songId, actorKey).changes > 0;
    },

    hasVote(jamId: JamId, songId: SongId, actorKey: ActorKey): boolean {
      return stmts.hasVote.get(jamId, songId, actorKey) !== undefined;
    },

    countVotes(jamId: JamId, songId: SongId): number {
      const row = stmts.countVotes.get(jamId, songId) as { count: number };
      return row.count;
    },

    votedSongIds(jamId: JamId, actorKey: ActorKey): SongId[] {
      const rows = stmts.votedSongIds.all(jamId, actorKey) as Array<{ song_id: string }>;
      return rows.map(row => row.song_id);
    },

    claimVotes(jamId: JamId, from: ActorKey, to: ActorKey, attendeeId: AttendeeId): ClaimResult {
      const params = { jamId, from, to };
      const duplicates = stmts.duplicateClaims.all(params) as Array<{ song_id: string }>;
      stmts.dropDuplicateClaims.run(params);
      const claimed = stmts.claimVotes.run({ ...params, attendeeId }).changes;
      return { claimed, droppedSongIds: duplicates.map(row => row.song_id) };
    },

    // ── Performance registrations ────────────────────────────────────

    insertRegistration(registration: Registration): void {
      stmts.insertRegistration.run(registration);
    },

    deleteRegistration(jamId: JamId, songId: SongId, attendeeId: AttendeeId): boolean {
      return stmts.deleteRegistration.run(jamId, songId, attendeeId).changes > 0;
    },

    findRegistration(jamId: JamId, songId: SongId, attendeeId: AttendeeId): Registration | null {
      const row = stmts.findRegistration.get(jamId, songId, attendeeId) as RegistrationRow | undefined;
      return row ? toRegistration(row) : null;
    },

    countRegistrations(jamId: JamId, attendeeId: AttendeeId): number {
      const row = stmts.countRegistrations.get(jamId, attendeeId) as { count: number };
      return row.count;
    },

    listRegistrations(jamId: JamId, attendeeId?: AttendeeId): Registration[] {
      const rows = (attendeeId
        ? stmts.listRegistrationsByAttendee.all(jamId, attendeeId)
        : stmts.listRegistrations.all(jamId)) as RegistrationRow[];
      return rows.map(toRegistration);
    },

    listPerformers(jamId: JamId, songId: SongId): Performer[] {
      const rows = stmts.listPerformers.all(jamId, songId) as PerformerRow[];
      return rows.map(toPerformer);
    },

    listPerformersByJam(jamId: JamId): Map<SongId, Performer[]> {
      const rows = stmts.listPerformersByJam.all(jamId) as PerformerRow[];
      const bySong = new Map<SongId, Performer[]>();
      for (const row of rows) {
        const performers = bySong.get(row.song_id) ?? [];
        performers.push(toPerformer(row));
        bySong.set(row.song_id, performers);
      }
      return bySong;
    },

    close(): void {
      db.close();
    },
  };
}
