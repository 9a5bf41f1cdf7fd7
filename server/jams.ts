/**
 * Jam Catalogue
 *
 * Jam, song and queue bookkeeping around the voting core: creating jams
 * and catalogue songs, adding songs to a jam's queue, status changes and
 * the ranked queue read model.
 */

import { randomUUID } from 'crypto';
import type { PersistenceLayer } from './persistence';
import type {
  Attendee,
  DisplaySortKey,
  Jam,
  JamId,
  JamStatus,
  Performer,
  RankedSong,
  Song,
  SongId,
  SortDirection,
} from '../conductor/types';
import {
  SongAlreadyInJam,
  UnknownJam,
  UnknownSong,
  generateJamSlug,
  makeSlugUnique,
  rank,
  sortForDisplay,
} from '../conductor';
import { withRetry, DEFAULT_MAX_RETRIES } from './store';

export interface NewJam {
  name: string;
  venue?: string | null;
  jamDate?: string | null;
}

export interface NewSong {
  title: string;
  artist: string;
}

export interface SuggestionResult {
  song: Song;
  /** A new catalogue song was created */
  created: boolean;
  /** The song was not yet in the jam's queue */
  added: boolean;
}

export interface QueueEntry extends RankedSong {
  performers: Performer[];
}

export interface JamService {
  createJam(input: NewJam): Promise<Jam>;
  getJam(jamId: JamId): Jam;
  getJamBySlug(slug: string): Jam;
  setStatus(jamId: JamId, status: JamStatus): Jam;

  createSong(input: NewSong): Song;
  listSongs(): Song[];

  addSongToJam(jamId: JamId, songId: SongId): Promise<void>;
  /** Find-or-create a song by title and artist, then queue it if absent */
  suggestSong(jamId: JamId, input: NewSong): Promise<SuggestionResult>;
  markPlayed(jamId: JamId, songId: SongId): void;

  /** Authoritative performance order, recomputed from vote facts */
  rankedQueue(jamId: JamId): RankedSong[];
  /** Ranked queue with performers, optionally re-sorted for display */
  queueView(jamId: JamId, sort?: DisplaySortKey, direction?: SortDirection): QueueEntry[];
  listAttendees(jamId: JamId): Attendee[];
}

export function createJamService(
  persistence: PersistenceLayer,
  options: { maxRetries?: number } = {}
): JamService {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  function getJam(jamId: JamId): Jam {
    const jam = persistence.getJam(jamId);
    if (!jam) throw new UnknownJam(jamId);
    return jam;
  }

  function rankedQueue(jamId: JamId): RankedSong[] {
    getJam(jamId);
    return rank(persistence.listJamSongs(jamId));
  }

  return {
    createJam(input: NewJam): Promise<Jam> {
      const baseSlug = generateJamSlug(input.name, input.venue, input.jamDate) || 'jam';

      // A concurrent jam may take the slug between the read and the insert
      return withRetry('createJam', maxRetries, () =>
        persistence.transaction(() => {
          const jam: Jam = {
            id: randomUUID(),
            name: input.name.trim(),
            slug: makeSlugUnique(baseSlug, persistence.slugsStartingWith(baseSlug)),
            venue: input.venue?.trim() || null,
            jamDate: input.jamDate ?? null,
            status: 'waiting',
            createdAt: new Date().toISOString(),
          };
          persistence.insertJam(jam);
          console.log(`[Jams] Created jam ${jam.slug} (${jam.id})`);
          return jam;
        })
      );
    },

    getJam,

    getJamBySlug(slug: string): Jam {
      const jam = persistence.getJamBySlug(slug);
      if (!jam) throw new UnknownJam(slug);
      return jam;
    },

    setStatus(jamId: JamId, status: JamStatus): Jam {
      const jam = getJam(jamId);
      persistence.setJamStatus(jamId, status);
      return { ...jam, status };
    },

    createSong(input: NewSong): Song {
      const song: Song = { id: randomUUID(), title: input.title.trim(), artist: input.artist.trim() };
      persistence.insertSong(song);
      return song;
    },

    listSongs(): Song[] {
      return persistence.listSongs();
    },

    addSongToJam(jamId: JamId, songId: SongId): Promise<void> {
      return withRetry('addSongToJam', maxRetries, () =>
        persistence.transaction(() => {
          getJam(jamId);
          if (!persistence.getSong(songId)) {
            throw new UnknownSong(songId);
          }
          if (persistence.hasJamSong(jamId, songId)) {
            throw new SongAlreadyInJam(songId);
          }
          persistence.insertJamSong(jamId, songId, new Date().toISOString());
        })
      );
    },

    suggestSong(jamId: JamId, input: NewSong): Promise<SuggestionResult> {
      const title = input.title.trim();
      const artist = input.artist.trim();

      return withRetry('suggestSong', maxRetries, () =>
        persistence.transaction(() => {
          getJam(jamId);

          let song = persistence.findSongByTitleArtist(title, artist);
          const created = song === null;
          if (song === null) {
            song = { id: randomUUID(), title, artist };
            persistence.insertSong(song);
            console.log(`[Jams] Suggested new song "${title}" by ${artist}`);
          }

          const added = !persistence.hasJamSong(jamId, song.id);
          if (added) {
            persistence.insertJamSong(jamId, song.id, new Date().toISOString());
          }
          return { song, created, added };
        })
      );
    },

    markPlayed(jamId: JamId, songId: SongId): void {
      getJam(jamId);
      if (!persistence.markSongPlayed(jamId, songId, new Date().toISOString())) {
        throw new UnknownSong(songId);
      }
    },

    rankedQueue,

    queueView(jamId: JamId, sort: DisplaySortKey = 'performance', direction: SortDirection = 'asc'): QueueEntry[] {
      const ranked = rankedQueue(jamId);
      const performers = persistence.listPerformersByJam(jamId);
      return sortForDisplay(ranked, sort, direction).map(song => ({
        ...song,
        performers: performers.get(song.songId) ?? [],
      }));
    },

    listAttendees(jamId: JamId): Attendee[] {
      getJam(jamId);
      return persistence.listAttendees(jamId);
    },
  };
}
