/**
 * Queue Ranking
 *
 * The performance order is a pure function of the current vote facts:
 * vote count descending, then title ascending (case-insensitive), then
 * song id so the order is total. It is recomputed from scratch on every
 * read and mutation, never patched.
 */

import type { DisplaySortKey, JamSong, RankedSong, SortDirection } from './types';

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Authoritative comparator for the performance order
 */
export function compareForPerformance(a: JamSong, b: JamSong): number {
  if (a.voteCount !== b.voteCount) {
    return b.voteCount - a.voteCount;
  }

  const byTitle = compareText(a.title.toLowerCase(), b.title.toLowerCase());
  if (byTitle !== 0) return byTitle;

  return compareText(a.songId, b.songId);
}

/**
 * Rank a jam's songs and assign performance order numbers 1..N.
 *
 * @param songs - Queue entries with their current vote counts
 * @returns New array sorted by performance order; the input is not mutated
 */
export function rank(songs: readonly JamSong[]): RankedSong[] {
  return [...songs]
    .sort(compareForPerformance)
    .map((song, index) => ({ ...song, order: index + 1 }));
}

/**
 * Presentation-only re-sort of an already ranked queue.
 * The `order` field of each entry is carried through untouched.
 */
export function sortForDisplay(
  ranked: readonly RankedSong[],
  key: DisplaySortKey = 'performance',
  direction: SortDirection = 'asc'
): RankedSong[] {
  const sign = direction === 'asc' ? 1 : -1;

  const byKey = (a: RankedSong, b: RankedSong): number => {
    switch (key) {
      case 'title':
        return compareText(a.title.toLowerCase(), b.title.toLowerCase());
      case 'artist':
        return compareText(a.artist.toLowerCase(), b.artist.toLowerCase());
      case 'votes':
        return a.voteCount - b.voteCount;
      case 'performance':
        return a.order - b.order;
    }
  };

  // Fall back to performance order so equal keys stay stable
  return [...ranked].sort((a, b) => sign * byKey(a, b) || a.order - b.order);
}
