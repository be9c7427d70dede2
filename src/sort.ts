import type { SortBy, SortDirection } from './types.js';
import type { Song } from './song.js';

function textKey(song: Song, sortBy: Exclude<SortBy, 'downloaded'>): string {
  return song.metadata[sortBy].toLowerCase();
}

function compareSongs(a: Song, b: Song, sortBy: SortBy): number {
  if (sortBy === 'downloaded') {
    return b.metadata.downloadUnixTime - a.metadata.downloadUnixTime;
  }

  const left = textKey(a, sortBy);
  const right = textKey(b, sortBy);

  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Orders songs by a text field ascending, or by download time newest first.
 * `reverse` flips the finished order.
 */
export function sortSongs(songs: Iterable<Song>, sortBy: SortBy, direction: SortDirection): Song[] {
  const sorted = [...songs].sort((a, b) => compareSongs(a, b, sortBy));
  return direction === 'reverse' ? sorted.reverse() : sorted;
}

export function reverseDirection(direction: SortDirection): SortDirection {
  return direction === 'normal' ? 'reverse' : 'normal';
}

export const SORT_LABELS: Record<SortBy, string> = {
  title: 'song title',
  artist: 'artist',
  album: 'album',
  downloaded: 'time downloaded',
};

export function isSortBy(value: string): value is SortBy {
  return Object.hasOwn(SORT_LABELS, value);
}
