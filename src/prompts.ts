import { input, select, confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import type { MetadataEdits, Settings } from './types.js';
import type { Library } from './library.js';
import type { Song } from './song.js';
import { SongNotFoundError, TapeshelfError } from './errors.js';
import { sortSongs } from './sort.js';

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) {
    return str;
  }
  return str.slice(0, maxLen - 3) + '...';
}

export function describeSong(song: Song): string {
  const { title, artist } = song.metadata;
  const hidden = song.isHidden() ? chalk.gray(' (hidden)') : '';

  return `${truncate(title, 50)} ${chalk.gray(`by ${truncate(artist, 30)}`)}${hidden}`;
}

/** Looks a song up by source id, or asks the user to pick one. */
export async function pickSong(
  library: Library,
  settings: Settings,
  sourceId: string | undefined
): Promise<Song> {
  if (sourceId !== undefined) {
    const song = library.findBySourceId(sourceId);

    if (!song) {
      throw new SongNotFoundError(sourceId);
    }

    return song;
  }

  if (library.size === 0) {
    throw new TapeshelfError('The library is empty');
  }

  const songs = sortSongs(library.songs(), settings.sortBy, settings.sortDirection);

  return select({
    message: 'Select a song:',
    choices: songs.map((song) => ({ name: describeSong(song), value: song })),
    pageSize: 15,
  });
}

export async function promptForEdits(song: Song): Promise<MetadataEdits | null> {
  const { metadata } = song;

  const title = await input({ message: 'Title:', default: metadata.title });
  const artist = await input({ message: 'Artist:', default: metadata.artist });
  const album = await input({ message: 'Album:', default: metadata.album });

  console.log('\n📋 Summary:');
  console.log(`   Title:  ${title}`);
  console.log(`   Artist: ${artist}`);
  console.log(`   Album:  ${album}`);

  const confirmed = await confirm({
    message: 'Apply and save?',
    default: true,
  });

  return confirmed ? { title, artist, album } : null;
}

export function confirmRestore(song: Song): Promise<boolean> {
  return confirm({
    message: `Undo all edits and crops to '${song.metadata.title}'?`,
    default: false,
  });
}

export function confirmDelete(song: Song): Promise<boolean> {
  return confirm({
    message: `Permanently delete '${song.metadata.title}' and any modifications made to it?`,
    default: false,
  });
}
