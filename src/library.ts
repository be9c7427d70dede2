import { readdir, rm } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { SongTools } from './types.js';
import { MissingRequiredFieldError, TagReadError, wrapIo } from './errors.js';
import { readSongMetadata } from './song-metadata.js';
import { CROP_OUTPUT_SUFFIX, Song, defaultSongTools } from './song.js';
import { isThumbnailExtension } from './thumbnail.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('library');

const AUDIO_EXTENSION = '.mp3';
const INFO_JSON_SUFFIX = '.info.json';

function leftoverSourceId(name: string): string | null {
  if (name.endsWith(INFO_JSON_SUFFIX)) {
    return name.slice(0, -INFO_JSON_SUFFIX.length);
  }

  const ext = extname(name).slice(1).toLowerCase();

  if (isThumbnailExtension(ext)) {
    return name.slice(0, -(ext.length + 1));
  }

  return null;
}

/**
 * A flat directory of downloaded songs. `songs()` serves the snapshot taken by
 * the last `scan()`; it does not notice later changes on disk.
 */
export class Library {
  private loadedSongs: readonly Song[] = [];

  constructor(
    readonly path: string,
    private readonly tools: SongTools = defaultSongTools
  ) {}

  get size(): number {
    return this.loadedSongs.length;
  }

  /**
   * Rebuilds the snapshot from the MP3 files at the root of the directory.
   * Files without a source id were not created by this library and are skipped.
   */
  async scan(): Promise<void> {
    const entries = await wrapIo('read library directory', this.path, () =>
      readdir(this.path, { withFileTypes: true })
    );

    const names = entries
      .filter(
        (entry) =>
          entry.isFile() &&
          extname(entry.name).toLowerCase() === AUDIO_EXTENSION &&
          !entry.name.endsWith(CROP_OUTPUT_SUFFIX)
      )
      .map((entry) => entry.name)
      .sort();

    const songs: Song[] = [];
    let skipped = 0;

    for (const name of names) {
      const filePath = join(this.path, name);

      try {
        const metadata = await readSongMetadata(filePath);
        songs.push(new Song(filePath, metadata, this.tools));
      } catch (error) {
        if (error instanceof TagReadError || error instanceof MissingRequiredFieldError) {
          skipped++;
          log.debug({ filePath, reason: error.message }, 'Skipping file');
          continue;
        }

        throw error;
      }
    }

    this.loadedSongs = songs;
    log.info({ path: this.path, songs: songs.length, skipped }, 'Scanned library');
  }

  songs(): Iterable<Song> {
    const snapshot = this.loadedSongs;

    return {
      *[Symbol.iterator]() {
        yield* snapshot;
      },
    };
  }

  findBySourceId(sourceId: string): Song | undefined {
    return this.loadedSongs.find((song) => song.metadata.sourceId === sourceId);
  }

  /**
   * Deletes info JSON and thumbnail files left behind by interrupted downloads.
   * Files belonging to ids in `activeIds` are kept.
   */
  async sweepLeftovers(activeIds: ReadonlySet<string> = new Set()): Promise<string[]> {
    const names = await wrapIo('read library directory', this.path, () => readdir(this.path));
    const removed: string[] = [];

    for (const name of names.sort()) {
      const sourceId = leftoverSourceId(name);

      if (sourceId === null || activeIds.has(sourceId)) {
        continue;
      }

      const filePath = join(this.path, name);
      await wrapIo('delete', filePath, () => rm(filePath, { force: true }));
      removed.push(filePath);
    }

    if (removed.length > 0) {
      log.info({ removed }, 'Swept ingestion leftovers');
    }

    return removed;
  }
}
