import { access, readFile, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { SongMetadata, SongTools, ToolRunner } from './types.js';
import {
  DownloadMissingError,
  ExternalToolError,
  InfoJsonTimeoutError,
  ThumbnailMissingError,
  wrapIo,
} from './errors.js';
import type { FetchTask } from './source-id.js';
import type { DownloadProgress } from './progress.js';
import { Song, defaultSongTools } from './song.js';
import { UNKNOWN_ALBUM, UNKNOWN_ARTIST, writeSongMetadata } from './song-metadata.js';
import { THUMBNAIL_EXTENSIONS, convertThumbnail, findThumbnail } from './thumbnail.js';
import { buildFetchArgs, spawnRunner } from './tools.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('ingest');

const INFO_JSON_LINE = /Writing video metadata as JSON to:\s*(.+)$/;
const PROGRESS_LINE = /(\d+(?:\.\d+)?)%/;

const POLL_INITIAL_DELAY_MS = 25;
const POLL_MAX_DELAY_MS = 400;

export const DEFAULT_INFO_JSON_TIMEOUT_MS = 10_000;

export interface IngestOptions {
  libraryPath: string;
  runner?: ToolRunner;
  fetchCommand?: string;
  infoJsonTimeoutMs?: number;
  songTools?: SongTools;
  signal?: AbortSignal;
  /** Current time in unix seconds. */
  now?: () => number;
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(data: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = data[key];

    if (typeof value === 'string' && value.trim()) {
      return value;
    }
  }

  return null;
}

/**
 * Reads the fetch tool's info JSON. Album, art, flags and download time are
 * filled in later.
 */
export function parseInfoJson(text: string, fallbackSourceId: string): SongMetadata | null {
  let data: unknown;

  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }

  if (!isRecord(data)) {
    return null;
  }

  return {
    title: stringField(data, 'track', 'title') ?? fallbackSourceId,
    artist: stringField(data, 'artist', 'uploader', 'channel') ?? UNKNOWN_ARTIST,
    album: UNKNOWN_ALBUM,
    sourceId: stringField(data, 'id') ?? fallbackSourceId,
    albumArt: null,
    isCropped: false,
    isMetadataEdited: false,
    downloadUnixTime: 0,
  };
}

export function fallbackMetadata(sourceId: string): SongMetadata {
  return {
    title: sourceId,
    artist: UNKNOWN_ARTIST,
    album: UNKNOWN_ALBUM,
    sourceId,
    albumArt: null,
    isCropped: false,
    isMetadataEdited: false,
    downloadUnixTime: 0,
  };
}

/** Polls for a file the fetch tool has announced but may not have flushed yet. */
export async function waitForFile(
  filePath: string,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  let delay = POLL_INITIAL_DELAY_MS;

  for (;;) {
    try {
      await access(filePath);
      return;
    } catch {
      // not there yet
    }

    const remaining = deadline - Date.now();

    if (remaining <= 0) {
      throw new InfoJsonTimeoutError(filePath, timeoutMs);
    }

    await sleep(Math.min(delay, remaining), undefined, { signal });
    delay = Math.min(delay * 2, POLL_MAX_DELAY_MS);
  }
}

async function removeArtifacts(libraryPath: string, sourceId: string): Promise<void> {
  const paths = [
    join(libraryPath, `${sourceId}.info.json`),
    ...THUMBNAIL_EXTENSIONS.map((ext) => join(libraryPath, `${sourceId}.${ext}`)),
  ];

  await Promise.all(paths.map((path) => rm(path, { force: true })));
}

/**
 * Fetches one song into the library directory and tags it.
 *
 * Progress and metadata are published to `progress` while the fetch tool runs,
 * so they stay visible even when the fetch ultimately fails. The library is
 * not rescanned here.
 */
export async function ingest(
  task: FetchTask,
  progress: DownloadProgress,
  options: IngestOptions
): Promise<Song> {
  const {
    libraryPath,
    runner = spawnRunner,
    fetchCommand = 'yt-dlp',
    infoJsonTimeoutMs = DEFAULT_INFO_JSON_TIMEOUT_MS,
    songTools = defaultSongTools,
    signal,
    now = unixNow,
  } = options;
  const { sourceId } = task;
  const taskLog = log.child({ sourceId });

  let pendingMetadata: Promise<void> = Promise.resolve();
  const metadataErrors: unknown[] = [];

  const absorbInfoJson = async (infoPath: string): Promise<void> => {
    await waitForFile(infoPath, infoJsonTimeoutMs, signal);
    const text = await wrapIo('read', infoPath, () => readFile(infoPath, 'utf-8'));
    const metadata = parseInfoJson(text, sourceId);

    if (metadata) {
      progress.setMetadata(metadata);
    } else {
      taskLog.warn({ infoPath }, 'Ignoring unparseable info JSON');
    }

    await wrapIo('delete', infoPath, () => rm(infoPath, { force: true }));
  };

  const onLine = (line: string): void => {
    const infoMatch = INFO_JSON_LINE.exec(line);

    if (infoMatch) {
      const infoPath = resolve(libraryPath, infoMatch[1].trim());
      pendingMetadata = pendingMetadata
        .then(() => absorbInfoJson(infoPath))
        .catch((error: unknown) => {
          metadataErrors.push(error);
        });
      return;
    }

    const progressMatch = PROGRESS_LINE.exec(line);

    if (progressMatch) {
      progress.setPercent(Number(progressMatch[1]));
    }
  };

  try {
    taskLog.info('Starting download');

    const outputTemplate = join(libraryPath, `${sourceId}.%(ext)s`);
    const result = await runner.run(fetchCommand, buildFetchArgs(outputTemplate, task.url), {
      onLine,
      signal,
    });

    await pendingMetadata;

    if (result.exitCode !== 0) {
      throw new ExternalToolError(fetchCommand, result.exitCode, result.output);
    }

    if (metadataErrors.length > 0) {
      throw metadataErrors[0];
    }

    const audioPath = join(libraryPath, `${sourceId}.mp3`);

    try {
      await access(audioPath);
    } catch {
      throw new DownloadMissingError(audioPath);
    }

    const thumbnailPath = await findThumbnail(libraryPath, sourceId);

    if (thumbnailPath === null) {
      throw new ThumbnailMissingError(sourceId);
    }

    const albumArt = await convertThumbnail(thumbnailPath);
    const metadata: SongMetadata = {
      ...(progress.metadata ?? fallbackMetadata(sourceId)),
      albumArt,
      downloadUnixTime: now(),
    };

    await writeSongMetadata(audioPath, metadata);
    progress.setMetadata(metadata);
    progress.setPercent(100);

    taskLog.info({ audioPath, title: metadata.title }, 'Download complete');
    return new Song(audioPath, metadata, songTools);
  } catch (error) {
    if (signal?.aborted) {
      await removeArtifacts(libraryPath, sourceId);
    }

    taskLog.warn({ err: error }, 'Download failed');
    throw error;
  }
}
