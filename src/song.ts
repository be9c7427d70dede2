import { constants } from 'node:fs';
import { access, copyFile, rename, rm, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { MetadataEdits, SongMetadata, SongTools } from './types.js';
import {
  ExternalToolError,
  InvalidCropRangeError,
  IoError,
  isErrnoException,
  wrapIo,
} from './errors.js';
import { readSongMetadata, writeSongMetadata } from './song-metadata.js';
import { buildTrimArgs, spawnRunner } from './tools.js';
import { probeDuration } from './metadata.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('song');

export const ORIGINAL_COPY_SUFFIX = '.original';
export const CROP_OUTPUT_SUFFIX = '.cropping.mp3';

export const defaultSongTools: SongTools = {
  runner: spawnRunner,
  trimCommand: 'ffmpeg',
};

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function ensureAbsent(operation: string, path: string): Promise<void> {
  if (await exists(path)) {
    throw new IoError(
      operation,
      path,
      Object.assign(new Error('target already exists'), { code: 'EEXIST' })
    );
  }
}

function hiddenName(path: string): string {
  const name = basename(path);
  return name.startsWith('.') ? path : join(dirname(path), `.${name}`);
}

function visibleName(path: string): string {
  const name = basename(path);
  return name.startsWith('.') ? join(dirname(path), name.slice(1)) : path;
}

/**
 * One library entry: a working MP3 plus, once it has been modified, an
 * original copy beside it at `<path>.original`.
 *
 * Mutations on the same song are not serialized here; callers must not run
 * two of them at once.
 */
export class Song {
  constructor(
    public path: string,
    public metadata: SongMetadata,
    private readonly tools: SongTools = defaultSongTools
  ) {}

  get originalCopyPath(): string {
    return `${this.path}${ORIGINAL_COPY_SUFFIX}`;
  }

  hasOriginalCopy(): Promise<boolean> {
    return exists(this.originalCopyPath);
  }

  /**
   * Copies the working file to the original copy unless one already exists.
   * Resolves `true` when a copy was made.
   */
  async createOriginalCopy(): Promise<boolean> {
    try {
      await copyFile(this.path, this.originalCopyPath, constants.COPYFILE_EXCL);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return false;
      }

      throw new IoError('create original copy of', this.path, error);
    }

    log.info({ path: this.path }, 'Created original copy');
    return true;
  }

  /**
   * Trims the song to `[startSeconds, endSeconds]` of the original copy,
   * so repeated crops never compound.
   */
  async crop(startSeconds: number, endSeconds: number): Promise<void> {
    if (!Number.isFinite(startSeconds) || !Number.isFinite(endSeconds)) {
      throw new InvalidCropRangeError(startSeconds, endSeconds, 'offsets must be numbers');
    }

    if (startSeconds < 0) {
      throw new InvalidCropRangeError(startSeconds, endSeconds, 'start is negative');
    }

    if (endSeconds <= startSeconds) {
      throw new InvalidCropRangeError(startSeconds, endSeconds, 'end is not after start');
    }

    await this.createOriginalCopy();

    const { runner, trimCommand } = this.tools;
    const output = `${this.path}${CROP_OUTPUT_SUFFIX}`;
    const args = buildTrimArgs(startSeconds, endSeconds, this.originalCopyPath, output);

    log.info({ path: this.path, startSeconds, endSeconds }, 'Cropping');

    try {
      const result = await runner.run(trimCommand, args);

      if (result.exitCode !== 0) {
        throw new ExternalToolError(trimCommand, result.exitCode, result.output);
      }

      await wrapIo('replace', this.path, () => rename(output, this.path));
    } catch (error) {
      await rm(output, { force: true });
      throw error;
    }

    const next = { ...this.metadata, isCropped: true };
    await writeSongMetadata(this.path, next);
    this.metadata = next;
  }

  async editMetadata(edits: MetadataEdits = {}): Promise<void> {
    await this.createOriginalCopy();

    const next: SongMetadata = { ...this.metadata, ...edits, isMetadataEdited: true };
    await writeSongMetadata(this.path, next);
    this.metadata = next;
  }

  /** Copies the original copy back over the working file and reloads its metadata. */
  async restoreOriginal(): Promise<void> {
    await wrapIo('restore original copy of', this.path, () =>
      copyFile(this.originalCopyPath, this.path)
    );

    this.metadata = await readSongMetadata(this.path);
    log.info({ path: this.path }, 'Restored original copy');
  }

  async delete(): Promise<void> {
    await wrapIo('delete original copy', this.originalCopyPath, () =>
      rm(this.originalCopyPath, { force: true })
    );
    await wrapIo('delete', this.path, () => unlink(this.path));
    log.info({ path: this.path }, 'Deleted song');
  }

  isHidden(): boolean {
    return basename(this.path).startsWith('.');
  }

  hide(): Promise<void> {
    return this.moveTo(hiddenName(this.path));
  }

  unhide(): Promise<void> {
    return this.moveTo(visibleName(this.path));
  }

  isModified(): boolean {
    return this.metadata.isCropped || this.metadata.isMetadataEdited;
  }

  /** Length in seconds of the audio a crop cuts from, or `null` if it cannot be probed. */
  async cropSourceDuration(): Promise<number | null> {
    const source = (await this.hasOriginalCopy()) ? this.originalCopyPath : this.path;
    return probeDuration(source);
  }

  private async moveTo(target: string): Promise<void> {
    if (target === this.path) {
      return;
    }

    const originalCopy = this.originalCopyPath;
    const hadOriginalCopy = await exists(originalCopy);
    const originalCopyTarget = `${target}${ORIGINAL_COPY_SUFFIX}`;

    await ensureAbsent('rename', target);

    if (hadOriginalCopy) {
      await ensureAbsent('rename', originalCopyTarget);
    }

    await wrapIo('rename', this.path, () => rename(this.path, target));
    this.path = target;

    if (hadOriginalCopy) {
      await wrapIo('rename', originalCopy, () => rename(originalCopy, originalCopyTarget));
    }
  }
}
