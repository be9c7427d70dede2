import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Song } from './song.js';
import { readSongMetadata } from './song-metadata.js';
import { buildTrimArgs } from './tools.js';
import { ExternalToolError, InvalidCropRangeError, IoError } from './errors.js';
import { FakeRunner, makeTempDir, sampleMetadata, writeSongFile } from './testing.js';

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('Song', () => {
  let dir: string;
  let songPath: string;
  let originalBytes: Buffer;
  let trimInputs: Buffer[];
  let trimExitCode: number;
  let runner: FakeRunner;
  let song: Song;

  beforeEach(async () => {
    dir = await makeTempDir();
    songPath = join(dir, 'abc123.mp3');
    await writeSongFile(songPath, sampleMetadata());
    originalBytes = await readFile(songPath);

    trimInputs = [];
    trimExitCode = 0;
    runner = new FakeRunner(async (_emit, args) => {
      const input = args[args.indexOf('-i') + 1];
      const start = args[args.indexOf('-ss') + 1];
      const end = args[args.indexOf('-to') + 1];
      const output = args[args.length - 1];

      trimInputs.push(await readFile(input));

      if (trimExitCode === 0) {
        await writeFile(output, `trimmed ${start}-${end}`);
      }

      return trimExitCode;
    });

    song = new Song(songPath, sampleMetadata(), { runner, trimCommand: 'ffmpeg' });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('createOriginalCopy', () => {
    it('copies the working file once and never overwrites the copy', async () => {
      expect(await song.createOriginalCopy()).toBe(true);

      await writeFile(songPath, 'changed since');

      expect(await song.createOriginalCopy()).toBe(false);
      expect(await readFile(song.originalCopyPath)).toEqual(originalBytes);
    });
  });

  describe('crop', () => {
    it('trims from the original copy into the working file', async () => {
      await song.crop(10, 50);

      expect(runner.calls).toEqual([
        {
          command: 'ffmpeg',
          args: buildTrimArgs(10, 50, `${songPath}.original`, `${songPath}.cropping.mp3`),
        },
      ]);
      expect(song.metadata.isCropped).toBe(true);
      expect(await readSongMetadata(songPath)).toEqual(sampleMetadata({ isCropped: true }));
    });

    it('derives every crop from the original rather than the previous crop', async () => {
      await song.crop(10, 50);
      await song.crop(5, 20);

      expect(runner.calls[1].args).toEqual(
        buildTrimArgs(5, 20, `${songPath}.original`, `${songPath}.cropping.mp3`)
      );
      expect(trimInputs).toEqual([originalBytes, originalBytes]);

      const working = await readFile(songPath);
      expect(working.includes('trimmed 5-20')).toBe(true);
      expect(working.includes('trimmed 10-50')).toBe(false);
    });

    it('keeps the flags unchanged when the trim tool fails', async () => {
      trimExitCode = 1;

      const failure = song.crop(10, 50);

      await expect(failure).rejects.toBeInstanceOf(ExternalToolError);
      await expect(failure).rejects.toMatchObject({ tool: 'ffmpeg', exitCode: 1 });
      expect(song.metadata.isCropped).toBe(false);
      expect((await readSongMetadata(songPath)).isCropped).toBe(false);
    });

    it('leaves the working file intact when the trim tool dies mid-write', async () => {
      const truncating = new FakeRunner(async (_emit, args) => {
        await writeFile(args[args.length - 1], '');
        return 1;
      });
      const fragile = new Song(songPath, sampleMetadata(), {
        runner: truncating,
        trimCommand: 'ffmpeg',
      });

      await expect(fragile.crop(10, 50)).rejects.toBeInstanceOf(ExternalToolError);

      expect(await readFile(songPath)).toEqual(originalBytes);
      expect(await readSongMetadata(songPath)).toEqual(sampleMetadata());
      expect((await readdir(dir)).sort()).toEqual(['abc123.mp3', 'abc123.mp3.original']);
    });

    it('rejects an empty range before touching any file', async () => {
      await expect(song.crop(20, 20)).rejects.toBeInstanceOf(InvalidCropRangeError);
      await expect(song.crop(-1, 20)).rejects.toBeInstanceOf(InvalidCropRangeError);

      expect(runner.calls).toEqual([]);
      expect(await song.hasOriginalCopy()).toBe(false);
    });
  });

  describe('editMetadata', () => {
    it('saves the edits, sets the flag and keeps an original copy', async () => {
      await song.editMetadata({ title: 'Renamed', album: 'Other Album' });

      const expected = sampleMetadata({
        title: 'Renamed',
        album: 'Other Album',
        isMetadataEdited: true,
      });

      expect(song.metadata).toEqual(expected);
      expect(await readSongMetadata(songPath)).toEqual(expected);
      expect(await readFile(song.originalCopyPath)).toEqual(originalBytes);
      expect(song.isModified()).toBe(true);
    });
  });

  describe('restoreOriginal', () => {
    it('puts the original bytes back and keeps the copy for later restores', async () => {
      await song.editMetadata({ title: 'Renamed' });
      await song.crop(1, 2);

      await song.restoreOriginal();

      expect(await readFile(songPath)).toEqual(originalBytes);
      expect(song.metadata).toEqual(sampleMetadata());
      expect(song.isModified()).toBe(false);
      expect(await song.hasOriginalCopy()).toBe(true);
    });

    it('fails when there is no original copy', async () => {
      await expect(song.restoreOriginal()).rejects.toBeInstanceOf(IoError);
    });
  });

  describe('delete', () => {
    it('removes the working file and the original copy', async () => {
      await song.editMetadata({ title: 'Renamed' });

      await song.delete();

      expect(await readdir(dir)).toEqual([]);
    });

    it('does not mind a missing original copy', async () => {
      await song.delete();

      expect(await readdir(dir)).toEqual([]);
    });
  });

  describe('hide and unhide', () => {
    it('moves the working file and original copy behind a dot prefix', async () => {
      await song.createOriginalCopy();

      await song.hide();

      expect(song.path).toBe(join(dir, '.abc123.mp3'));
      expect(song.isHidden()).toBe(true);
      expect((await readdir(dir)).sort()).toEqual(['.abc123.mp3', '.abc123.mp3.original']);

      await song.unhide();

      expect(song.path).toBe(songPath);
      expect(song.isHidden()).toBe(false);
      expect((await readdir(dir)).sort()).toEqual(['abc123.mp3', 'abc123.mp3.original']);
    });

    it('refuses to hide over an existing hidden file', async () => {
      const hiddenPath = join(dir, '.abc123.mp3');
      await writeFile(hiddenPath, 'another song');

      const failure = song.hide();

      await expect(failure).rejects.toBeInstanceOf(IoError);
      await expect(failure).rejects.toMatchObject({ code: 'EEXIST', path: hiddenPath });
      expect(song.path).toBe(songPath);
      expect(await readFile(songPath)).toEqual(originalBytes);
      expect(await readFile(hiddenPath, 'utf-8')).toBe('another song');
    });

    it('refuses to unhide over a fresh download of the same id', async () => {
      const hiddenPath = join(dir, '.abc123.mp3');
      await writeSongFile(hiddenPath, sampleMetadata());
      await writeFile(songPath, 'freshly downloaded copy');
      const hidden = new Song(hiddenPath, sampleMetadata(), { runner, trimCommand: 'ffmpeg' });

      await expect(hidden.unhide()).rejects.toMatchObject({ code: 'EEXIST', path: songPath });

      expect(hidden.path).toBe(hiddenPath);
      expect(await readFile(songPath, 'utf-8')).toBe('freshly downloaded copy');
      expect((await readdir(dir)).sort()).toEqual(['.abc123.mp3', 'abc123.mp3']);
    });

    it('moves nothing when the original copy would land on another file', async () => {
      await song.createOriginalCopy();
      const otherCopy = join(dir, '.abc123.mp3.original');
      await writeFile(otherCopy, 'another backup');

      await expect(song.hide()).rejects.toMatchObject({ code: 'EEXIST', path: otherCopy });

      expect(song.path).toBe(songPath);
      expect((await readdir(dir)).sort()).toEqual([
        '.abc123.mp3.original',
        'abc123.mp3',
        'abc123.mp3.original',
      ]);
    });

    it('does nothing when already in the requested state', async () => {
      await song.unhide();

      expect(song.path).toBe(songPath);
      expect(await fileExists(songPath)).toBe(true);
    });
  });

  it('is unmodified until cropped or edited', () => {
    expect(song.isModified()).toBe(false);
  });
});
