import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { access, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { coerceSettings, defaultSettings, loadSettings, saveSettings } from './settings.js';
import { IoError } from './errors.js';
import { makeTempDir } from './testing.js';

describe('settings', () => {
  let dir: string;
  let settingsPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    settingsPath = join(dir, 'config', 'settings.json');
    vi.stubEnv('HOME', dir);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the defaults when no file exists', async () => {
    const settings = await loadSettings(settingsPath);

    expect(settings).toEqual(defaultSettings());
    expect(settings.libraryPath).toBe(join(dir, 'Music', 'tapeshelf'));
    expect(JSON.parse(await readFile(settingsPath, 'utf-8'))).toEqual(settings);
    await expect(access(settings.libraryPath)).resolves.toBeUndefined();
  });

  it('merges a saved file over the defaults', async () => {
    await saveSettings(
      { ...defaultSettings(), libraryPath: join(dir, 'songs'), sortBy: 'title' },
      settingsPath
    );

    const settings = await loadSettings(settingsPath);

    expect(settings.libraryPath).toBe(join(dir, 'songs'));
    expect(settings.sortBy).toBe('title');
    expect(settings.fetchCommand).toBe('yt-dlp');
  });

  it('rejects a malformed file', async () => {
    await saveSettings(defaultSettings(), settingsPath);
    await writeFile(settingsPath, '{ not json');

    await expect(loadSettings(settingsPath)).rejects.toBeInstanceOf(IoError);
  });

  describe('coerceSettings', () => {
    it('ignores values of the wrong shape', () => {
      expect(
        coerceSettings({
          sortBy: 'size',
          sortDirection: 'up',
          fetchCommand: '',
          trimCommand: 7,
          infoJsonTimeoutMs: -5,
        })
      ).toEqual(defaultSettings());
      expect(coerceSettings('nonsense')).toEqual(defaultSettings());
    });

    it('expands a leading tilde in the library path', () => {
      expect(coerceSettings({ libraryPath: '~/songs' }).libraryPath).toBe(join(dir, 'songs'));
    });
  });
});
