import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import type { Settings, SortDirection } from './types.js';
import { IoError, isErrnoException, wrapIo } from './errors.js';
import { DEFAULT_INFO_JSON_TIMEOUT_MS } from './ingest.js';
import { isSortBy } from './sort.js';

export function defaultSettingsPath(): string {
  return process.env.TAPESHELF_SETTINGS ?? join(homedir(), '.config', 'tapeshelf', 'settings.json');
}

export function defaultSettings(): Settings {
  return {
    libraryPath: join(homedir(), 'Music', 'tapeshelf'),
    sortBy: 'downloaded',
    sortDirection: 'normal',
    fetchCommand: 'yt-dlp',
    trimCommand: 'ffmpeg',
    infoJsonTimeoutMs: DEFAULT_INFO_JSON_TIMEOUT_MS,
  };
}

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

function isSortDirection(value: unknown): value is SortDirection {
  return value === 'normal' || value === 'reverse';
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/** Merges whatever valid fields `raw` carries over the defaults. */
export function coerceSettings(raw: unknown): Settings {
  const settings = defaultSettings();

  if (typeof raw !== 'object' || raw === null) {
    return settings;
  }

  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  if (nonEmptyString(fields.libraryPath)) {
    settings.libraryPath = expandPath(fields.libraryPath);
  }

  if (typeof fields.sortBy === 'string' && isSortBy(fields.sortBy)) {
    settings.sortBy = fields.sortBy;
  }

  if (isSortDirection(fields.sortDirection)) {
    settings.sortDirection = fields.sortDirection;
  }

  if (nonEmptyString(fields.fetchCommand)) {
    settings.fetchCommand = fields.fetchCommand;
  }

  if (nonEmptyString(fields.trimCommand)) {
    settings.trimCommand = fields.trimCommand;
  }

  if (typeof fields.infoJsonTimeoutMs === 'number' && fields.infoJsonTimeoutMs > 0) {
    settings.infoJsonTimeoutMs = fields.infoJsonTimeoutMs;
  }

  return settings;
}

export async function saveSettings(
  settings: Settings,
  settingsPath: string = defaultSettingsPath()
): Promise<void> {
  await wrapIo('write settings', settingsPath, async () => {
    await mkdir(dirname(settingsPath), { recursive: true });
    await writeFile(settingsPath, JSON.stringify(settings, null, 2) + '\n');
  });
}

/**
 * Loads settings, writing the defaults first if the file does not exist.
 * Also makes sure the library directory exists.
 */
export async function loadSettings(settingsPath: string = defaultSettingsPath()): Promise<Settings> {
  let settings: Settings;

  try {
    const data = await readFile(settingsPath, 'utf-8');
    settings = coerceSettings(JSON.parse(data));
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw new IoError('load settings', settingsPath, error);
    }

    settings = defaultSettings();
    await saveSettings(settings, settingsPath);
  }

  await wrapIo('create library directory', settings.libraryPath, () =>
    mkdir(settings.libraryPath, { recursive: true })
  );

  return settings;
}
