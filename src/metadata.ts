import { parseFile } from 'music-metadata';
import { moduleLogger } from './logger.js';

const log = moduleLogger('metadata');

export async function probeDuration(filePath: string): Promise<number | null> {
  try {
    const metadata = await parseFile(filePath, { duration: true });
    return metadata.format.duration ?? null;
  } catch (error) {
    log.debug({ filePath, err: error }, 'Could not probe duration');
    return null;
  }
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) {
    return 'unknown';
  }

  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);

  return `${mins}:${secs.toString().padStart(2, '0')}`;
}

/**
 * Parses `90`, `90.5`, `1:30` or `1:01:30.25` into seconds.
 * Returns `null` for anything else.
 */
export function parseTimestamp(value: string): number | null {
  const parts = value.trim().split(':');

  if (parts.length > 3 || parts.some((part) => !/^\d+(\.\d+)?$/.test(part))) {
    return null;
  }

  return parts.reduce((total, part) => total * 60 + Number(part), 0);
}

export function formatDownloadTime(unixTime: number): string {
  if (unixTime === 0) {
    return 'unknown';
  }

  return new Date(unixTime * 1000).toISOString().slice(0, 16).replace('T', ' ');
}
