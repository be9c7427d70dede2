import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RunOptions, SongMetadata, ToolResult, ToolRunner } from './types.js';
import { writeSongMetadata } from './song-metadata.js';

// Not a real MPEG stream; node-id3 only needs bytes to prepend a tag to.
export const FAKE_AUDIO = Buffer.from('fake mpeg audio frames');

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'tapeshelf-'));
}

export function sampleMetadata(overrides: Partial<SongMetadata> = {}): SongMetadata {
  return {
    title: 'Night Drive',
    artist: 'Placeholder Band',
    album: 'Test Album',
    sourceId: 'abc123',
    albumArt: null,
    isCropped: false,
    isMetadataEdited: false,
    downloadUnixTime: 1700000000,
    ...overrides,
  };
}

export async function writeSongFile(filePath: string, metadata: SongMetadata): Promise<void> {
  await writeFile(filePath, FAKE_AUDIO);
  await writeSongMetadata(filePath, metadata);
}

export type FakeScript = (
  emit: (line: string) => void,
  args: string[],
  signal?: AbortSignal
) => Promise<number | null>;

/** Stands in for an external tool: records each call and runs `script` instead. */
export class FakeRunner implements ToolRunner {
  readonly calls: Array<{ command: string; args: string[] }> = [];

  constructor(private readonly script: FakeScript) {}

  async run(command: string, args: string[], options: RunOptions = {}): Promise<ToolResult> {
    this.calls.push({ command, args });
    const exitCode = await this.script((line) => options.onLine?.(line), args, options.signal);
    return { exitCode, output: [] };
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });

  return { promise, resolve };
}
