import { spawn } from 'node:child_process';
import type { RunOptions, ToolResult, ToolRunner } from './types.js';
import { ToolSpawnError } from './errors.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('tools');

const OUTPUT_TAIL_LINES = 50;

export interface LineSplitter {
  push(chunk: string): void;
  flush(): void;
}

/** Buffers partial chunks and emits complete, trimmed, non-empty lines. */
export function createLineSplitter(onLine: (line: string) => void): LineSplitter {
  let buffer = '';

  const emit = (raw: string): void => {
    const line = raw.trim();

    if (line) {
      onLine(line);
    }
  };

  return {
    push(chunk) {
      buffer += chunk;
      const lines = buffer.split(/\r?\n|\r/);
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        emit(line);
      }
    },
    flush() {
      emit(buffer);
      buffer = '';
    },
  };
}

export const spawnRunner: ToolRunner = {
  run(command: string, args: string[], options: RunOptions = {}): Promise<ToolResult> {
    return new Promise((resolve, reject) => {
      log.debug({ command, args }, 'Spawning tool');

      const proc = spawn(command, args, { signal: options.signal });
      const output: string[] = [];

      const record = (line: string): void => {
        output.push(line);

        if (output.length > OUTPUT_TAIL_LINES) {
          output.shift();
        }
      };

      const stdout = createLineSplitter((line) => {
        record(line);
        options.onLine?.(line);
      });
      const stderr = createLineSplitter(record);

      proc.stdout.setEncoding('utf-8');
      proc.stderr.setEncoding('utf-8');
      proc.stdout.on('data', (data: string) => stdout.push(data));
      proc.stderr.on('data', (data: string) => stderr.push(data));

      proc.on('close', (code) => {
        stdout.flush();
        stderr.flush();
        log.debug({ command, code }, 'Tool exited');
        resolve({ exitCode: code, output });
      });

      proc.on('error', (err) => {
        if (options.signal?.aborted) {
          reject(options.signal.reason);
          return;
        }

        reject(new ToolSpawnError(command, err));
      });
    });
  },
};

export function buildTrimArgs(
  startSeconds: number,
  endSeconds: number,
  inputPath: string,
  outputPath: string
): string[] {
  return [
    '-ss', startSeconds.toString(),
    '-to', endSeconds.toString(),
    '-i', inputPath,
    '-y',
    '-acodec', 'copy',
    outputPath,
  ];
}

export function buildFetchArgs(outputTemplate: string, url: string): string[] {
  return [
    '--extract-audio',
    '--audio-format', 'mp3',
    '--write-thumbnail',
    '--write-info-json',
    '--newline',
    '--output', outputTemplate,
    url,
  ];
}
