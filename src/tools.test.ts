import { describe, it, expect } from 'vitest';
import { buildFetchArgs, buildTrimArgs, createLineSplitter } from './tools.js';

describe('createLineSplitter', () => {
  it('joins partial chunks and drops blank lines', () => {
    const lines: string[] = [];
    const splitter = createLineSplitter((line) => lines.push(line));

    splitter.push('a\nb');
    splitter.push('c\r\n\n  d  \n');
    splitter.push('tail');
    splitter.flush();

    expect(lines).toEqual(['a', 'bc', 'd', 'tail']);
  });

  it('splits carriage-return progress updates', () => {
    const lines: string[] = [];
    const splitter = createLineSplitter((line) => lines.push(line));

    splitter.push('[download]  10.0%\r[download]  20.0%\r');

    expect(lines).toEqual(['[download]  10.0%', '[download]  20.0%']);
  });
});

describe('tool arguments', () => {
  it('trims with a stream copy between two offsets', () => {
    expect(buildTrimArgs(1.5, 90, '/lib/a.mp3.original', '/lib/a.mp3')).toEqual([
      '-ss', '1.5',
      '-to', '90',
      '-i', '/lib/a.mp3.original',
      '-y',
      '-acodec', 'copy',
      '/lib/a.mp3',
    ]);
  });

  it('asks the fetcher for mp3 audio, a thumbnail and an info file', () => {
    expect(buildFetchArgs('/lib/abc.%(ext)s', 'https://youtube.com/watch?v=abc')).toEqual([
      '--extract-audio',
      '--audio-format', 'mp3',
      '--write-thumbnail',
      '--write-info-json',
      '--newline',
      '--output', '/lib/abc.%(ext)s',
      'https://youtube.com/watch?v=abc',
    ]);
  });
});
