#!/usr/bin/env node
import { mkdir } from 'node:fs/promises';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import type { Settings } from './types.js';
import { Library } from './library.js';
import { Downloader } from './downloader.js';
import type { DownloadHandle } from './downloader.js';
import { loadSettings, saveSettings, expandPath } from './settings.js';
import { sortSongs, reverseDirection, isSortBy, SORT_LABELS } from './sort.js';
import { spawnRunner } from './tools.js';
import { InvalidCropRangeError, toError } from './errors.js';
import { formatDownloadTime, formatDuration, parseTimestamp } from './metadata.js';
import {
  pickSong,
  describeSong,
  promptForEdits,
  confirmRestore,
  confirmDelete,
} from './prompts.js';

interface Context {
  settings: Settings;
  library: Library;
}

async function openLibrary(settings: Settings): Promise<Library> {
  const library = new Library(settings.libraryPath, {
    runner: spawnRunner,
    trimCommand: settings.trimCommand,
  });

  const spinner = ora(`Scanning ${settings.libraryPath}...`).start();

  try {
    await library.scan();
  } catch (error) {
    spinner.fail('Failed to scan library');
    throw error;
  }

  spinner.succeed(`Found ${library.size} songs`);
  return library;
}

async function runList({ settings, library }: Context): Promise<void> {
  const songs = sortSongs(library.songs(), settings.sortBy, settings.sortDirection);
  const direction = settings.sortDirection === 'reverse' ? ', reversed' : '';

  console.log(chalk.gray(`\nSorted by ${SORT_LABELS[settings.sortBy]}${direction}\n`));

  if (songs.length === 0) {
    console.log(chalk.yellow('No songs yet. Run "tapeshelf download <url>" to add one.'));
    return;
  }

  for (const song of songs) {
    const { album, sourceId, downloadUnixTime, isCropped, isMetadataEdited } = song.metadata;
    const flags = [isCropped ? 'cropped' : null, isMetadataEdited ? 'edited' : null]
      .filter(Boolean)
      .join(', ');

    console.log(describeSong(song));
    console.log(
      chalk.gray(`   ${album} | ${sourceId} | ${formatDownloadTime(downloadUnixTime)}`) +
        (flags ? chalk.yellow(` | ${flags}`) : '')
    );
  }
}

async function runDownload({ settings, library }: Context, inputs: string[]): Promise<void> {
  if (inputs.length === 0) {
    console.log(chalk.yellow('Usage: tapeshelf download <url or id>...'));
    return;
  }

  const downloader = new Downloader({
    libraryPath: library.path,
    runner: spawnRunner,
    fetchCommand: settings.fetchCommand,
    infoJsonTimeoutMs: settings.infoJsonTimeoutMs,
    songTools: { runner: spawnRunner, trimCommand: settings.trimCommand },
  });

  const multibar = new cliProgress.MultiBar({
    format: '|{bar}| {percentage}% | {label}',
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
  });

  const handles: DownloadHandle[] = [];

  for (const input of inputs) {
    const handle = downloader.start(input);

    if (handles.includes(handle)) {
      continue;
    }

    const id = handle.task.sourceId;
    const bar = multibar.create(100, 0, { label: `Looking up video info... (ID ${id})` });

    handle.progress.subscribe(({ percent, metadata }) => {
      const label = metadata ? `${metadata.title} (ID ${id})` : `Looking up video info... (ID ${id})`;
      bar.update(Math.round(percent), { label });
    });

    handles.push(handle);
  }

  await Promise.allSettled(handles.map((handle) => handle.result));
  multibar.stop();

  const failed = downloader.failures.length;
  console.log(chalk.green(`\n✓ ${handles.length - failed} download(s) complete`));

  for (const { task, error } of downloader.failures) {
    console.log(chalk.red(`  ✗ Download ${task.sourceId} failed: ${error.message}`));
  }

  await library.scan();
  console.log(chalk.gray(`Library now has ${library.size} songs`));

  if (failed > 0) {
    process.exitCode = 1;
  }
}

async function runCrop(context: Context, args: string[]): Promise<void> {
  const [sourceId, rawStart, rawEnd] = args.length >= 3 ? args : [undefined, ...args];

  if (rawStart === undefined || rawEnd === undefined) {
    console.log(chalk.yellow('Usage: tapeshelf crop [id] <start> <end>'));
    return;
  }

  const start = parseTimestamp(rawStart);
  const end = parseTimestamp(rawEnd);

  if (start === null || end === null) {
    console.log(chalk.red(`Could not read "${rawStart}" and "${rawEnd}" as times (use seconds or m:ss)`));
    process.exitCode = 1;
    return;
  }

  const song = await pickSong(context.library, context.settings, sourceId);
  const duration = await song.cropSourceDuration();

  if (duration !== null && end > duration) {
    throw new InvalidCropRangeError(start, end, `song is only ${formatDuration(duration)} long`);
  }

  const spinner = ora(`Cropping ${song.metadata.title}...`).start();

  try {
    await song.crop(start, end);
  } catch (error) {
    spinner.fail('Crop failed');
    throw error;
  }

  spinner.succeed(`Cropped to ${formatDuration(start)} - ${formatDuration(end)}`);
}

async function runEdit(context: Context, sourceId: string | undefined): Promise<void> {
  const song = await pickSong(context.library, context.settings, sourceId);
  const edits = await promptForEdits(song);

  if (!edits) {
    console.log(chalk.yellow('Edit cancelled.'));
    return;
  }

  await song.editMetadata(edits);
  console.log(chalk.green('✓ Metadata saved'));
}

async function runRestore(context: Context, sourceId: string | undefined): Promise<void> {
  const song = await pickSong(context.library, context.settings, sourceId);

  if (!song.isModified()) {
    console.log(chalk.yellow(`'${song.metadata.title}' has not been modified.`));
    return;
  }

  if (!(await confirmRestore(song))) {
    return;
  }

  await song.restoreOriginal();
  console.log(chalk.green(`✓ Restored '${song.metadata.title}'`));
}

async function runDelete(context: Context, sourceId: string | undefined): Promise<void> {
  const song = await pickSong(context.library, context.settings, sourceId);

  if (!(await confirmDelete(song))) {
    return;
  }

  await song.delete();
  console.log(chalk.green(`✓ Deleted '${song.metadata.title}'`));
}

async function runHide(context: Context, sourceId: string | undefined, hide: boolean): Promise<void> {
  const song = await pickSong(context.library, context.settings, sourceId);

  if (hide) {
    await song.hide();
  } else {
    await song.unhide();
  }

  console.log(chalk.green(`✓ '${song.metadata.title}' is now ${hide ? 'hidden' : 'visible'}`));
}

async function runSort(context: Context, sortBy: string | undefined): Promise<void> {
  if (sortBy === undefined || !isSortBy(sortBy)) {
    console.log(chalk.yellow(`Usage: tapeshelf sort <${Object.keys(SORT_LABELS).join('|')}>`));
    return;
  }

  context.settings.sortBy = sortBy;
  await saveSettings(context.settings);
  await runList(context);
}

async function runReverse(context: Context): Promise<void> {
  context.settings.sortDirection = reverseDirection(context.settings.sortDirection);
  await saveSettings(context.settings);
  await runList(context);
}

async function runLibraryPath(settings: Settings, path: string | undefined): Promise<void> {
  if (path === undefined) {
    console.log(settings.libraryPath);
    return;
  }

  settings.libraryPath = expandPath(path);
  await mkdir(settings.libraryPath, { recursive: true });
  await saveSettings(settings);
  console.log(chalk.green(`✓ Library is now ${settings.libraryPath}`));
}

async function runCleanup({ library }: Context): Promise<void> {
  const removed = await library.sweepLeftovers();

  if (removed.length === 0) {
    console.log(chalk.green('Nothing to clean up.'));
    return;
  }

  for (const path of removed) {
    console.log(chalk.gray(`  removed ${path}`));
  }

  console.log(chalk.green(`✓ Removed ${removed.length} leftover file(s)`));
}

async function main(argv: string[]): Promise<void> {
  const [command = 'list', ...args] = argv;
  const settings = await loadSettings();

  if (command === 'library') {
    await runLibraryPath(settings, args[0]);
    return;
  }

  const context: Context = { settings, library: await openLibrary(settings) };

  switch (command) {
    case 'list':
      return runList(context);
    case 'download':
      return runDownload(context, args);
    case 'crop':
      return runCrop(context, args);
    case 'edit':
      return runEdit(context, args[0]);
    case 'restore':
      return runRestore(context, args[0]);
    case 'delete':
      return runDelete(context, args[0]);
    case 'hide':
      return runHide(context, args[0], true);
    case 'unhide':
      return runHide(context, args[0], false);
    case 'sort':
      return runSort(context, args[0]);
    case 'reverse':
      return runReverse(context);
    case 'cleanup':
      return runCleanup(context);
    default:
      console.log(chalk.yellow(`Unknown command: ${command}`));
      console.log(
        chalk.gray(
          'Commands: list, download, crop, edit, restore, delete, hide, unhide, sort, reverse, library, cleanup'
        )
      );
      process.exitCode = 1;
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(chalk.red(toError(error).message));
  process.exitCode = 1;
});
