import type { IngestOptions } from './ingest.js';
import { ingest } from './ingest.js';
import { DownloadProgress } from './progress.js';
import { FetchTask, extractSourceId } from './source-id.js';
import type { Song } from './song.js';
import { DownloadCancelledError, toError } from './errors.js';

export interface DownloadHandle {
  task: FetchTask;
  progress: DownloadProgress;
  result: Promise<Song>;
  cancel(): void;
}

export interface DownloadFailure {
  task: FetchTask;
  error: Error;
}

export interface DownloaderOptions extends Omit<IngestOptions, 'signal'> {
  /** Called once per download when it finishes, e.g. to rescan the library. */
  onSettled?: (task: FetchTask, error: Error | null) => void;
}

/**
 * Tracks the downloads currently running and the ones that failed.
 * Requesting an id that is already downloading returns the running download.
 */
export class Downloader {
  private readonly active = new Map<string, DownloadHandle>();
  private failureList: DownloadFailure[] = [];

  constructor(private readonly options: DownloaderOptions) {}

  get inProgress(): DownloadHandle[] {
    return [...this.active.values()];
  }

  get failures(): readonly DownloadFailure[] {
    return this.failureList;
  }

  activeIds(): Set<string> {
    return new Set(this.active.keys());
  }

  start(input: string): DownloadHandle {
    const task = new FetchTask(extractSourceId(input));
    const existing = this.active.get(task.sourceId);

    if (existing) {
      return existing;
    }

    const { onSettled, ...ingestOptions } = this.options;
    const controller = new AbortController();
    const progress = new DownloadProgress();
    const result = ingest(task, progress, { ...ingestOptions, signal: controller.signal });

    const handle: DownloadHandle = {
      task,
      progress,
      result,
      cancel: () => controller.abort(new DownloadCancelledError(task.sourceId)),
    };

    this.active.set(task.sourceId, handle);

    void result.then(
      () => this.settle(task, null),
      (error: unknown) => this.settle(task, toError(error))
    );

    return handle;
  }

  dismissFailures(): void {
    this.failureList = [];
  }

  private settle(task: FetchTask, error: Error | null): void {
    this.active.delete(task.sourceId);

    if (error) {
      this.failureList.push({ task, error });
    }

    this.options.onSettled?.(task, error);
  }
}
