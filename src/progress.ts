import type { ProgressSnapshot, SongMetadata } from './types.js';

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

/**
 * Live state of one download. The ingestion pipeline is the only writer;
 * anything may read it or subscribe to changes.
 */
export class DownloadProgress {
  private currentPercent = 0;
  private currentMetadata: SongMetadata | null = null;
  private readonly listeners = new Set<ProgressListener>();

  get percent(): number {
    return this.currentPercent;
  }

  get metadata(): SongMetadata | null {
    return this.currentMetadata;
  }

  setPercent(percent: number): void {
    this.currentPercent = Math.min(100, Math.max(0, percent));
    this.notify();
  }

  setMetadata(metadata: SongMetadata): void {
    this.currentMetadata = metadata;
    this.notify();
  }

  snapshot(): ProgressSnapshot {
    return { percent: this.currentPercent, metadata: this.currentMetadata };
  }

  /** Returns a function that removes the listener. */
  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const snapshot = this.snapshot();

    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
