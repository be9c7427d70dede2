const WATCH_URL = /(?:^|\/\/|\.)youtube\.com\/watch\?(?:[^#]*&)?v=([\w-]+)/;
const SHORT_URL = /(?:^|\/\/)youtu\.be\/([\w-]+)/;

/**
 * Pulls the video id out of a pasted `youtube.com/watch?v=` or `youtu.be/`
 * link. Anything else is taken to be an id already.
 */
export function extractSourceId(input: string): string {
  const match = WATCH_URL.exec(input) ?? SHORT_URL.exec(input);
  return match ? match[1] : input;
}

/** One requested fetch. Two tasks are the same fetch when their ids match. */
export class FetchTask {
  constructor(readonly sourceId: string) {}

  get url(): string {
    return `https://youtube.com/watch?v=${this.sourceId}`;
  }

  equals(other: FetchTask): boolean {
    return this.sourceId === other.sourceId;
  }
}
