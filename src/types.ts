export interface AlbumArt {
  mime: string;
  data: Buffer;
}

export interface SongMetadata {
  title: string;
  artist: string;
  album: string;
  sourceId: string;
  albumArt: AlbumArt | null;
  isCropped: boolean;
  isMetadataEdited: boolean;
  downloadUnixTime: number;
}

export type EditableField = 'title' | 'artist' | 'album';

export type MetadataEdits = Partial<Pick<SongMetadata, EditableField>>;

export type SortBy = 'title' | 'artist' | 'album' | 'downloaded';

export type SortDirection = 'normal' | 'reverse';

export interface Settings {
  libraryPath: string;
  sortBy: SortBy;
  sortDirection: SortDirection;
  fetchCommand: string;
  trimCommand: string;
  infoJsonTimeoutMs: number;
}

export interface ToolResult {
  exitCode: number | null;
  output: string[];
}

export interface RunOptions {
  onLine?: (line: string) => void;
  signal?: AbortSignal;
}

export interface ToolRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ToolResult>;
}

export interface SongTools {
  runner: ToolRunner;
  trimCommand: string;
}

export interface ProgressSnapshot {
  percent: number;
  metadata: SongMetadata | null;
}
