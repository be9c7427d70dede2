export class TapeshelfError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class IoError extends TapeshelfError {
  constructor(
    readonly operation: string,
    readonly path: string,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, { cause });
  }

  get code(): string | undefined {
    if (this.cause instanceof Error && 'code' in this.cause && typeof this.cause.code === 'string') {
      return this.cause.code;
    }

    return undefined;
  }
}

export class TagReadError extends TapeshelfError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not read ID3 tag from ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class TagWriteError extends TapeshelfError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not write ID3 tag to ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class MissingRequiredFieldError extends TapeshelfError {
  constructor(readonly key: string) {
    super(`Missing required metadata item: ${key}`);
  }
}

export class ExternalToolError extends TapeshelfError {
  constructor(
    readonly tool: string,
    readonly exitCode: number | null,
    readonly output: string[]
  ) {
    const status = exitCode === null ? 'was terminated' : `exited with code ${exitCode}`;
    super(`${tool} ${status}`);
  }
}

export class ToolSpawnError extends TapeshelfError {
  constructor(readonly tool: string, cause: unknown) {
    const message = isErrnoException(cause) && cause.code === 'ENOENT'
      ? `${tool} is not installed or not on PATH`
      : `Could not start ${tool}: ${describeCause(cause)}`;

    super(message, { cause });
  }
}

export class DownloadMissingError extends TapeshelfError {
  constructor(readonly expectedPath: string) {
    super(`Download finished but no audio file was found at ${expectedPath}`);
  }
}

export class ThumbnailMissingError extends TapeshelfError {
  constructor(readonly sourceId: string) {
    super(`Download finished but no thumbnail was found for ${sourceId}`);
  }
}

export class ImageDecodeError extends TapeshelfError {
  constructor(readonly path: string, cause: unknown) {
    super(`Could not decode image ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class InfoJsonTimeoutError extends TapeshelfError {
  constructor(readonly path: string, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${path}`);
  }
}

export class InvalidCropRangeError extends TapeshelfError {
  constructor(readonly start: number, readonly end: number, reason: string) {
    super(`Invalid crop range ${start}s to ${end}s: ${reason}`);
  }
}

export class DownloadCancelledError extends TapeshelfError {
  constructor(readonly sourceId: string) {
    super(`Download of ${sourceId} was cancelled`);
  }
}

export class SongNotFoundError extends TapeshelfError {
  constructor(readonly sourceId: string) {
    super(`No song with source id ${sourceId} in the library`);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export async function wrapIo<T>(
  operation: string,
  path: string,
  action: () => Promise<T>
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new IoError(operation, path, error);
  }
}
