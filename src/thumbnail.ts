import { access, readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import sharp from 'sharp';
import type { AlbumArt } from './types.js';
import { ImageDecodeError, wrapIo } from './errors.js';

export const THUMBNAIL_EXTENSIONS = ['jpg', 'jpeg', 'webp', 'png'] as const;

export type ThumbnailExtension = (typeof THUMBNAIL_EXTENSIONS)[number];

export function isThumbnailExtension(ext: string): ext is ThumbnailExtension {
  return THUMBNAIL_EXTENSIONS.some((known) => known === ext);
}

const ART_MIME = 'image/jpeg';

export async function findThumbnail(dir: string, sourceId: string): Promise<string | null> {
  for (const ext of THUMBNAIL_EXTENSIONS) {
    const candidate = join(dir, `${sourceId}.${ext}`);

    try {
      await access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }

  return null;
}

/**
 * Re-encodes a thumbnail as JPEG cover art and deletes the source file.
 * The format is detected from the file's content; fetched thumbnails are
 * often saved under the wrong extension.
 */
export async function convertThumbnail(thumbnailPath: string): Promise<AlbumArt> {
  const source = await wrapIo('read thumbnail', thumbnailPath, () => readFile(thumbnailPath));
  let data: Buffer;

  try {
    data = await sharp(source).jpeg().toBuffer();
  } catch (error) {
    throw new ImageDecodeError(thumbnailPath, error);
  }

  await wrapIo('delete thumbnail', thumbnailPath, () => unlink(thumbnailPath));

  return { mime: ART_MIME, data };
}
