import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import sharp from 'sharp';
import { convertThumbnail, findThumbnail } from './thumbnail.js';
import { ImageDecodeError } from './errors.js';
import { makeTempDir } from './testing.js';

describe('thumbnails', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('finds thumbnails in extension priority order', async () => {
    await writeFile(join(dir, 'abc123.png'), 'png');
    await writeFile(join(dir, 'abc123.jpg'), 'jpg');

    expect(await findThumbnail(dir, 'abc123')).toBe(join(dir, 'abc123.jpg'));
    expect(await findThumbnail(dir, 'xyz789')).toBeNull();
  });

  it('converts by content and deletes the source file', async () => {
    const png = await sharp({
      create: { width: 6, height: 6, channels: 4, background: { r: 10, g: 20, b: 30, alpha: 1 } },
    })
      .png()
      .toBuffer();
    const path = join(dir, 'abc123.webp');
    await writeFile(path, png);

    const art = await convertThumbnail(path);

    expect(art.mime).toBe('image/jpeg');
    expect((await sharp(art.data).metadata()).format).toBe('jpeg');
    expect(await readdir(dir)).toEqual([]);
  });

  it('keeps the file when it cannot be decoded', async () => {
    const path = join(dir, 'abc123.jpg');
    await writeFile(path, 'definitely not pixels');

    await expect(convertThumbnail(path)).rejects.toBeInstanceOf(ImageDecodeError);
    expect(await readdir(dir)).toEqual(['abc123.jpg']);
  });
});
