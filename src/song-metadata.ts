import NodeID3 from 'node-id3';
import type { AlbumArt, SongMetadata } from './types.js';
import { TagReadError, TagWriteError } from './errors.js';
import {
  SOURCE_ID_FIELD,
  CROPPED_FIELD,
  METADATA_EDITED_FIELD,
  DOWNLOAD_TIME_FIELD,
  readField,
  writeField,
} from './tag-codec.js';

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_ALBUM = 'Unknown Album';

const FRONT_COVER = 3;

function readAlbumArt(tags: NodeID3.Tags): AlbumArt | null {
  const image = tags.image;

  if (!image || typeof image === 'string') {
    return null;
  }

  return { mime: image.mime, data: image.imageBuffer };
}

/**
 * Decodes a tag into song metadata. Throws `MissingRequiredFieldError` when the
 * tag carries no source id, which marks a file this library did not create.
 */
export function metadataFromTags(tags: NodeID3.Tags): SongMetadata {
  return {
    sourceId: readField(tags, SOURCE_ID_FIELD),
    title: tags.title || UNKNOWN_TITLE,
    artist: tags.artist || UNKNOWN_ARTIST,
    album: tags.album || UNKNOWN_ALBUM,
    albumArt: readAlbumArt(tags),
    isCropped: readField(tags, CROPPED_FIELD),
    isMetadataEdited: readField(tags, METADATA_EDITED_FIELD),
    downloadUnixTime: readField(tags, DOWNLOAD_TIME_FIELD),
  };
}

export function metadataIntoTags(metadata: SongMetadata): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    title: metadata.title,
    artist: metadata.artist,
    album: metadata.album,
  };

  if (metadata.albumArt) {
    tags.image = {
      mime: metadata.albumArt.mime,
      type: { id: FRONT_COVER, name: 'front cover' },
      description: 'Cover',
      imageBuffer: metadata.albumArt.data,
    };
  }

  writeField(tags, SOURCE_ID_FIELD, metadata.sourceId);
  writeField(tags, CROPPED_FIELD, metadata.isCropped);
  writeField(tags, METADATA_EDITED_FIELD, metadata.isMetadataEdited);
  writeField(tags, DOWNLOAD_TIME_FIELD, metadata.downloadUnixTime);

  return tags;
}

export async function readTags(filePath: string): Promise<NodeID3.Tags> {
  let tags: NodeID3.Tags;

  try {
    tags = NodeID3.read(filePath);
  } catch (error) {
    throw new TagReadError(filePath, error);
  }

  if (tags instanceof Error) {
    throw new TagReadError(filePath, tags);
  }

  return tags;
}

export async function readSongMetadata(filePath: string): Promise<SongMetadata> {
  const tags = await readTags(filePath);
  return metadataFromTags(tags);
}

/** Replaces the file's whole ID3 tag with one built from `metadata`. */
export async function writeSongMetadata(filePath: string, metadata: SongMetadata): Promise<void> {
  let result: unknown;

  try {
    result = NodeID3.write(metadataIntoTags(metadata), filePath);
  } catch (error) {
    throw new TagWriteError(filePath, error);
  }

  if (result !== true) {
    throw new TagWriteError(filePath, result);
  }
}
