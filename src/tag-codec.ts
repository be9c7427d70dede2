import type NodeID3 from 'node-id3';
import { MissingRequiredFieldError } from './errors.js';

/**
 * Custom application state lives in ID3 user-defined text frames (TXXX).
 * The frame description is the field key and the frame value is the encoded
 * form of the field's value. A field is "unset" when its frame is absent.
 */
export type MissingPolicy<T> =
  | { kind: 'required' }
  | { kind: 'default'; value: T };

export interface TagField<T> {
  readonly key: string;
  /** Returning `null` removes the frame instead of writing it. */
  encode(value: T): string | null;
  decode(text: string): T;
  readonly whenMissing: MissingPolicy<T>;
}

const KEY_PREFIX = '[tapeshelf]';

// node-id3 drops TXXX frames with an empty value, so present flags carry a marker
const FLAG_MARKER = '1';

function flagField(name: string): TagField<boolean> {
  return {
    key: `${KEY_PREFIX} ${name}`,
    encode: (value) => (value ? FLAG_MARKER : null),
    decode: () => true,
    whenMissing: { kind: 'default', value: false },
  };
}

export const SOURCE_ID_FIELD: TagField<string> = {
  key: `${KEY_PREFIX} Source ID`,
  encode: (value) => value,
  decode: (text) => text,
  whenMissing: { kind: 'required' },
};

export const CROPPED_FIELD = flagField('Cropped');

export const METADATA_EDITED_FIELD = flagField('Metadata edited');

export const DOWNLOAD_TIME_FIELD: TagField<number> = {
  key: `${KEY_PREFIX} Download time`,
  encode: (value) => (value === 0 ? null : String(Math.trunc(value))),
  decode: (text) => {
    const parsed = Number.parseInt(text, 10);
    return Number.isFinite(parsed) ? parsed : 0;
  },
  whenMissing: { kind: 'default', value: 0 },
};

export function writeField<T>(tags: NodeID3.Tags, field: TagField<T>, value: T): void {
  const remaining = (tags.userDefinedText ?? []).filter(
    (frame) => frame.description !== field.key
  );
  const text = field.encode(value);

  if (text !== null) {
    remaining.push({ description: field.key, value: text });
  }

  if (remaining.length > 0) {
    tags.userDefinedText = remaining;
  } else {
    delete tags.userDefinedText;
  }
}

export function readField<T>(tags: NodeID3.Tags, field: TagField<T>): T {
  const frame = (tags.userDefinedText ?? []).find(
    (candidate) => candidate.description === field.key
  );

  if (frame) {
    return field.decode(frame.value);
  }

  if (field.whenMissing.kind === 'required') {
    throw new MissingRequiredFieldError(field.key);
  }

  return field.whenMissing.value;
}
