/**
 * Tag conventions shared by the latching engine and the senders.
 *
 * Tags travel as strings of the form `key<tagDelimiter>value`. Two tag keys
 * carry meaning for latching: `timestamp` supplies an explicit sample time in
 * milliseconds since the epoch, and `node` partitions aggregation state.
 */

import type { Tag, Tags } from '../types/index.js';

/**
 * Tag key carrying an explicit sample timestamp (epoch milliseconds)
 */
export const TIMESTAMP_TAG = 'timestamp';

/**
 * Tag key identifying the upstream node a sample belongs to
 */
export const NODE_TAG = 'node';

/**
 * Delimiters used to render tags and scoped stat names
 */
export interface TagFormat {
  /** Separates a tag's key from its value */
  readonly tagDelimiter: string;
  /** Separates scope segments and stat suffixes */
  readonly scopeDelimiter: string;
}

export const DEFAULT_TAG_FORMAT: TagFormat = {
  tagDelimiter: '=',
  scopeDelimiter: '.',
};

/**
 * Render a key-value tag
 */
export function kvTag(key: string, value: string, format: TagFormat = DEFAULT_TAG_FORMAT): Tag {
  return `${key}${format.tagDelimiter}${value}`;
}

/**
 * Split a tag into key and value at the first delimiter.
 * A tag without a delimiter yields an empty value.
 */
export function splitTag(tag: Tag, format: TagFormat = DEFAULT_TAG_FORMAT): [string, string] {
  const idx = tag.indexOf(format.tagDelimiter);
  if (idx === -1) {
    return [tag, ''];
  }
  return [tag.substring(0, idx), tag.substring(idx + format.tagDelimiter.length)];
}

/**
 * Convert a tag record into tag strings, preserving insertion order
 */
export function tagsFromRecord(tags: Tags | undefined, format: TagFormat = DEFAULT_TAG_FORMAT): Tag[] {
  if (!tags) {
    return [];
  }
  return Object.entries(tags).map(([key, value]) => kvTag(key, String(value), format));
}

/**
 * Convert tag strings into a record; later duplicates win
 */
export function tagsToRecord(
  tags: readonly Tag[] | undefined,
  format: TagFormat = DEFAULT_TAG_FORMAT
): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    const [key, value] = splitTag(tag, format);
    record[key] = value;
  }
  return record;
}
