/**
 * Tag helpers
 */

export {
  TIMESTAMP_TAG,
  NODE_TAG,
  DEFAULT_TAG_FORMAT,
  kvTag,
  splitTag,
  tagsFromRecord,
  tagsToRecord,
} from './tag.js';
export type { TagFormat } from './tag.js';
