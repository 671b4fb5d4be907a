/**
 * Identity of an in-flight aggregate.
 *
 * @module latching/fingerprint
 */

import { createHash } from 'crypto';
import type { Tag } from '../types/index.js';

/**
 * MD5 fingerprint of a stat name and its tag set.
 *
 * Tags are sorted first, so any ordering of the same set produces the same
 * fingerprint.
 */
export function fingerprint(name: string, tags: readonly Tag[]): string {
  const hash = createHash('md5');
  hash.update(name);

  for (const tag of [...tags].sort()) {
    hash.update('|');
    hash.update(tag);
  }

  return hash.digest('hex');
}
