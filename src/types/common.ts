/**
 * Common types used throughout the latching stats package.
 *
 * Defines tag types and other shared type definitions.
 */

/**
 * Tag value can be a string, number, or boolean
 */
export type TagValue = string | number | boolean;

/**
 * Tags as key-value pairs, accepted by the stats facade
 */
export type Tags = Record<string, TagValue>;

/**
 * A single tag in its string form: the key and value joined by the
 * configured tag delimiter (e.g. "node=n1")
 */
export type Tag = string;
