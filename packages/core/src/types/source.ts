/**
 * Source-side types
 */

/** Generic record type - a decoded document or any plain object */
export type SourceRecord = {
  [key: string]: unknown;
};

/**
 * Anything a caster accepts as source: a plain record, a Map with string
 * keys, or an instance of any class. Fields are the own enumerable keys.
 */
export type SourceValue = object;

/** A single enumerated source field */
export type SourceEntry = readonly [name: string, value: unknown];
