/**
 * Utility functions for reading source values
 */

import { CastError } from '../errors/index.js';
import type { SourceEntry, SourceRecord, SourceValue } from '../types/index.js';

export function isPlainObject(value: unknown): value is SourceRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Name used for a value's type in messages: the class name, `Object` for
 * plain records, or the primitive type.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value !== 'object') return typeof value;
  if (isPlainObject(value)) return 'Object';
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor === 'function' && ctor.name) return ctor.name;
  return 'object';
}

/**
 * Enumerate the fields of a source value in source order: own enumerable
 * string keys for objects, entries for a Map.
 * @throws CastError MALFORMED_SOURCE on an empty or non-string field name
 */
export function readSourceEntries(source: SourceValue): SourceEntry[] {
  const entries: SourceEntry[] = [];

  if (source instanceof Map) {
    for (const [key, value] of source) {
      if (typeof key !== 'string') {
        throw malformedName(source, String(key), 'Map keys must be strings');
      }
      entries.push([key, value]);
    }
  } else {
    for (const key of Object.keys(source)) {
      entries.push([key, Reflect.get(source, key)]);
    }
  }

  for (const [name] of entries) {
    if (name.length === 0) {
      throw malformedName(source, name, 'field names must not be empty');
    }
  }

  return entries;
}

function malformedName(source: SourceValue, name: string, reason: string): CastError {
  return new CastError({
    code: 'MALFORMED_SOURCE',
    message: `Malformed ${describeType(source)} source: ${reason}`,
    suggestion: 'Rename or drop the offending field before casting',
    context: { field: name, sourceType: describeType(source) },
  });
}
