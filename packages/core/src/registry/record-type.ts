/**
 * Record types declared at run time, from code or from a JSON document
 */

import { CastError } from '../errors/index.js';
import { formatZodError } from '../config.js';
import type { FieldSpec, TypeConstructor } from '../types/index.js';
import {
  typeDefinitionDocumentSchema,
  type FieldSpecDocument,
} from '../validation/index.js';
import { field } from './field.js';
import { GENERIC_RECORD_TYPE, defaultRegistry, type TypeRegistry } from './type-registry.js';

export interface DefineRecordTypeOptions {
  sealed?: boolean;
  registry?: TypeRegistry;
}

/**
 * Create and register an empty class named `name` with the given fields
 */
export function defineRecordType(
  name: string,
  fields: { [field: string]: FieldSpec },
  options: DefineRecordTypeOptions = {}
): TypeConstructor {
  const RecordType = class {};
  Object.defineProperty(RecordType, 'name', { value: name });
  return (options.registry ?? defaultRegistry).register(RecordType, {
    name,
    fields,
    sealed: options.sealed,
  });
}

/**
 * Validate a type-definition document and register every type it declares.
 * Nested references may point at types of the same document or at types
 * already in the registry.
 *
 * @example
 * loadTypeDefinitions({
 *   types: [
 *     { name: 'Point', fields: { x: 'scalar', y: 'scalar' } },
 *     { name: 'Location', fields: { name: 'scalar', at: { nested: 'Point' } } },
 *   ],
 * });
 */
export function loadTypeDefinitions(
  document: unknown,
  registry: TypeRegistry = defaultRegistry
): Map<string, TypeConstructor> {
  const result = typeDefinitionDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new CastError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodError('Invalid type-definition document', result.error),
    });
  }

  const declared = new Set(result.data.types.map((entry) => entry.name));
  const requireType = (name: string): TypeConstructor => {
    const type = registry.resolve(name);
    if (!type) {
      throw new CastError({
        code: 'TARGET_TYPE_NOT_FOUND',
        message: `Type '${name}' is not registered`,
        context: { targetType: name },
      });
    }
    return type;
  };

  const toSpec = (owner: string, fieldName: string, spec: FieldSpecDocument): FieldSpec => {
    if (spec === 'scalar') return field.scalar();
    if (spec === 'opaque') return field.opaque();

    const ref = 'nested' in spec ? spec.nested : spec.list;
    if (!declared.has(ref) && !registry.resolve(ref)) {
      throw new CastError({
        code: 'CONFIGURATION_ERROR',
        message: `Field '${owner}.${fieldName}' refers to unknown type '${ref}'`,
        suggestion: 'Declare the type in the same document or register it first',
        context: { targetType: owner, field: fieldName },
      });
    }
    const thunk = () => requireType(ref);
    return 'nested' in spec ? field.nested(thunk) : field.list(thunk);
  };

  // Every check runs before the first registration so a rejected document leaves the registry untouched
  const pending = result.data.types.map((entry) => {
    if (entry.name === GENERIC_RECORD_TYPE || registry.resolve(entry.name)) {
      throw new CastError({
        code: 'CONFIGURATION_ERROR',
        message: `Type name '${entry.name}' is already registered for another class`,
        suggestion: 'Rename the type in the document or load it into a fresh registry',
        context: { name: entry.name },
      });
    }
    const fields: { [field: string]: FieldSpec } = {};
    for (const [fieldName, spec] of Object.entries(entry.fields)) {
      fields[fieldName] = toSpec(entry.name, fieldName, spec);
    }
    return { name: entry.name, sealed: entry.sealed, fields };
  });

  const created = new Map<string, TypeConstructor>();
  for (const entry of pending) {
    created.set(entry.name, defineRecordType(entry.name, entry.fields, { sealed: entry.sealed, registry }));
  }

  return created;
}
