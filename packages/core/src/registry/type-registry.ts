/**
 * TypeRegistry
 *
 * Maps classes to their declared fields and names to classes. Descriptors
 * are derived once per class and cached until the registry changes.
 */

import { CastError } from '../errors/index.js';
import type { TypeConstructor, TypeDefinition } from '../types/index.js';
import { fieldNameSchema, typeNameSchema } from '../validation/index.js';
import { TypeDescriptor, toFieldDescriptor, type FieldDescriptor } from './type-descriptor.js';

/** Name reserved for plain records in serialized form */
export const GENERIC_RECORD_TYPE = 'Object';

interface Registration {
  name: string;
  type: TypeConstructor;
  definition: TypeDefinition;
}

const NON_FIELD_STATICS = new Set(['length', 'name', 'prototype']);

/**
 * Own and inherited class-level fields. Static methods are not fields.
 */
function collectStaticFields(type: TypeConstructor): Set<string> {
  const names = new Set<string>();
  let current: unknown = type;
  while (typeof current === 'function' && current !== Function.prototype) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (NON_FIELD_STATICS.has(key)) continue;
      const property = Object.getOwnPropertyDescriptor(current, key);
      if (property && typeof property.value === 'function') continue;
      names.add(key);
    }
    current = Object.getPrototypeOf(current);
  }
  return names;
}

export class TypeRegistry {
  private readonly byType = new Map<unknown, Registration>();
  private readonly byName = new Map<string, Registration>();
  private readonly descriptors = new Map<TypeConstructor, TypeDescriptor>();

  /**
   * Declare the fields of a class
   * @throws CastError CONFIGURATION_ERROR on an invalid or conflicting name
   */
  register<T extends object>(type: TypeConstructor<T>, definition: TypeDefinition): TypeConstructor<T> {
    const name = definition.name ?? type.name;
    const parsedName = typeNameSchema.safeParse(name);
    if (!parsedName.success) {
      throw new CastError({
        code: 'CONFIGURATION_ERROR',
        message: `Invalid type name '${name}': ${parsedName.error.issues[0]?.message ?? 'rejected'}`,
        suggestion: 'Pass an explicit name in the type definition',
      });
    }
    if (name === GENERIC_RECORD_TYPE) {
      throw new CastError({
        code: 'CONFIGURATION_ERROR',
        message: `Type name '${GENERIC_RECORD_TYPE}' is reserved for plain records`,
      });
    }

    const existing = this.byName.get(name);
    if (existing && existing.type !== type) {
      throw new CastError({
        code: 'CONFIGURATION_ERROR',
        message: `Type name '${name}' is already registered for another class`,
        context: { name },
      });
    }

    for (const fieldName of Object.keys(definition.fields)) {
      if (!fieldNameSchema.safeParse(fieldName).success) {
        throw new CastError({
          code: 'CONFIGURATION_ERROR',
          message: `Type '${name}' declares a field with an empty name`,
          context: { name },
        });
      }
    }

    const previous = this.byType.get(type);
    if (previous) {
      this.byName.delete(previous.name);
    }

    const registration: Registration = { name, type, definition };
    this.byType.set(type, registration);
    this.byName.set(name, registration);
    // Subclass descriptors embed ancestor fields, so drop them all
    this.descriptors.clear();

    return type;
  }

  isRegistered(type: unknown): type is TypeConstructor {
    return this.byType.has(type);
  }

  /** Class registered under a name */
  resolve(name: string): TypeConstructor | undefined {
    return this.byName.get(name)?.type;
  }

  /** Registered name of a class (exact class only, not its ancestors) */
  nameOf(type: TypeConstructor): string | undefined {
    return this.byType.get(type)?.name;
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }

  /**
   * @throws CastError TARGET_TYPE_NOT_FOUND if the type is not registered
   */
  describe(type: TypeConstructor | string): TypeDescriptor {
    const registration =
      typeof type === 'string' ? this.byName.get(type) : this.byType.get(type);

    if (!registration) {
      const label = typeof type === 'string' ? type : type.name || '(anonymous class)';
      throw new CastError({
        code: 'TARGET_TYPE_NOT_FOUND',
        message: `Type '${label}' is not registered`,
        suggestion: 'Register the class with registerType() or loadTypeDefinitions() before casting',
        context: { targetType: label },
      });
    }

    const cached = this.descriptors.get(registration.type);
    if (cached) return cached;

    const descriptor = this.build(registration);
    this.descriptors.set(registration.type, descriptor);
    return descriptor;
  }

  private build(registration: Registration): TypeDescriptor {
    // Registered ancestors, root first
    const chain: Registration[] = [];
    let current: unknown = registration.type;
    while (typeof current === 'function' && current !== Function.prototype) {
      const found = this.byType.get(current);
      if (found) chain.unshift(found);
      current = Object.getPrototypeOf(current);
    }

    const specs = new Map<string, FieldDescriptor>();
    for (const link of chain) {
      for (const [fieldName, spec] of Object.entries(link.definition.fields)) {
        specs.set(fieldName, toFieldDescriptor(fieldName, spec, this));
      }
    }

    const staticFields = collectStaticFields(registration.type);
    for (const fieldName of specs.keys()) {
      if (staticFields.has(fieldName)) {
        throw new CastError({
          code: 'CONFIGURATION_ERROR',
          message: `Field '${fieldName}' of '${registration.name}' is declared as an instance field but is static on the class`,
          context: { targetType: registration.name, field: fieldName },
        });
      }
    }

    return new TypeDescriptor({
      name: registration.name,
      type: registration.type,
      fields: Array.from(specs.values()),
      staticFields,
      sealed: chain.some((link) => link.definition.sealed === true),
    });
  }
}

/** Process-wide registry used when callers pass none */
export const defaultRegistry = new TypeRegistry();

/**
 * Register a class on the default (or given) registry
 */
export function registerType<T extends object>(
  type: TypeConstructor<T>,
  definition: TypeDefinition,
  registry: TypeRegistry = defaultRegistry
): TypeConstructor<T> {
  return registry.register(type, definition);
}
