/**
 * Immutable per-type metadata consumed by every caster
 */

import { wrapError } from '../errors/index.js';
import type { FieldSpec, TypeConstructor, TypeThunk } from '../types/index.js';
import { defaultRegistry, type TypeRegistry } from './type-registry.js';

export interface ValueFieldDescriptor {
  readonly name: string;
  readonly kind: 'scalar' | 'opaque';
}

/**
 * Field that refers to another class. The class is resolved on first use so
 * that declarations may reference classes defined later, or themselves.
 */
export class NestedFieldDescriptor {
  private resolved: TypeDescriptor | null | undefined;

  constructor(
    readonly name: string,
    readonly kind: 'nested' | 'list',
    private readonly thunk: TypeThunk,
    private readonly registry: TypeRegistry
  ) {}

  /**
   * Descriptor of the referenced class, or undefined when the class is not
   * registered (the field is then copied as is).
   */
  resolve(): TypeDescriptor | undefined {
    if (this.resolved === undefined) {
      let type: unknown;
      try {
        type = this.thunk();
      } catch (error) {
        throw wrapError(error, 'CONFIGURATION_ERROR', { field: this.name });
      }
      this.resolved =
        this.registry.isRegistered(type) ? this.registry.describe(type) : null;
    }
    return this.resolved ?? undefined;
  }
}

export type FieldDescriptor = ValueFieldDescriptor | NestedFieldDescriptor;

export function toFieldDescriptor(
  name: string,
  spec: FieldSpec,
  registry: TypeRegistry
): FieldDescriptor {
  switch (spec.kind) {
    case 'scalar':
    case 'opaque':
      return Object.freeze({ name, kind: spec.kind });
    case 'nested':
      return new NestedFieldDescriptor(name, 'nested', spec.type, registry);
    case 'list':
      return new NestedFieldDescriptor(name, 'list', spec.of, registry);
  }
}

export interface TypeDescriptorInit {
  name: string;
  type: TypeConstructor;
  fields: FieldDescriptor[];
  staticFields: Iterable<string>;
  sealed: boolean;
}

export class TypeDescriptor {
  /** Registered name */
  readonly name: string;
  /** Class instances are created from */
  readonly type: TypeConstructor;
  /** Declared instance field names, in declaration order */
  readonly fieldNames: readonly string[];
  /** Class-level field names, own and inherited; never assigned by a cast */
  readonly staticFields: ReadonlySet<string>;
  /** Whether undeclared fields may be attached */
  readonly sealed: boolean;

  private readonly fieldMap: ReadonlyMap<string, FieldDescriptor>;

  constructor(init: TypeDescriptorInit) {
    this.name = init.name;
    this.type = init.type;
    this.sealed = init.sealed;
    this.fieldMap = new Map(init.fields.map((f) => [f.name, f]));
    this.fieldNames = Object.freeze(init.fields.map((f) => f.name));
    this.staticFields = new Set(init.staticFields);
    Object.freeze(this);
  }

  /**
   * Derive (or fetch the cached) descriptor of a registered class or type name
   * @throws CastError TARGET_TYPE_NOT_FOUND if the type is not registered
   */
  static of(type: TypeConstructor | string, registry: TypeRegistry = defaultRegistry): TypeDescriptor {
    return registry.describe(type);
  }

  get fields(): FieldDescriptor[] {
    return Array.from(this.fieldMap.values());
  }

  field(name: string): FieldDescriptor | undefined {
    return this.fieldMap.get(name);
  }

  hasField(name: string): boolean {
    return this.fieldMap.has(name);
  }

  isStaticField(name: string): boolean {
    return this.staticFields.has(name);
  }
}
