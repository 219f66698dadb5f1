/**
 * Declaration types for the classes a cast can target
 */

/**
 * Any class. Constructor parameters are typed `never[]` so that classes with
 * required parameters are accepted; the casters only ever call `new` without
 * arguments, and only when the caller opts in.
 */
export type TypeConstructor<T extends object = object> = new (...args: never[]) => T;

/** Lazily resolved reference to a nested class (allows forward and self references) */
export type TypeThunk = () => TypeConstructor;

/** Field copied as is */
export interface ScalarFieldSpec {
  kind: 'scalar';
}

/** Field whose type cannot be resolved (unions, intersections); copied as is */
export interface OpaqueFieldSpec {
  kind: 'opaque';
}

/** Field holding a single nested object, cast recursively */
export interface NestedFieldSpec {
  kind: 'nested';
  type: TypeThunk;
}

/** Field holding an array of nested objects, each cast recursively */
export interface ListFieldSpec {
  kind: 'list';
  of: TypeThunk;
}

export type FieldSpec = ScalarFieldSpec | OpaqueFieldSpec | NestedFieldSpec | ListFieldSpec;

export type FieldKind = FieldSpec['kind'];

/** What a class declares when it is registered */
export interface TypeDefinition {
  /** Registered name; defaults to the class name */
  name?: string;
  /** Declared instance fields, in declaration order */
  fields: { [field: string]: FieldSpec };
  /**
   * Sealed types never receive undeclared fields, even under the
   * dynamicAssign policy.
   */
  sealed?: boolean;
}
