import type {
  ListFieldSpec,
  NestedFieldSpec,
  OpaqueFieldSpec,
  ScalarFieldSpec,
  TypeThunk,
} from '../types/index.js';

/**
 * Field declaration helpers
 *
 * @example
 * registerType(Location, {
 *   fields: { name: field.scalar(), at: field.nested(() => Point) },
 * });
 */
export const field = {
  scalar: (): ScalarFieldSpec => ({ kind: 'scalar' }),
  opaque: (): OpaqueFieldSpec => ({ kind: 'opaque' }),
  nested: (type: TypeThunk): NestedFieldSpec => ({ kind: 'nested', type }),
  list: (of: TypeThunk): ListFieldSpec => ({ kind: 'list', of }),
};
