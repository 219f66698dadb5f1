import { CastError, type TypeConstructor, type TypeRegistry } from '@shapecast/core';

/**
 * Types the relabeler may instantiate, by registered name or class.
 * `true` allows every registered type and must only be used on fully
 * trusted data.
 */
export type AllowList = true | ReadonlyArray<string | TypeConstructor>;

/**
 * Resolve an allow-list to type names, always including the target
 * @throws CastError TARGET_TYPE_NOT_FOUND for an entry that is not registered
 */
export function resolveAllowList(
  allowedTypes: AllowList,
  targetType: string,
  registry: TypeRegistry
): ReadonlySet<string> | true {
  if (allowedTypes === true) return true;

  if (typeof allowedTypes !== 'object' || allowedTypes === null) {
    throw new CastError({
      code: 'CONFIGURATION_ERROR',
      message: 'allowedTypes must be true or an array of types',
    });
  }

  const names = new Set<string>([targetType]);
  for (const entry of allowedTypes) {
    const name = typeof entry === 'string'
      ? registry.resolve(entry) && entry
      : registry.nameOf(entry);

    if (!name) {
      const label = typeof entry === 'string' ? entry : entry.name || '(anonymous class)';
      throw new CastError({
        code: 'TARGET_TYPE_NOT_FOUND',
        message: `Allowed type '${label}' is not registered`,
        context: { targetType: label },
      });
    }
    names.add(name);
  }
  return names;
}
