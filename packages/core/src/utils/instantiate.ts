import { CastError } from '../errors/index.js';
import type { TypeConstructor } from '../types/index.js';

/**
 * Create an empty instance of `type`.
 *
 * With `useConstructor` the class constructor runs without arguments, so
 * field initializers and constructor side effects apply. Without it the
 * instance is created from the prototype and starts with no own fields.
 *
 * @throws CastError INSTANTIATION_FAILED if the constructor throws
 */
export function instantiate<T extends object>(type: TypeConstructor<T>, useConstructor: boolean): T {
  if (!useConstructor) {
    const instance: T = Object.create(type.prototype);
    return instance;
  }

  try {
    return new type();
  } catch (error) {
    throw new CastError({
      code: 'INSTANTIATION_FAILED',
      message: `Constructor of ${type.name || '(anonymous class)'} failed: ${error instanceof Error ? error.message : String(error)}`,
      suggestion: 'Cast with useConstructor: false to skip the constructor',
      cause: error instanceof Error ? error : undefined,
      context: { targetType: type.name },
    });
  }
}
