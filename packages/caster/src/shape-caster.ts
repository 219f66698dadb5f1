/**
 * ShapeCaster
 *
 * Fast path for sources known to carry exactly the target's fields. The
 * field list is captured once at construction; each cast is a plain copy
 * with no policy, no type check and no recursion.
 */

import {
  CastError,
  ShapeMismatchError,
  defaultRegistry,
  describeType,
  getDefaultLogger,
  instantiate,
  type CastContextOptions,
  type SourceValue,
  type TypeConstructor,
} from '@shapecast/core';

export interface ShapeCasterOptions extends CastContextOptions {
  /** Run the target's constructor for every cast (default: false) */
  useConstructor?: boolean;
}

type FieldLookup = { found: true; value: unknown } | { found: false };

/**
 * Map entries, or properties found on the source or its class prototypes.
 * Members inherited from `Object.prototype` do not count as fields.
 */
function lookupField(source: SourceValue, name: string): FieldLookup {
  if (source instanceof Map) {
    return source.has(name) ? { found: true, value: source.get(name) } : { found: false };
  }

  let owner: object | null = source;
  while (owner !== null && owner !== Object.prototype) {
    if (Object.hasOwn(owner, name)) {
      return { found: true, value: Reflect.get(source, name) };
    }
    owner = Object.getPrototypeOf(owner);
  }
  return { found: false };
}

export class ShapeCaster<T extends object = object> {
  /** Registered name of the target type */
  readonly targetType: string;
  /** Captured field names, in declaration order */
  readonly fields: readonly string[];

  private readonly type: TypeConstructor<T>;
  private readonly useConstructor: boolean;

  /**
   * @throws CastError TARGET_TYPE_NOT_FOUND if `target` is not registered
   */
  constructor(target: TypeConstructor<T>, options: ShapeCasterOptions = {}) {
    const descriptor = (options.registry ?? defaultRegistry).describe(target);
    this.type = target;
    this.targetType = descriptor.name;
    this.fields = descriptor.fieldNames;
    this.useConstructor = options.useConstructor ?? false;

    (options.logger ?? getDefaultLogger()).debug('Shape caster compiled', {
      targetType: this.targetType,
      fields: this.fields.length,
    });
  }

  /**
   * Shape caster for a type known by its registered name
   */
  static forName(name: string, options: ShapeCasterOptions = {}): ShapeCaster {
    const descriptor = (options.registry ?? defaultRegistry).describe(name);
    return new ShapeCaster(descriptor.type, options);
  }

  /**
   * @throws ShapeMismatchError if the source lacks a captured field
   */
  cast(source: SourceValue): T {
    const instance = instantiate(this.type, this.useConstructor);

    for (const name of this.fields) {
      const field = lookupField(source, name);
      if (!field.found) {
        throw new ShapeMismatchError(name, describeType(source), this.targetType);
      }
      if (!Reflect.set(instance, name, field.value)) {
        throw new CastError({
          code: 'FIELD_COPY_FAILED',
          message: `Field '${name}' of ${this.targetType} is read-only`,
          context: { field: name, targetType: this.targetType },
        });
      }
    }

    return instance;
  }

  castMany(sources: Iterable<SourceValue>): T[] {
    const out: T[] = [];
    for (const source of sources) {
      out.push(this.cast(source));
    }
    return out;
  }
}
