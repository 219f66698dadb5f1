/**
 * Reflective recursive caster
 *
 * Copies a source value field by field into a new instance of a registered
 * class, recursing into nested and list fields. A cast either fully succeeds
 * or fails as a whole; no partially built instance is returned.
 */

import {
  CastError,
  NestedFieldDescriptor,
  castFail,
  castOk,
  castPolicySchema,
  defaultRegistry,
  describeType,
  getDefaultLogger,
  instantiate,
  readSourceEntries,
  wrapError,
  type CastDiagnostic,
  type CastPolicy,
  type CastResult,
  type FieldDescriptor,
  type Logger,
  type RecursiveCastOptions,
  type SourceEntry,
  type SourceValue,
  type TypeConstructor,
  type TypeDescriptor,
} from '@shapecast/core';

interface CasterSettings {
  useConstructor: boolean;
  policy: CastPolicy;
  logger: Logger;
  onDiagnostic?: (diagnostic: CastDiagnostic) => void;
}

function joinPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}

function atPath(error: unknown, path: string): CastError {
  const wrapped = wrapError(error, 'MALFORMED_SOURCE');
  if (!path || wrapped.context?.['path'] !== undefined) return wrapped;
  return new CastError({
    code: wrapped.code,
    message: wrapped.message,
    suggestion: wrapped.suggestion,
    cause: wrapped,
    context: { ...wrapped.context, path },
  });
}

class RecursiveCaster {
  readonly diagnostics: CastDiagnostic[] = [];

  constructor(private readonly settings: CasterSettings) {}

  castObject<T extends object>(
    source: SourceValue,
    type: TypeConstructor<T>,
    descriptor: TypeDescriptor,
    path: string,
    ancestors: Set<object>
  ): T {
    if (ancestors.has(source)) {
      throw new CastError({
        code: 'CYCLIC_GRAPH',
        message: `Source graph loops back on itself at '${path || '(root)'}'`,
        suggestion: 'Break the cycle or declare the back-reference as an opaque field',
        context: { path, targetType: descriptor.name },
      });
    }

    let entries: SourceEntry[];
    try {
      entries = readSourceEntries(source);
    } catch (error) {
      throw atPath(error, path);
    }

    const instance = instantiate(type, this.settings.useConstructor);

    ancestors.add(source);
    for (const [name, value] of entries) {
      const fieldPath = joinPath(path, name);

      // Class-level fields are never assigned through a cast
      if (descriptor.isStaticField(name)) continue;

      const declared = descriptor.field(name);
      if (!declared) {
        this.handleUndeclared(instance, name, value, source, descriptor, fieldPath);
        continue;
      }

      const converted = this.convert(declared, value, fieldPath, ancestors);
      this.assign(instance, name, converted, descriptor, fieldPath);
    }
    ancestors.delete(source);

    return instance;
  }

  private convert(
    declared: FieldDescriptor,
    value: unknown,
    path: string,
    ancestors: Set<object>
  ): unknown {
    if (!(declared instanceof NestedFieldDescriptor)) {
      return value;
    }

    const target = declared.resolve();
    if (!target) {
      this.settings.logger.debug('Nested field type is not registered; copying value as is', {
        path,
      });
      return value;
    }

    if (value === null || value === undefined) {
      return value;
    }

    if (declared.kind === 'nested') {
      return this.castNested(value, target, path, ancestors);
    }

    if (!Array.isArray(value)) {
      throw new CastError({
        code: 'MALFORMED_SOURCE',
        message: `Field '${path}' must be an array of ${target.name}, got ${describeType(value)}`,
        context: { path, targetType: target.name, sourceType: describeType(value) },
      });
    }

    return value.map((element: unknown, index) =>
      element === null || element === undefined
        ? element
        : this.castNested(element, target, `${path}[${index}]`, ancestors)
    );
  }

  private castNested(
    value: unknown,
    target: TypeDescriptor,
    path: string,
    ancestors: Set<object>
  ): object {
    if (typeof value !== 'object' || value === null) {
      throw new CastError({
        code: 'MALFORMED_SOURCE',
        message: `Field '${path}' must be an object to cast into ${target.name}, got ${describeType(value)}`,
        context: { path, targetType: target.name, sourceType: describeType(value) },
      });
    }
    return this.castObject(value, target.type, target, path, ancestors);
  }

  private assign(
    instance: object,
    name: string,
    value: unknown,
    descriptor: TypeDescriptor,
    path: string
  ): void {
    let assigned: boolean;
    try {
      assigned = Reflect.set(instance, name, value);
    } catch (error) {
      throw new CastError({
        code: 'FIELD_COPY_FAILED',
        message: `Could not assign '${path}' on ${descriptor.name}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error instanceof Error ? error : undefined,
        context: { field: name, path, targetType: descriptor.name },
      });
    }

    if (!assigned) {
      throw new CastError({
        code: 'FIELD_COPY_FAILED',
        message: `Field '${path}' of ${descriptor.name} is read-only`,
        suggestion: 'Cast without useConstructor if the constructor freezes the instance',
        context: { field: name, path, targetType: descriptor.name },
      });
    }
  }

  private handleUndeclared(
    instance: object,
    name: string,
    value: unknown,
    source: SourceValue,
    descriptor: TypeDescriptor,
    path: string
  ): void {
    const sourceType = describeType(source);

    switch (this.settings.policy) {
      case 'ignore':
        return;

      case 'throw':
        throw new CastError({
          code: 'UNKNOWN_FIELD_REJECTED',
          message: `Field '${name}' of ${sourceType} is not declared by ${descriptor.name}`,
          suggestion: "Declare the field on the target type or cast with policy 'ignore'",
          context: { field: name, path, sourceType, targetType: descriptor.name },
        });

      case 'dynamicAssign':
        if (descriptor.sealed || !Object.isExtensible(instance)) {
          this.report({
            code: 'DYNAMIC_ASSIGN_UNSUPPORTED',
            message: `${descriptor.name} does not accept undeclared field '${name}'; value dropped`,
            field: name,
            path,
            sourceType,
            targetType: descriptor.name,
          });
          return;
        }

        try {
          Object.defineProperty(instance, name, {
            value,
            writable: true,
            enumerable: true,
            configurable: true,
          });
        } catch (error) {
          throw new CastError({
            code: 'FIELD_COPY_FAILED',
            message: `Could not attach undeclared field '${path}' to ${descriptor.name}`,
            cause: error instanceof Error ? error : undefined,
            context: { field: name, path, targetType: descriptor.name },
          });
        }
        this.settings.logger.debug('Attached undeclared field', {
          field: name,
          path,
          targetType: descriptor.name,
        });
        return;
    }
  }

  private report(diagnostic: CastDiagnostic): void {
    this.diagnostics.push(diagnostic);
    this.settings.logger.warn(diagnostic.message, {
      code: diagnostic.code,
      path: diagnostic.path,
      sourceType: diagnostic.sourceType,
      targetType: diagnostic.targetType,
    });
    this.settings.onDiagnostic?.(diagnostic);
  }
}

/**
 * Cast `source` into a new instance of `target`
 *
 * @example
 * const result = recursiveCast({ name: 'home', at: { x: 4, y: 5 } }, Location);
 * if (result.ok) result.value.at instanceof Point; // true
 */
export function recursiveCast<T extends object>(
  source: SourceValue,
  target: TypeConstructor<T>,
  options?: RecursiveCastOptions
): CastResult<T>;
export function recursiveCast(
  source: SourceValue,
  target: string,
  options?: RecursiveCastOptions
): CastResult<object>;
export function recursiveCast<T extends object>(
  source: SourceValue,
  target: TypeConstructor<T> | string,
  options: RecursiveCastOptions = {}
): CastResult<T> | CastResult<object> {
  try {
    if (typeof source !== 'object' || source === null) {
      throw new CastError({
        code: 'MALFORMED_SOURCE',
        message: `Source must be an object, got ${describeType(source)}`,
        context: { sourceType: describeType(source) },
      });
    }

    const policy = castPolicySchema.safeParse(options.policy ?? 'throw');
    if (!policy.success) {
      throw new CastError({
        code: 'CONFIGURATION_ERROR',
        message: `Unknown cast policy '${String(options.policy)}'`,
        suggestion: "Use 'throw', 'ignore' or 'dynamicAssign'",
      });
    }

    const registry = options.registry ?? defaultRegistry;
    const descriptor = registry.describe(target);
    const caster = new RecursiveCaster({
      useConstructor: options.useConstructor ?? false,
      policy: policy.data,
      logger: (options.logger ?? getDefaultLogger()).child({ caster: 'recursive' }),
      onDiagnostic: options.onDiagnostic,
    });

    if (typeof target === 'string') {
      const value = caster.castObject(source, descriptor.type, descriptor, '', new Set());
      return castOk(value, caster.diagnostics);
    }

    const value = caster.castObject(source, target, descriptor, '', new Set());
    return castOk(value, caster.diagnostics);
  } catch (error) {
    return castFail(wrapError(error));
  }
}
