import {
  CastError,
  GENERIC_RECORD_TYPE,
  defaultRegistry,
  describeType,
  isPlainObject,
  type TypeRegistry,
} from '@shapecast/core';
import { formatFloat } from './format.js';

export interface SerializeOptions {
  /** Registry whose names tag class instances (default: the process-wide registry) */
  registry?: TypeRegistry;
}

/**
 * Built-ins that keep their state in internal slots; their own keys would
 * serialize as an empty record.
 */
function rejectInternalState(value: object, path: string): void {
  if (
    value instanceof Set ||
    value instanceof WeakMap ||
    value instanceof WeakSet ||
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof Promise ||
    value instanceof ArrayBuffer ||
    ArrayBuffer.isView(value)
  ) {
    throw new CastError({
      code: 'RELABEL_FAILED',
      message: `Cannot serialize ${describeType(value)} value at '${path || '(root)'}': its state is not held in fields`,
      context: { path, sourceType: describeType(value) },
    });
  }
}

class Serializer {
  private readonly parts: string[] = [];
  private readonly stack = new Set<object>();

  constructor(private readonly registry: TypeRegistry) {}

  toBuffer(): Buffer {
    return Buffer.from(this.parts.join(''), 'utf8');
  }

  write(value: unknown, path: string): void {
    switch (typeof value) {
      case 'undefined':
        this.parts.push('U;');
        return;
      case 'boolean':
        this.parts.push(`b:${value ? 1 : 0};`);
        return;
      case 'number':
        this.parts.push(
          Number.isSafeInteger(value) && !Object.is(value, -0)
            ? `i:${value};`
            : `d:${formatFloat(value)};`
        );
        return;
      case 'string':
        this.writeString(value);
        return;
      case 'object':
        if (value === null) {
          this.parts.push('N;');
          return;
        }
        this.writeObject(value, path);
        return;
      default:
        throw new CastError({
          code: 'RELABEL_FAILED',
          message: `Cannot serialize ${typeof value} value at '${path || '(root)'}'`,
          context: { path },
        });
    }
  }

  private writeString(value: string): void {
    this.parts.push(`s:${Buffer.byteLength(value, 'utf8')}:"${value}";`);
  }

  private writeObject(value: object, path: string): void {
    if (this.stack.has(value)) {
      throw new CastError({
        code: 'CYCLIC_GRAPH',
        message: `Cannot serialize a cyclic graph (loops back at '${path || '(root)'}')`,
        context: { path },
      });
    }
    this.stack.add(value);

    if (Array.isArray(value)) {
      this.parts.push(`a:${value.length}:{`);
      for (let i = 0; i < value.length; i++) {
        this.parts.push(`i:${i};`);
        this.write(value[i], `${path}[${i}]`);
      }
      this.parts.push('}');
    } else if (value instanceof Map) {
      this.writeMap(value, path);
    } else {
      rejectInternalState(value, path);
      const name = this.typeNameOf(value);
      const keys = Object.keys(value);
      this.parts.push(`O:${Buffer.byteLength(name, 'utf8')}:"${name}":${keys.length}:{`);
      for (const key of keys) {
        this.writeString(key);
        this.write(Reflect.get(value, key), path ? `${path}.${key}` : key);
      }
      this.parts.push('}');
    }

    this.stack.delete(value);
  }

  /** Maps are written as plain records of their string-keyed entries */
  private writeMap(value: Map<unknown, unknown>, path: string): void {
    this.parts.push(`O:${GENERIC_RECORD_TYPE.length}:"${GENERIC_RECORD_TYPE}":${value.size}:{`);
    for (const [key, entry] of value) {
      if (typeof key !== 'string') {
        throw new CastError({
          code: 'RELABEL_FAILED',
          message: `Cannot serialize a Map with a ${describeType(key)} key at '${path || '(root)'}'`,
          suggestion: 'Use string keys for Map sources',
          context: { path },
        });
      }
      this.writeString(key);
      this.write(entry, path ? `${path}.${key}` : key);
    }
    this.parts.push('}');
  }

  private typeNameOf(value: object): string {
    if (isPlainObject(value)) return GENERIC_RECORD_TYPE;

    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    const registered = this.registry.isRegistered(ctor) ? this.registry.nameOf(ctor) : undefined;
    if (registered) return registered;

    const name = describeType(value);
    if (name === 'object') {
      throw new CastError({
        code: 'RELABEL_FAILED',
        message: 'Cannot serialize an instance of an anonymous class',
      });
    }
    return name;
  }
}

/**
 * Serialize a value into the canonical byte format. Objects are tagged with
 * their registered type name, `Object` for plain records, or the class name.
 */
export function serialize(value: unknown, options: SerializeOptions = {}): Buffer {
  const serializer = new Serializer(options.registry ?? defaultRegistry);
  serializer.write(value, '');
  return serializer.toBuffer();
}
