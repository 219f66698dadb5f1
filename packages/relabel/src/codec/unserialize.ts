import {
  CastError,
  DEFAULT_RELABEL_MAX_DEPTH,
  GENERIC_RECORD_TYPE,
  defaultRegistry,
  type TypeRegistry,
} from '@shapecast/core';
import { ByteReader } from './byte-reader.js';
import { COUNT_PATTERN, INTEGER_PATTERN, malformed, parseFloatToken } from './format.js';

export interface UnserializeOptions {
  /** Registry that type tags are resolved against */
  registry?: TypeRegistry;
  /**
   * Type names that may be instantiated. `true` allows every registered
   * type: only for fully trusted bytes. Plain records are always allowed.
   */
  allowedTypes: ReadonlySet<string> | true;
  /** Deepest nesting accepted (default: 4096) */
  maxDepth?: number;
}

function defineField(target: object, key: string, value: unknown): void {
  // Own data property: a "__proto__" key must not reach the prototype setter
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

class Unserializer {
  private readonly registry: TypeRegistry;
  private readonly maxDepth: number;

  constructor(
    private readonly reader: ByteReader,
    private readonly options: UnserializeOptions
  ) {
    this.registry = options.registry ?? defaultRegistry;
    this.maxDepth = options.maxDepth ?? DEFAULT_RELABEL_MAX_DEPTH;
  }

  read(depth: number): unknown {
    const at = this.reader.position;
    const tag = this.reader.readChar();

    switch (tag) {
      case 'N':
        this.reader.expect(';');
        return null;
      case 'U':
        this.reader.expect(';');
        return undefined;
      case 'b': {
        this.reader.expect(':');
        const token = this.reader.readToken(';');
        if (token !== '0' && token !== '1') throw malformed(`invalid boolean '${token}'`, at);
        return token === '1';
      }
      case 'i':
        this.reader.expect(':');
        return this.readInteger(at);
      case 'd': {
        this.reader.expect(':');
        const token = this.reader.readToken(';');
        const value = parseFloatToken(token);
        if (value === undefined) throw malformed(`invalid float '${token}'`, at);
        return value;
      }
      case 's':
        return this.readStringBody();
      case 'a':
        this.enter(depth, at);
        return this.readArray(depth);
      case 'O':
        this.enter(depth, at);
        return this.readObject(depth, at);
      default:
        throw malformed(`unknown tag '${tag}'`, at);
    }
  }

  private enter(depth: number, at: number): void {
    if (depth >= this.maxDepth) {
      throw new CastError({
        code: 'RELABEL_FAILED',
        message: `Serialized data nests deeper than ${this.maxDepth} levels`,
        suggestion: 'Raise maxDepth (or SHAPECAST_RELABEL_MAX_DEPTH) if the data is trusted',
        context: { offset: at, maxDepth: this.maxDepth },
      });
    }
  }

  private readInteger(at: number): number {
    const token = this.reader.readToken(';');
    const value = Number(token);
    if (!INTEGER_PATTERN.test(token) || !Number.isSafeInteger(value)) {
      throw malformed(`invalid integer '${token}'`, at);
    }
    return value;
  }

  private readCount(terminator: string): number {
    const at = this.reader.position;
    const token = this.reader.readToken(terminator);
    const count = Number(token);
    // A count never exceeds the bytes left
    if (!COUNT_PATTERN.test(token) || count > this.reader.remaining) {
      throw malformed(`invalid length '${token}'`, at);
    }
    return count;
  }

  /** Body of a string after its `s` tag */
  private readStringBody(): string {
    this.reader.expect(':');
    const length = this.readCount(':');
    this.reader.expect('"');
    const value = this.reader.readBytes(length).toString('utf8');
    this.reader.expect('"');
    this.reader.expect(';');
    return value;
  }

  private readArray(depth: number): unknown {
    this.reader.expect(':');
    const count = this.readCount(':');
    this.reader.expect('{');

    const entries: Array<[number | string, unknown]> = [];
    let sequential = true;
    for (let i = 0; i < count; i++) {
      const at = this.reader.position;
      const keyTag = this.reader.readChar();
      let key: number | string;
      if (keyTag === 'i') {
        this.reader.expect(':');
        key = this.readInteger(at);
      } else if (keyTag === 's') {
        key = this.readStringBody();
      } else {
        throw malformed(`invalid array key tag '${keyTag}'`, at);
      }
      if (key !== i) sequential = false;
      entries.push([key, this.read(depth + 1)]);
    }
    this.reader.expect('}');

    if (sequential) {
      return entries.map(([, value]) => value);
    }
    const record: object = {};
    for (const [key, value] of entries) {
      defineField(record, String(key), value);
    }
    return record;
  }

  private readObject(depth: number, at: number): object {
    this.reader.expect(':');
    const nameLength = this.readCount(':');
    this.reader.expect('"');
    const name = this.reader.readBytes(nameLength).toString('utf8');
    this.reader.expect('"');
    this.reader.expect(':');
    const count = this.readCount(':');
    this.reader.expect('{');

    const instance = this.allocate(name, at);
    for (let i = 0; i < count; i++) {
      const keyAt = this.reader.position;
      if (this.reader.readChar() !== 's') {
        throw malformed('object field names must be strings', keyAt);
      }
      const key = this.readStringBody();
      defineField(instance, key, this.read(depth + 1));
    }
    this.reader.expect('}');

    return instance;
  }

  /**
   * Empty instance of a tagged type, created without running its constructor
   */
  private allocate(name: string, at: number): object {
    if (name === GENERIC_RECORD_TYPE) return {};

    const { allowedTypes } = this.options;
    if (allowedTypes !== true && !allowedTypes.has(name)) {
      throw new CastError({
        code: 'RELABEL_FAILED',
        message: `Refusing to instantiate '${name}': type is not in the allow-list`,
        suggestion: 'Add the type to allowedTypes if the data is trusted',
        context: { typeName: name, offset: at },
      });
    }

    const type = this.registry.resolve(name);
    if (!type) {
      throw new CastError({
        code: 'RELABEL_FAILED',
        message: `Cannot instantiate unknown type '${name}'`,
        suggestion: 'Register the type before relabeling',
        context: { typeName: name, offset: at },
      });
    }

    const instance: object = Object.create(type.prototype);
    return instance;
  }
}

/**
 * Rebuild a value from the canonical byte format, instantiating only
 * allowed types
 * @throws CastError RELABEL_FAILED on malformed bytes or a disallowed type
 */
export function unserialize(bytes: Buffer, options: UnserializeOptions): unknown {
  const reader = new ByteReader(bytes);
  const value = new Unserializer(reader, options).read(0);
  if (reader.remaining > 0) {
    throw malformed('trailing data after value', reader.position);
  }
  return value;
}
