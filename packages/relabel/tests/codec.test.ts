import { describe, expect, it } from 'vitest';
import { CastError, TypeRegistry, field } from '@shapecast/core';
import { readTypeTag, rewriteTypeTag, serialize, unserialize } from '../src/index.js';

class Point {
  x!: number;
  y!: number;
}

const none = new Set<string>();

function pointRegistry(): TypeRegistry {
  const registry = new TypeRegistry();
  registry.register(Point, { fields: { x: field.scalar(), y: field.scalar() } });
  return registry;
}

describe('serialize', () => {
  it('tags plain records as Object', () => {
    const bytes = serialize({ name: 'home', at: { x: 4, y: 5 } }, { registry: new TypeRegistry() });

    expect(bytes.toString('utf8')).toBe(
      'O:6:"Object":2:{s:4:"name";s:4:"home";s:2:"at";O:6:"Object":2:{s:1:"x";i:4;s:1:"y";i:5;}}'
    );
  });

  it('tags class instances with their registered name', () => {
    const registry = new TypeRegistry();
    registry.register(Point, { name: 'geo.Point', fields: { x: field.scalar(), y: field.scalar() } });
    const point = Object.assign(new Point(), { x: 1, y: 2 });

    expect(serialize(point, { registry }).toString('utf8')).toBe(
      'O:9:"geo.Point":2:{s:1:"x";i:1;s:1:"y";i:2;}'
    );
  });

  it('falls back to the class name for unregistered classes', () => {
    class Plain {
      flag = true;
    }
    expect(serialize(new Plain(), { registry: new TypeRegistry() }).toString('utf8')).toBe(
      'O:5:"Plain":1:{s:4:"flag";b:1;}'
    );
  });

  it('encodes scalars and arrays', () => {
    const bytes = serialize([true, null, undefined, 1.5, NaN, -Infinity, 'é']);

    expect(bytes.toString('utf8')).toBe(
      'a:7:{i:0;b:1;i:1;N;i:2;U;i:3;d:1.5;i:4;d:NAN;i:5;d:-INF;i:6;s:2:"é";}'
    );
  });

  it('rejects values it cannot encode', () => {
    expect(() => serialize({ run: () => 1 })).toThrowError("Cannot serialize function value at 'run'");
    expect(() => serialize({ big: 1n })).toThrowError("Cannot serialize bigint value at 'big'");
  });

  it('rejects cyclic graphs', () => {
    const node: { self?: unknown } = {};
    node.self = node;

    let error: unknown;
    try {
      serialize(node);
    } catch (caught) {
      error = caught;
    }
    expect(error instanceof CastError && error.code).toBe('CYCLIC_GRAPH');
  });
});

describe('unserialize', () => {
  it('restores scalars', () => {
    const value = unserialize(Buffer.from('a:5:{i:0;b:0;i:1;i:-12;i:2;d:NAN;i:3;d:-0;i:4;s:2:"é";}', 'utf8'), {
      allowedTypes: none,
    });

    expect(Array.isArray(value)).toBe(true);
    if (!Array.isArray(value)) return;
    expect(value[0]).toBe(false);
    expect(value[1]).toBe(-12);
    expect(value[2]).toBeNaN();
    expect(value[3]).toBe(-0);
    expect(value[4]).toBe('é');
  });

  it('restores registered instances without running constructors', () => {
    let constructed = 0;
    class Counted {
      constructor() {
        constructed++;
      }
    }
    const registry = new TypeRegistry();
    registry.register(Counted, { fields: {} });

    const value = unserialize(Buffer.from('O:7:"Counted":1:{s:1:"n";i:3;}'), {
      registry,
      allowedTypes: new Set(['Counted']),
    });

    expect(value).toBeInstanceOf(Counted);
    expect({ ...(value instanceof Counted ? value : {}) }).toEqual({ n: 3 });
    expect(constructed).toBe(0);
  });

  it('turns arrays with non-sequential keys into records', () => {
    const value = unserialize(Buffer.from('a:2:{i:0;i:1;i:5;i:2;}'), { allowedTypes: none });
    expect(value).toEqual({ '0': 1, '5': 2 });
  });

  it('keeps __proto__ keys as own data', () => {
    const value = unserialize(
      Buffer.from('O:6:"Object":1:{s:9:"__proto__";O:6:"Object":1:{s:8:"polluted";b:1;}}'),
      { allowedTypes: none }
    );

    expect(typeof value).toBe('object');
    if (typeof value !== 'object' || value === null) return;
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    expect(Object.hasOwn(value, '__proto__')).toBe(true);
    expect(Reflect.get({}, 'polluted')).toBeUndefined();
  });

  it('refuses types outside the allow-list', () => {
    const registry = pointRegistry();
    const bytes = Buffer.from('O:5:"Point":2:{s:1:"x";i:1;s:1:"y";i:2;}');

    expect(() => unserialize(bytes, { registry, allowedTypes: none })).toThrowError(
      "Refusing to instantiate 'Point': type is not in the allow-list"
    );
    expect(unserialize(bytes, { registry, allowedTypes: true })).toBeInstanceOf(Point);
  });

  it('refuses unknown types even when everything is allowed', () => {
    expect(() =>
      unserialize(Buffer.from('O:5:"Ghost":0:{}'), { registry: new TypeRegistry(), allowedTypes: true })
    ).toThrowError("Cannot instantiate unknown type 'Ghost'");
  });

  it.each([
    ['s:5:"ab";', 'expected 5 bytes, 4 left'],
    ['N;N;', 'trailing data after value'],
    ['x;', "unknown tag 'x'"],
    ['b:2;', "invalid boolean '2'"],
    ['i:1.5;', "invalid integer '1.5'"],
    ['d:one;', "invalid float 'one'"],
    ['O:6:"Object":1:{i:0;N;}', 'object field names must be strings'],
    ['a:1:{i:0;N;', 'unexpected end of data'],
  ])('rejects malformed input %s', (input, message) => {
    expect(() => unserialize(Buffer.from(input), { allowedTypes: none })).toThrowError(message);
  });

  it('enforces the depth limit', () => {
    const bytes = serialize({ a: { b: { c: 1 } } });

    expect(() => unserialize(bytes, { allowedTypes: none, maxDepth: 2 })).toThrowError(
      'Serialized data nests deeper than 2 levels'
    );
    expect(unserialize(bytes, { allowedTypes: none, maxDepth: 3 })).toEqual({ a: { b: { c: 1 } } });
  });
});

describe('type tags', () => {
  it('reads the leading tag', () => {
    expect(readTypeTag(Buffer.from('O:5:"Point":0:{}'))).toEqual({
      name: 'Point',
      nameStart: 5,
      nameEnd: 10,
    });
  });

  it('rewrites the name and its byte length only', () => {
    const rewritten = rewriteTypeTag(Buffer.from('O:5:"Point":1:{s:1:"x";O:5:"Point":0:{}}'), 'Location');
    expect(rewritten.toString('utf8')).toBe('O:8:"Location":1:{s:1:"x";O:5:"Point":0:{}}');
  });

  it('counts the new name in UTF-8 bytes', () => {
    expect(rewriteTypeTag(Buffer.from('O:1:"A":0:{}'), 'Café').toString('utf8')).toBe('O:5:"Café":0:{}');
  });

  it('rejects data without a leading object tag', () => {
    expect(() => rewriteTypeTag(Buffer.from('a:0:{}'), 'Point')).toThrowError(
      'Serialized value does not start with an object type tag'
    );
  });

  it('rejects a tag whose length does not match its name', () => {
    expect(() => readTypeTag(Buffer.from('O:9:"Point":0:{}'))).toThrowError(
      'Type tag length 9 does not match the tagged name'
    );
  });
});
