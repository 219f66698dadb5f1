import { describe, expect, it } from 'vitest';
import {
  CastError,
  castFail,
  castOk,
  describeType,
  instantiate,
  readSourceEntries,
  unwrap,
} from '../src/index.js';

class Point {
  x = 0;
  y = 0;
}

describe('readSourceEntries', () => {
  it('enumerates plain records in insertion order', () => {
    expect(readSourceEntries({ b: 1, a: 'two', c: null })).toEqual([
      ['b', 1],
      ['a', 'two'],
      ['c', null],
    ]);
  });

  it('enumerates Map entries', () => {
    const source = new Map<string, unknown>([
      ['x', 4],
      ['y', 5],
    ]);
    expect(readSourceEntries(source)).toEqual([
      ['x', 4],
      ['y', 5],
    ]);
  });

  it('reads only own enumerable fields of class instances', () => {
    class Labelled {
      label = 'a';
      get shouted(): string {
        return this.label.toUpperCase();
      }
    }
    expect(readSourceEntries(new Labelled())).toEqual([['label', 'a']]);
  });

  it('rejects empty field names', () => {
    let error: unknown;
    try {
      readSourceEntries({ ok: 1, '': 2 });
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(CastError);
    expect(error instanceof CastError && error.code).toBe('MALFORMED_SOURCE');
    expect(error instanceof CastError && error.context).toEqual({ field: '', sourceType: 'Object' });
  });

  it('rejects non-string Map keys', () => {
    const source = new Map<unknown, unknown>([[1, 'one']]);
    expect(() => readSourceEntries(source)).toThrowError(
      'Malformed Map source: Map keys must be strings'
    );
  });
});

describe('describeType', () => {
  it('names values for messages', () => {
    expect(describeType(null)).toBe('null');
    expect(describeType([])).toBe('Array');
    expect(describeType(3)).toBe('number');
    expect(describeType({})).toBe('Object');
    expect(describeType(Object.create(null))).toBe('Object');
    expect(describeType(new Point())).toBe('Point');
    expect(describeType(new Map())).toBe('Map');
  });
});

describe('instantiate', () => {
  it('allocates from the prototype without running the constructor', () => {
    const instance = instantiate(Point, false);
    expect(instance).toBeInstanceOf(Point);
    expect(Object.keys(instance)).toEqual([]);
  });

  it('runs the constructor when asked', () => {
    const instance = instantiate(Point, true);
    expect(instance).toEqual({ x: 0, y: 0 });
  });

  it('wraps constructor failures', () => {
    class Picky {
      constructor() {
        throw new Error('needs arguments');
      }
    }

    expect(() => instantiate(Picky, false)).not.toThrow();
    expect(() => instantiate(Picky, true)).toThrowError('Constructor of Picky failed: needs arguments');
  });
});

describe('results', () => {
  it('unwraps successes and rethrows failures', () => {
    expect(unwrap(castOk(42))).toBe(42);

    const error = new CastError({ code: 'MALFORMED_SOURCE', message: 'bad' });
    expect(() => unwrap(castFail(error))).toThrow(error);
  });
});
