import { describe, expect, it } from 'vitest';
import {
  array,
  createMap,
  createScalar,
  createSequence,
  defineCodec,
  fail,
  float64,
  int32,
  isMap,
  isScalar,
  isSequence,
  list,
  map,
  ok,
  pair,
  record,
  str,
  type Node,
} from '../src/index.js';

function texts(node: Node): string[] {
  if (!isSequence(node)) return [];
  return [...node].map((child) => (isScalar(child) ? child.value : '?'));
}

function scalars(...values: string[]): Node {
  return createSequence(values.map((v) => createScalar(v)));
}

describe('list', () => {
  const ints = list(int32);

  it('encodes elements in order', () => {
    expect(texts(ints.encode([3, 1, 2]))).toEqual(['3', '1', '2']);
    expect(texts(ints.encode([]))).toEqual([]);
  });

  it('decodes every child', () => {
    expect(ints.decode(scalars('1', '0x10', '-3'))).toEqual({ ok: true, value: [1, 16, -3] });
  });

  it('fails on a map node', () => {
    expect(ints.decode(createMap([[createScalar('a'), createScalar('1')]])).ok).toBe(false);
  });

  it('fails as a whole when one element fails', () => {
    expect(ints.decode(scalars('1', 'two', '3'))).toEqual({ ok: false });
  });

  it('nests', () => {
    const grid = list(list(int32));
    const node = grid.encode([[1, 2], [], [3]]);
    expect(grid.decode(node)).toEqual({ ok: true, value: [[1, 2], [], [3]] });
    expect(grid.name).toBe('list<list<int32>>');
  });
});

describe('array', () => {
  const five = array(int32, 5);

  it('checks the length before decoding elements', () => {
    expect(five.decode(scalars('1', '2', '3', '4')).ok).toBe(false);
    expect(five.decode(scalars('1', '2', '3', '4', '5', '6')).ok).toBe(false);
    expect(five.decode(scalars('x', 'x', 'x', 'x')).ok).toBe(false);
    expect(five.decode(scalars('1', '2', '3', '4', '5'))).toEqual({
      ok: true,
      value: [1, 2, 3, 4, 5],
    });
  });

  it('encodes at most its length', () => {
    expect(texts(array(int32, 3).encode([1, 2, 3, 4]))).toEqual(['1', '2', '3']);
  });

  it('writes a short input as is, which then fails the length check', () => {
    const three = array(int32, 3);
    const node = three.encode([1, 2]);
    expect(texts(node)).toEqual(['1', '2']);
    expect(three.decode(node).ok).toBe(false);
  });
});

describe('pair', () => {
  const entry = pair(str, int32);

  it('round-trips', () => {
    expect(entry.decode(entry.encode(['a', 1]))).toEqual({ ok: true, value: ['a', 1] });
  });

  it('requires exactly two children', () => {
    expect(entry.decode(scalars('a', '1', '2')).ok).toBe(false);
    expect(entry.decode(scalars('a')).ok).toBe(false);
    expect(entry.decode(createScalar('a')).ok).toBe(false);
  });

  it('decodes each child with its own codec', () => {
    expect(entry.decode(scalars('1', 'a')).ok).toBe(false);
  });
});

describe('map', () => {
  const counts = map(str, int32);

  it('encodes in insertion order', () => {
    const node = counts.encode(
      new Map([
        ['x', 1],
        ['y', 2],
      ])
    );
    expect(isMap(node)).toBe(true);
    if (!isMap(node)) return;
    const entries = [...node].map((e) => [
      isScalar(e.key) ? e.key.value : '?',
      isScalar(e.value) ? e.value.value : '?',
    ]);
    expect(entries).toEqual([
      ['x', '1'],
      ['y', '2'],
    ]);
  });

  it('keeps the later value of a duplicate key', () => {
    const node = createMap();
    node.forceInsert(createScalar('a'), createScalar('1'));
    node.forceInsert(createScalar('b'), createScalar('2'));
    node.forceInsert(createScalar('a'), createScalar('3'));
    const result = counts.decode(node);
    expect(result.ok && [...result.value]).toEqual([
      ['a', 3],
      ['b', 2],
    ]);
  });

  it('fails on a bad key, a bad value or a sequence', () => {
    const badValue = createMap([[createScalar('a'), createScalar('x')]]);
    const badKey = createMap([[createSequence(), createScalar('1')]]);
    expect(counts.decode(badValue).ok).toBe(false);
    expect(counts.decode(badKey).ok).toBe(false);
    expect(counts.decode(scalars('a', '1')).ok).toBe(false);
  });

  it('accepts non-scalar keys', () => {
    const byPoint = map(pair(int32, int32), str);
    const source = new Map<[number, number], string>([[[1, 2], 'a']]);
    const result = byPoint.decode(byPoint.encode(source));
    expect(result.ok && [...result.value]).toEqual([[[1, 2], 'a']]);
  });

  it('collapses structured keys that are equal by value', () => {
    const byPoint = map(pair(int32, int32), str);
    const node = createMap();
    node.forceInsert(scalars('1', '2'), createScalar('a'));
    node.forceInsert(scalars('3', '4'), createScalar('b'));
    node.forceInsert(scalars('1', '0x2'), createScalar('c'));
    const result = byPoint.decode(node);
    expect(result.ok && [...result.value]).toEqual([
      [[1, 2], 'c'],
      [[3, 4], 'b'],
    ]);
    if (!result.ok) return;
    const again = byPoint.encode(result.value);
    expect(isMap(again) && again.size).toBe(2);
  });
});

describe('record', () => {
  const scores = record(float64);

  it('round-trips a plain object', () => {
    expect(scores.decode(scores.encode({ a: 1.5, b: -2 }))).toEqual({
      ok: true,
      value: { a: 1.5, b: -2 },
    });
  });

  it('stores a __proto__ key as an own property', () => {
    const node = createMap([[createScalar('__proto__'), createScalar('1.5')]]);
    const result = scores.decode(node);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.keys(result.value)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(result.value)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(result.value, '__proto__')?.value).toBe(1.5);
  });
});

describe('user codecs inside containers', () => {
  interface Point {
    x: number;
    y: number;
  }

  const coords = pair(float64, float64);
  const point = defineCodec<Point>(
    'point',
    (p) => coords.encode([p.x, p.y]),
    (node) => {
      const result = coords.decode(node);
      return result.ok ? ok({ x: result.value[0], y: result.value[1] }) : fail;
    }
  );

  it('composes like a built-in codec', () => {
    const path = list(point);
    const source = [
      { x: 0, y: 0 },
      { x: 1.5, y: -2 },
    ];
    const node = path.encode(source);
    expect(texts(node)).toEqual(['?', '?']);
    expect(path.decode(node)).toEqual({ ok: true, value: source });
    expect(path.name).toBe('list<point>');
  });
});
