/**
 * Container codecs, generic over the codecs of their elements.
 *
 * Decoding never touches caller state: elements go into a fresh container
 * that is returned only once every child decoded. The first child failure
 * fails the whole decode.
 */

import { fail, ok, type Codec, type DecodeResult } from './codec.js';
import {
  createMap,
  createSequence,
  isMap,
  isSequence,
  nodeEquals,
  type Node,
  type SequenceNode,
} from './node.js';
import { str } from './scalars.js';

function decodeItems<T>(seq: SequenceNode, element: Codec<T>): DecodeResult<T[]> {
  const out: T[] = [];
  for (const child of seq) {
    const result = element.decode(child);
    if (!result.ok) return fail;
    out.push(result.value);
  }
  return ok(out);
}

/** Ordered sequence of any length. */
export function list<T>(element: Codec<T>): Codec<T[]> {
  return Object.freeze({
    name: `list<${element.name}>`,
    encode: (value: readonly T[]): Node => createSequence(value.map((v) => element.encode(v))),
    decode: (node: Node): DecodeResult<T[]> => {
      if (!isSequence(node)) return fail;
      return decodeItems(node, element);
    },
  });
}

/**
 * Sequence of exactly `length` elements. The length is checked before any
 * element is decoded. Encoding writes the first `length` elements; a shorter
 * input is written as is and will not decode with the same codec.
 */
export function array<T>(element: Codec<T>, length: number): Codec<T[]> {
  return Object.freeze({
    name: `array<${element.name}, ${length}>`,
    encode: (value: readonly T[]): Node =>
      createSequence(value.slice(0, length).map((v) => element.encode(v))),
    decode: (node: Node): DecodeResult<T[]> => {
      if (!isSequence(node) || node.size !== length) return fail;
      return decodeItems(node, element);
    },
  });
}

export function pair<A, B>(first: Codec<A>, second: Codec<B>): Codec<[A, B]> {
  return Object.freeze({
    name: `pair<${first.name}, ${second.name}>`,
    encode: ([a, b]: readonly [A, B]): Node =>
      createSequence([first.encode(a), second.encode(b)]),
    decode: (node: Node): DecodeResult<[A, B]> => {
      if (!isSequence(node) || node.size !== 2) return fail;
      const a = node.at(0);
      const b = node.at(1);
      if (a === undefined || b === undefined) return fail;
      const left = first.decode(a);
      if (!left.ok) return fail;
      const right = second.decode(b);
      if (!right.ok) return fail;
      return ok<[A, B]>([left.value, right.value]);
    },
  });
}

/**
 * Key-unique map. Encoding skips the duplicate-key check because the source
 * holds no duplicates; decoding lets a later key overwrite an earlier one.
 * Keys are compared by their encoded form, so structured keys that are equal
 * by value collapse even though a JS Map compares objects by identity.
 */
export function map<K, V>(key: Codec<K>, value: Codec<V>): Codec<Map<K, V>> {
  return Object.freeze({
    name: `map<${key.name}, ${value.name}>`,
    encode: (source: ReadonlyMap<K, V>): Node => {
      const node = createMap();
      for (const [k, v] of source) node.forceInsert(key.encode(k), value.encode(v));
      return node;
    },
    decode: (node: Node): DecodeResult<Map<K, V>> => {
      if (!isMap(node)) return fail;
      const out = new Map<K, V>();
      const seen: Array<{ node: Node; key: K }> = [];
      for (const entry of node) {
        const k = key.decode(entry.key);
        if (!k.ok) return fail;
        const v = value.decode(entry.value);
        if (!v.ok) return fail;
        const canonical = key.encode(k.value);
        const earlier = seen.find((s) => nodeEquals(s.node, canonical));
        if (earlier) {
          out.set(earlier.key, v.value);
        } else {
          seen.push({ node: canonical, key: k.value });
          out.set(k.value, v.value);
        }
      }
      return ok(out);
    },
  });
}

/** String-keyed map decoded into a plain object. */
export function record<V>(value: Codec<V>): Codec<Record<string, V>> {
  return Object.freeze({
    name: `record<${value.name}>`,
    encode: (source: Readonly<Record<string, V>>): Node => {
      const node = createMap();
      for (const [k, v] of Object.entries(source)) {
        node.forceInsert(str.encode(k), value.encode(v));
      }
      return node;
    },
    decode: (node: Node): DecodeResult<Record<string, V>> => {
      if (!isMap(node)) return fail;
      const out: Record<string, V> = {};
      for (const entry of node) {
        const k = str.decode(entry.key);
        if (!k.ok) return fail;
        const v = value.decode(entry.value);
        if (!v.ok) return fail;
        // defineProperty so that a "__proto__" key stays an own data property
        Object.defineProperty(out, k.value, {
          value: v.value,
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return ok(out);
    },
  });
}
