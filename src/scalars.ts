/**
 * Leaf codecs: no recursion, one node in or out.
 */

import { defineEncoder, fail, ok, type Codec, type DecodeResult, type Encoder } from './codec.js';
import { matchBoolean } from './grammar.js';
import { createNull, createScalar, isNull, isScalar, type Node } from './node.js';

/** The tree itself; both directions return the same node. */
export const node: Codec<Node> = Object.freeze({
  name: 'node',
  encode: (value: Node): Node => value,
  decode: (value: Node): DecodeResult<Node> => ok(value),
});

export const str: Codec<string> = Object.freeze({
  name: 'string',
  encode: (value: string): Node => createScalar(value),
  decode: (n: Node): DecodeResult<string> => (isScalar(n) ? ok(n.value) : fail),
});

/** Fixed text. Encode-only: there is nothing to decode into. */
export const literal: Encoder<string> = defineEncoder('literal', (value: string) =>
  createScalar(value)
);

export const nil: Codec<null> = Object.freeze({
  name: 'null',
  encode: (_value: null): Node => createNull(),
  decode: (n: Node): DecodeResult<null> => (isNull(n) ? ok(null) : fail),
});

/**
 * One UTF-16 code unit. Longer strings keep only their first unit, so this
 * codec is lossy for them.
 */
export const char: Codec<string> = Object.freeze({
  name: 'char',
  encode: (value: string): Node => createScalar(value.slice(0, 1)),
  decode: (n: Node): DecodeResult<string> => {
    if (!isScalar(n) || n.value.length !== 1) return fail;
    return ok(n.value);
  },
});

export const bool: Codec<boolean> = Object.freeze({
  name: 'bool',
  encode: (value: boolean): Node => createScalar(value ? 'true' : 'false'),
  decode: (n: Node): DecodeResult<boolean> => {
    if (!isScalar(n)) return fail;
    const value = matchBoolean(n.value);
    return value === undefined ? fail : ok(value);
  },
});
