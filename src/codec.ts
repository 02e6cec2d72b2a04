/**
 * The conversion contract. An Encoder turns a value into a node and never
 * fails; a Codec can also decode, reporting failure as `{ ok: false }`.
 */

import type { Node } from './node.js';

export type DecodeResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false };

export interface Encoder<T> {
  /** Type name used in error messages, e.g. "int32" or "list<string>" */
  readonly name: string;
  encode(value: T): Node;
}

export interface Codec<T> extends Encoder<T> {
  decode(node: Node): DecodeResult<T>;
}

/** Value type a codec decodes to. */
export type Decoded<C> = C extends Codec<infer T> ? T : never;

export const fail: DecodeResult<never> = { ok: false };

export function ok<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

/**
 * Define a user codec. This is the extension point: the result composes with
 * every container codec the same way the built-in ones do.
 */
export function defineCodec<T>(
  name: string,
  encode: (value: T) => Node,
  decode: (node: Node) => DecodeResult<T>
): Codec<T> {
  return Object.freeze({ name, encode, decode });
}

/** Define a rule that can only encode, such as a literal or borrowed text. */
export function defineEncoder<T>(name: string, encode: (value: T) => Node): Encoder<T> {
  return Object.freeze({ name, encode });
}
