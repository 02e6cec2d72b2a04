/**
 * Opaque byte buffers as base64 scalars.
 */

import { fail, ok, type Codec, type DecodeResult } from './codec.js';
import { createScalar, isScalar, type Node } from './node.js';

const WHITESPACE = /\s+/g;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decode base64 text; whitespace is skipped. Text with a character outside
 * the alphabet, misplaced padding or a partial quantum yields no bytes.
 */
export function decodeBase64(text: string): Uint8Array {
  const compact = text.replace(WHITESPACE, '');
  if (compact.length % 4 !== 0 || !BASE64.test(compact)) return new Uint8Array(0);
  return new Uint8Array(Buffer.from(compact, 'base64'));
}

export const binary: Codec<Uint8Array> = Object.freeze({
  name: 'binary',
  encode: (value: Uint8Array): Node => createScalar(encodeBase64(value)),
  decode: (node: Node): DecodeResult<Uint8Array> => {
    if (!isScalar(node)) return fail;
    const bytes = decodeBase64(node.value);
    // an empty result from non-empty text means the decoder rejected it
    if (bytes.length === 0 && node.value.length > 0) return fail;
    return ok(bytes);
  },
});
