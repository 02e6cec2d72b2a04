/**
 * Integer and floating-point codecs.
 *
 * Integers up to 32 bits decode to `number`; 64-bit ones to `bigint`. Text is
 * parsed exactly into a 64-bit accumulator first, then range-checked against
 * the target type. Floats encode to the shortest text that reads back to the
 * same value at the target width.
 */

import { fail, ok, type Codec, type DecodeResult } from './codec.js';
import { DECIMAL, Radix, matchFloat, matchInteger, type IntegerLiteral } from './grammar.js';
import { createScalar, isScalar, type Node } from './node.js';

export interface IntegerRange {
  readonly min: bigint;
  readonly max: bigint;
}

const SIGNED_ACCUMULATOR: IntegerRange = { min: -(2n ** 63n), max: 2n ** 63n - 1n };
const UNSIGNED_ACCUMULATOR: IntegerRange = { min: 0n, max: 2n ** 64n - 1n };

function signedRange(bits: number): IntegerRange {
  const half = 2n ** BigInt(bits - 1);
  return { min: -half, max: half - 1n };
}

function unsignedRange(bits: number): IntegerRange {
  return { min: 0n, max: 2n ** BigInt(bits) - 1n };
}

const PREFIX: Record<Radix, string> = {
  [Radix.Octal]: '0o',
  [Radix.Decimal]: '',
  [Radix.Hex]: '0x',
};

/**
 * Parse integer text into `accumulator`, then check it against `range`.
 * Returns undefined on a lexical mismatch or when either bound is exceeded.
 */
export function parseBoundedInteger(
  text: string,
  range: IntegerRange,
  accumulator: IntegerRange
): bigint | undefined {
  const literal = matchInteger(text);
  if (literal === undefined) return undefined;
  const value = toBigInt(literal);
  if (value < accumulator.min || value > accumulator.max) return undefined;
  if (value < range.min || value > range.max) return undefined;
  return value;
}

function toBigInt({ radix, negative, digits }: IntegerLiteral): bigint {
  // digits are already validated for the radix, so this cannot throw
  const magnitude = BigInt(PREFIX[radix] + digits);
  return negative ? -magnitude : magnitude;
}

/** Plain decimal, no separators. Fractions truncate toward zero. */
export function formatInteger(value: number | bigint): string {
  if (typeof value === 'bigint') return value.toString();
  if (!Number.isFinite(value)) return String(value);
  return BigInt(Math.trunc(value)).toString();
}

function integer(name: string, range: IntegerRange, accumulator: IntegerRange): Codec<number> {
  return Object.freeze({
    name,
    encode: (value: number): Node => createScalar(formatInteger(value)),
    decode: (node: Node): DecodeResult<number> => {
      if (!isScalar(node)) return fail;
      const value = parseBoundedInteger(node.value, range, accumulator);
      return value === undefined ? fail : ok(Number(value));
    },
  });
}

function bigInteger(name: string, range: IntegerRange, accumulator: IntegerRange): Codec<bigint> {
  return Object.freeze({
    name,
    encode: (value: bigint): Node => createScalar(formatInteger(value)),
    decode: (node: Node): DecodeResult<bigint> => {
      if (!isScalar(node)) return fail;
      const value = parseBoundedInteger(node.value, range, accumulator);
      return value === undefined ? fail : ok(value);
    },
  });
}

export const int8 = integer('int8', signedRange(8), SIGNED_ACCUMULATOR);
export const int16 = integer('int16', signedRange(16), SIGNED_ACCUMULATOR);
export const int32 = integer('int32', signedRange(32), SIGNED_ACCUMULATOR);
export const int64 = bigInteger('int64', signedRange(64), SIGNED_ACCUMULATOR);

export const uint8 = integer('uint8', unsignedRange(8), UNSIGNED_ACCUMULATOR);
export const uint16 = integer('uint16', unsignedRange(16), UNSIGNED_ACCUMULATOR);
export const uint32 = integer('uint32', unsignedRange(32), UNSIGNED_ACCUMULATOR);
export const uint64 = bigInteger('uint64', unsignedRange(64), UNSIGNED_ACCUMULATOR);

export type FloatWidth = 32 | 64;

const FLOAT32_DIGITS = 9;

function shortest(value: number, width: FloatWidth): string {
  if (Object.is(value, -0)) return '-0';
  if (width === 64) return String(value);
  for (let precision = 1; precision < FLOAT32_DIGITS; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) return String(candidate);
  }
  return String(Number(value.toPrecision(FLOAT32_DIGITS)));
}

/**
 * Float text for `value` at `width`. A result that would read as an integer
 * gets a trailing "." so a later reader keeps it a float.
 */
export function formatFloat(value: number, width: FloatWidth = 64): string {
  const narrowed = width === 32 ? Math.fround(value) : value;
  if (Number.isNaN(narrowed)) return '.nan';
  if (narrowed === Infinity) return '.inf';
  if (narrowed === -Infinity) return '-.inf';
  const text = shortest(narrowed, width);
  return DECIMAL.test(text) ? `${text}.` : text;
}

/**
 * Parse float text as a float64. Finite text beyond the float64 range
 * rounds to the signed infinity; narrowing to float32 afterwards is not
 * range-checked either.
 */
export function parseFloatText(text: string): number | undefined {
  const literal = matchFloat(text);
  if (literal === undefined) return undefined;
  switch (literal.kind) {
    case 'finite':
      return Number(literal.text);
    case 'inf':
      return literal.negative ? -Infinity : Infinity;
    case 'nan':
      return NaN;
  }
}

function float(name: string, width: FloatWidth): Codec<number> {
  const narrow = width === 32 ? Math.fround : (n: number) => n;
  return Object.freeze({
    name,
    encode: (value: number): Node => createScalar(formatFloat(value, width)),
    decode: (node: Node): DecodeResult<number> => {
      if (!isScalar(node)) return fail;
      const value = parseFloatText(node.value);
      return value === undefined ? fail : ok(narrow(value));
    },
  });
}

export const float32 = float('float32', 32);
export const float64 = float('float64', 64);
