/**
 * Scalar grammars. Every matcher is anchored at both ends, so a test is a
 * full-string match. None carries the `g` or `y` flag, which keeps them free
 * of `lastIndex` state and safe to share.
 */

export const TRUE_TOKENS: ReadonlySet<string> = new Set([
  'y', 'Y', 'yes', 'Yes', 'YES',
  'true', 'True', 'TRUE',
  'on', 'On', 'ON',
]);

export const FALSE_TOKENS: ReadonlySet<string> = new Set([
  'n', 'N', 'no', 'No', 'NO',
  'false', 'False', 'FALSE',
  'off', 'Off', 'OFF',
]);

export const DECIMAL = /^[-+]?[0-9]+$/;
export const OCTAL = /^0o[0-7]+$/;
export const HEX = /^0x[0-9a-fA-F]+$/;
export const FLOAT = /^[-+]?(\.[0-9]+|[0-9]+(\.[0-9]*)?)([eE][-+]?[0-9]+)?$/;
export const INF = /^[-+]?(\.inf|\.Inf|\.INF)$/;
export const NAN = /^(\.nan|\.NaN|\.NAN)$/;

export enum Radix {
  Octal = 8,
  Decimal = 10,
  Hex = 16,
}

export interface IntegerLiteral {
  radix: Radix;
  negative: boolean;
  /** Digits only: no sign, no `0o` or `0x` prefix */
  digits: string;
}

/**
 * Classify integer text. Decimal, octal and hex are tried in that order;
 * only decimal may carry a sign.
 */
export function matchInteger(text: string): IntegerLiteral | undefined {
  if (DECIMAL.test(text)) {
    const first = text[0];
    const signed = first === '-' || first === '+';
    return {
      radix: Radix.Decimal,
      negative: first === '-',
      digits: signed ? text.slice(1) : text,
    };
  }
  if (OCTAL.test(text)) {
    return { radix: Radix.Octal, negative: false, digits: text.slice(2) };
  }
  if (HEX.test(text)) {
    return { radix: Radix.Hex, negative: false, digits: text.slice(2) };
  }
  return undefined;
}

export type FloatLiteral =
  | { kind: 'finite'; text: string }
  | { kind: 'inf'; negative: boolean }
  | { kind: 'nan' };

/** Classify float text: plain number, then infinity, then NaN. */
export function matchFloat(text: string): FloatLiteral | undefined {
  if (FLOAT.test(text)) return { kind: 'finite', text };
  if (INF.test(text)) return { kind: 'inf', negative: text[0] === '-' };
  if (NAN.test(text)) return { kind: 'nan' };
  return undefined;
}

export function matchBoolean(text: string): boolean | undefined {
  if (TRUE_TOKENS.has(text)) return true;
  if (FALSE_TOKENS.has(text)) return false;
  return undefined;
}
