/**
 * treecodec: typed codecs between native values and document trees.
 */

export type { Codec, Decoded, DecodeResult, Encoder } from './codec.js';
export { defineCodec, defineEncoder, fail, ok } from './codec.js';
export {
  BaseNode,
  MapNode,
  NodeKind,
  NullNode,
  ScalarNode,
  SequenceNode,
  createMap,
  createNull,
  createScalar,
  createSequence,
  isMap,
  isNode,
  isNull,
  isScalar,
  isSequence,
  nodeEquals,
} from './node.js';
export type { MapEntry, Node, SourcePosition } from './node.js';
export { bool, char, literal, nil, node, str } from './scalars.js';
export {
  float32,
  float64,
  formatFloat,
  formatInteger,
  int16,
  int32,
  int64,
  int8,
  parseBoundedInteger,
  parseFloatText,
  uint16,
  uint32,
  uint64,
  uint8,
} from './numeric.js';
export type { FloatWidth, IntegerRange } from './numeric.js';
export { binary, decodeBase64, encodeBase64 } from './binary.js';
export { array, list, map, pair, record } from './containers.js';
export {
  Registry,
  createRegistry,
  decode,
  decodeOr,
  decodeOrThrow,
  encode,
} from './registry.js';
export type { Constructor, RegistryOptions } from './registry.js';
export { BadConversionError, ConversionError, NoRuleError } from './errors.js';
