/**
 * Dispatch. Typed code picks a rule statically by passing a codec handle to
 * `encode`/`decode`. Code holding `unknown` values goes through a Registry,
 * which picks a rule by the value's runtime type and looks user rules up by
 * constructor.
 */

import { pino, type Logger } from 'pino';
import { binary } from './binary.js';
import { fail, ok, type Codec, type DecodeResult, type Encoder } from './codec.js';
import { BadConversionError, NoRuleError } from './errors.js';
import { createMap, createNull, createScalar, createSequence, isNode, type Node } from './node.js';
import { float64, formatInteger } from './numeric.js';
import { bool, str } from './scalars.js';

export function encode<T>(value: T, encoder: Encoder<T>): Node {
  return encoder.encode(value);
}

export function decode<T>(node: Node, codec: Codec<T>): DecodeResult<T> {
  return codec.decode(node);
}

/** Decode or throw BadConversionError, positioned at the node's mark. */
export function decodeOrThrow<T>(node: Node, codec: Codec<T>): T {
  const result = codec.decode(node);
  if (!result.ok) {
    throw new BadConversionError(codec.name, { position: node.mark, nodeKind: node.kind });
  }
  return result.value;
}

export function decodeOr<T>(node: Node, codec: Codec<T>, fallback: T): T {
  const result = codec.decode(node);
  return result.ok ? result.value : fallback;
}

export type Constructor<T> = new (...args: never[]) => T;

interface Rule {
  readonly name: string;
  /** undefined when `value` is not an instance of the rule's class */
  encode(value: unknown): Node | undefined;
  decode?: (node: Node) => DecodeResult<unknown>;
}

export interface RegistryOptions {
  /** Logger for registration and dispatch (default: silent) */
  logger?: Logger;
  /** Name bound to every log line (default "default") */
  name?: string;
}

const SILENT = pino({ level: 'silent' });

function hasDecoder<T>(rule: Encoder<T> | Codec<T>): rule is Codec<T> {
  return 'decode' in rule && typeof rule.decode === 'function';
}

function describe(value: unknown): string {
  if (typeof value === 'function') return `function ${value.name || '(anonymous)'}`;
  if (typeof value === 'object' && value !== null) {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export class Registry {
  private readonly rules = new Map<Constructor<unknown>, Rule>();
  private readonly logger: Logger;

  constructor(options: RegistryOptions = {}) {
    this.logger = (options.logger ?? SILENT).child({ registry: options.name ?? 'default' });
  }

  /** Bind instances of `ctor` to `rule`. A later registration replaces an earlier one. */
  register<T>(ctor: Constructor<T>, rule: Codec<T> | Encoder<T>): this {
    const entry: Rule = {
      name: rule.name,
      encode: (value) => (value instanceof ctor ? rule.encode(value) : undefined),
    };
    if (hasDecoder(rule)) {
      const codec = rule;
      entry.decode = (node) => codec.decode(node);
    }
    this.rules.set(ctor, entry);
    this.logger.debug({ rule: rule.name, decodes: entry.decode !== undefined }, 'registered rule');
    return this;
  }

  has(ctor: Constructor<unknown>): boolean {
    return this.rules.has(ctor);
  }

  /**
   * Encode by runtime type, in priority order: node, string, null/undefined,
   * boolean, bigint, number, bytes, array, Map, registered class, plain
   * object. Anything else throws NoRuleError.
   */
  encode(value: unknown): Node {
    if (isNode(value)) return value;
    if (typeof value === 'string') return str.encode(value);
    if (value === null || value === undefined) return createNull();
    if (typeof value === 'boolean') return bool.encode(value);
    if (typeof value === 'bigint') return createScalar(formatInteger(value));
    if (typeof value === 'number') {
      return Number.isInteger(value) ? createScalar(formatInteger(value)) : float64.encode(value);
    }
    if (value instanceof Uint8Array) return binary.encode(value);
    if (Array.isArray(value)) {
      const items: readonly unknown[] = value;
      return createSequence(items.map((item) => this.encode(item)));
    }
    if (value instanceof Map) {
      const node = createMap();
      for (const [k, v] of value) node.forceInsert(this.encode(k), this.encode(v));
      return node;
    }
    for (const rule of this.rules.values()) {
      const node = rule.encode(value);
      if (node !== undefined) {
        this.logger.debug({ rule: rule.name }, 'encoded with registered rule');
        return node;
      }
    }
    if (typeof value === 'object' && isPlainObject(value)) {
      const node = createMap();
      for (const [k, v] of Object.entries(value)) {
        node.forceInsert(str.encode(k), this.encode(v));
      }
      return node;
    }
    const type = describe(value);
    this.logger.warn({ type }, 'no rule to encode value');
    throw new NoRuleError(`no conversion rule for ${type}`, { target: type });
  }

  /** Decode into an instance of `ctor` through its registered rule. */
  decode<T>(node: Node, ctor: Constructor<T>): DecodeResult<T> {
    const rule = this.decoderFor(ctor);
    const result = rule(node);
    if (!result.ok) return fail;
    return result.value instanceof ctor ? ok(result.value) : fail;
  }

  /** The registered rule for `ctor` as a codec, for use inside containers. */
  codec<T>(ctor: Constructor<T>): Codec<T> {
    // throws unless the rule can decode
    this.decoderFor(ctor);
    const rule = this.rules.get(ctor);
    return Object.freeze({
      name: rule?.name ?? ctor.name,
      encode: (value: T): Node => rule?.encode(value) ?? this.encode(value),
      decode: (node: Node): DecodeResult<T> => this.decode(node, ctor),
    });
  }

  private decoderFor(ctor: Constructor<unknown>): (node: Node) => DecodeResult<unknown> {
    const rule = this.rules.get(ctor);
    if (rule?.decode === undefined) {
      const reason = rule ? 'is encode-only' : 'is not registered';
      this.logger.warn({ type: ctor.name }, `cannot decode: rule ${reason}`);
      throw new NoRuleError(`cannot decode ${ctor.name}: rule ${reason}`, { target: ctor.name });
    }
    return rule.decode;
  }
}

export function createRegistry(options: RegistryOptions = {}): Registry {
  return new Registry(options);
}
