/**
 * Errors raised around the codecs: by the throwing accessors and by registry
 * misuse. Codecs themselves report decode failure as a value.
 */

import type { NodeKind, SourcePosition } from './node.js';

type ConstructorOptions = {
  position?: SourcePosition;
  /** Kind of the node that was being decoded */
  nodeKind?: NodeKind;
  /** Codec or type name the conversion was aiming at */
  target?: string;
  cause?: unknown;
};

export class ConversionError extends Error {
  override readonly name: string = 'ConversionError';
  readonly position?: SourcePosition;
  readonly nodeKind?: NodeKind;
  readonly target?: string;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.position = options?.position;
    this.nodeKind = options?.nodeKind;
    this.target = options?.target;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, ConversionError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.position) {
      return `line ${this.position.line}, column ${this.position.column}`;
    }
    return '';
  }

  /** Where the failure happened: node kind and position, either may be absent */
  get context(): string {
    const kind = this.nodeKind ? `${this.nodeKind} node` : '';
    const loc = this.location;
    if (kind && loc) return `${kind} at ${loc}`;
    return kind || loc;
  }

  override toString(): string {
    const context = this.context;
    return context ? `${this.message} (${context})` : this.message;
  }
}

/** A node could not be decoded into the requested type. */
export class BadConversionError extends ConversionError {
  override readonly name = 'BadConversionError';
  override readonly target: string;

  constructor(target: string, options?: Omit<ConstructorOptions, 'target'>) {
    super(`bad conversion to ${target}`, { ...options, target });
    this.target = target;
    Object.setPrototypeOf(this, BadConversionError.prototype);
  }
}

/** A registry holds no rule (or no decoder) for a value or type. */
export class NoRuleError extends ConversionError {
  override readonly name = 'NoRuleError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, NoRuleError.prototype);
  }
}
