/**
 * Document tree: the Null / Scalar / Sequence / Map node model that codecs
 * read from and write to. Parsers build it; this module only constructs,
 * appends, inserts and compares.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

export enum NodeKind {
  Null = 'Null',
  Scalar = 'Scalar',
  Sequence = 'Sequence',
  Map = 'Map',
}

export type Node = NullNode | ScalarNode | SequenceNode | MapNode;

export interface MapEntry {
  readonly key: Node;
  value: Node;
}

export abstract class BaseNode {
  /** Where a parser found this node, if it recorded one */
  mark?: SourcePosition;
}

export class NullNode extends BaseNode {
  readonly kind = NodeKind.Null;
}

export class ScalarNode extends BaseNode {
  readonly kind = NodeKind.Scalar;

  constructor(readonly value: string) {
    super();
  }
}

export class SequenceNode extends BaseNode {
  readonly kind = NodeKind.Sequence;
  private readonly items: Node[] = [];

  get size(): number {
    return this.items.length;
  }

  at(index: number): Node | undefined {
    return this.items[index];
  }

  push(item: Node): void {
    this.items.push(item);
  }

  [Symbol.iterator](): IterableIterator<Node> {
    return this.items[Symbol.iterator]();
  }
}

export class MapNode extends BaseNode {
  readonly kind = NodeKind.Map;
  private readonly entries: MapEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  /** Appends without looking for an existing key. */
  forceInsert(key: Node, value: Node): void {
    this.entries.push({ key, value });
  }

  /** Inserts, overwriting the value of a structurally equal key if present. */
  insert(key: Node, value: Node): void {
    const existing = this.entries.find((e) => nodeEquals(e.key, key));
    if (existing) {
      existing.value = value;
      return;
    }
    this.entries.push({ key, value });
  }

  /** Value of the first entry whose key equals `key`. */
  get(key: Node): Node | undefined {
    return this.entries.find((e) => nodeEquals(e.key, key))?.value;
  }

  [Symbol.iterator](): IterableIterator<MapEntry> {
    return this.entries[Symbol.iterator]();
  }
}

export function createNull(mark?: SourcePosition): NullNode {
  const node = new NullNode();
  if (mark) node.mark = mark;
  return node;
}

export function createScalar(text: string, mark?: SourcePosition): ScalarNode {
  const node = new ScalarNode(text);
  if (mark) node.mark = mark;
  return node;
}

export function createSequence(items: Iterable<Node> = []): SequenceNode {
  const node = new SequenceNode();
  for (const item of items) node.push(item);
  return node;
}

export function createMap(entries: Iterable<readonly [Node, Node]> = []): MapNode {
  const node = new MapNode();
  for (const [key, value] of entries) node.insert(key, value);
  return node;
}

export function isNode(v: unknown): v is Node {
  return (
    v instanceof NullNode ||
    v instanceof ScalarNode ||
    v instanceof SequenceNode ||
    v instanceof MapNode
  );
}

export function isNull(node: Node): node is NullNode {
  return node.kind === NodeKind.Null;
}

export function isScalar(node: Node): node is ScalarNode {
  return node.kind === NodeKind.Scalar;
}

export function isSequence(node: Node): node is SequenceNode {
  return node.kind === NodeKind.Sequence;
}

export function isMap(node: Node): node is MapNode {
  return node.kind === NodeKind.Map;
}

/** Structural equality; marks are ignored and map entries compare in order. */
export function nodeEquals(a: Node, b: Node): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case NodeKind.Null:
      return b.kind === NodeKind.Null;
    case NodeKind.Scalar:
      return b.kind === NodeKind.Scalar && a.value === b.value;
    case NodeKind.Sequence: {
      if (b.kind !== NodeKind.Sequence || a.size !== b.size) return false;
      for (let i = 0; i < a.size; i++) {
        const x = a.at(i);
        const y = b.at(i);
        if (x === undefined || y === undefined || !nodeEquals(x, y)) return false;
      }
      return true;
    }
    case NodeKind.Map: {
      if (b.kind !== NodeKind.Map || a.size !== b.size) return false;
      const right = [...b];
      let i = 0;
      for (const left of a) {
        const other = right[i++];
        if (other === undefined) return false;
        if (!nodeEquals(left.key, other.key) || !nodeEquals(left.value, other.value)) {
          return false;
        }
      }
      return true;
    }
  }
}
