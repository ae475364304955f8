// src/position.ts

/** Which side of a boundary a position leans towards. */
export type TextAffinity = 'upstream' | 'downstream';

/** A caret inside a text-bearing node: `offset` in `[0, text.length]`. */
export class TextNodePosition {
  public readonly type = 'text';

  constructor(
    public readonly offset: number,
    public readonly affinity: TextAffinity = 'downstream',
  ) {}

  copyWith(changes: { offset?: number; affinity?: TextAffinity }): TextNodePosition {
    return new TextNodePosition(changes.offset ?? this.offset, changes.affinity ?? this.affinity);
  }

  equals(other: NodePosition): boolean {
    return other.type === 'text' && other.offset === this.offset && other.affinity === this.affinity;
  }

  toString(): string {
    return `TextNodePosition(offset: ${this.offset}, affinity: ${this.affinity})`;
  }
}

export type BinarySide = 'upstream' | 'downstream';

// Images and rules are either selected from before (upstream) or after (downstream)
export class BinaryNodePosition {
  public readonly type = 'binary';

  static upstream(): BinaryNodePosition {
    return new BinaryNodePosition('upstream');
  }

  static downstream(): BinaryNodePosition {
    return new BinaryNodePosition('downstream');
  }

  constructor(public readonly side: BinarySide) {}

  equals(other: NodePosition): boolean {
    return other.type === 'binary' && other.side === this.side;
  }

  toString(): string {
    return `BinaryNodePosition(${this.side})`;
  }
}

export type NodePosition = TextNodePosition | BinaryNodePosition;

export function nodePositionsEqual(a: NodePosition, b: NodePosition): boolean {
  return a === b || a.equals(b);
}

/**
 * A node id paired with a position inside that node. The id is not checked
 * against any document; a position may outlive the node it refers to.
 */
export class DocumentPosition {
  constructor(
    public readonly nodeId: string,
    public readonly nodePosition: NodePosition,
  ) {}

  copyWith(changes: { nodeId?: string; nodePosition?: NodePosition }): DocumentPosition {
    return new DocumentPosition(changes.nodeId ?? this.nodeId, changes.nodePosition ?? this.nodePosition);
  }

  equals(other: DocumentPosition): boolean {
    if (this === other) return true;
    return this.nodeId === other.nodeId && nodePositionsEqual(this.nodePosition, other.nodePosition);
  }

  toString(): string {
    return `DocumentPosition(nodeId: ${this.nodeId}, nodePosition: ${this.nodePosition})`;
  }
}
