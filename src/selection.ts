// src/selection.ts

import { Document } from './Document.js';
import { DocumentPosition, TextAffinity } from './position.js';

/**
 * Orders two positions within `document`: negative when `a` comes first,
 * positive when `b` does, zero when neither precedes the other.
 *
 * Nodes are ordered by index; an id the document does not hold sorts as
 * index -1. Inside one node text offsets are compared, an upstream binary
 * side precedes a downstream one, and a text position never precedes a
 * binary one or vice versa.
 */
export function comparePositions(document: Document, a: DocumentPosition, b: DocumentPosition): number {
  const indexA = document.getNodeIndexById(a.nodeId);
  const indexB = document.getNodeIndexById(b.nodeId);
  if (indexA !== indexB) return indexA - indexB;

  const posA = a.nodePosition;
  const posB = b.nodePosition;
  if (posA.type === 'text' && posB.type === 'text') {
    return posA.offset - posB.offset;
  }
  if (posA.type === 'binary' && posB.type === 'binary') {
    if (posA.side === posB.side) return 0;
    return posA.side === 'upstream' ? -1 : 1;
  }
  return 0;
}

/**
 * A range between `base`, where the selection started, and `extent`, where
 * it currently ends. Either end may come first in the document; the
 * direction is only known relative to a document (see `affinity`).
 */
export class DocumentSelection {
  static collapsed(position: DocumentPosition): DocumentSelection {
    return new DocumentSelection(position, position);
  }

  constructor(
    public readonly base: DocumentPosition,
    public readonly extent: DocumentPosition,
  ) {}

  get isCollapsed(): boolean {
    return this.base.equals(this.extent);
  }

  get isExpanded(): boolean {
    return !this.isCollapsed;
  }

  /** `downstream` when the extent is at or after the base in `document`, `upstream` otherwise. */
  affinity(document: Document): TextAffinity {
    if (this.isCollapsed) return 'downstream';
    return comparePositions(document, this.base, this.extent) <= 0 ? 'downstream' : 'upstream';
  }

  /** This selection when it already runs forwards, otherwise a copy with base and extent swapped. */
  normalize(document: Document): DocumentSelection {
    if (this.affinity(document) === 'downstream') return this;
    return new DocumentSelection(this.extent, this.base);
  }

  copyWith(changes: { base?: DocumentPosition; extent?: DocumentPosition }): DocumentSelection {
    return new DocumentSelection(changes.base ?? this.base, changes.extent ?? this.extent);
  }

  equals(other: DocumentSelection): boolean {
    if (this === other) return true;
    return this.base.equals(other.base) && this.extent.equals(other.extent);
  }

  toString(): string {
    return `DocumentSelection(base: ${this.base}, extent: ${this.extent})`;
  }
}
