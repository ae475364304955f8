// src/Document.ts

import { DocumentNode, describeNode, nodesEqual } from './documentModel.js';
import { OutOfRangeError, PreconditionError } from './errors.js';

/**
 * An ordered list of uniquely-identified nodes with read-only look-ups.
 * Look-ups scan the list linearly; a consumer that needs faster access can
 * keep its own `id -> index` cache.
 *
 * ```ts
 * const doc = new Document([
 *   createParagraph({ id: 'intro', text: new AttributedText('Hello world') }),
 *   createHorizontalRule({ id: 'divider' }),
 * ]);
 * doc.nodeAfter('intro'); // the horizontal rule
 * ```
 */
export class Document {
  protected readonly nodeList: DocumentNode[];

  constructor(nodes: ReadonlyArray<DocumentNode> = []) {
    const seen = new Set<string>();
    for (const node of nodes) {
      if (seen.has(node.id)) {
        throw new PreconditionError(`Document: duplicate node id "${node.id}"`);
      }
      seen.add(node.id);
    }
    this.nodeList = nodes.slice();
  }

  /** A frozen snapshot of the nodes in document order. */
  get nodes(): ReadonlyArray<DocumentNode> {
    return Object.freeze(this.nodeList.slice());
  }

  get nodeCount(): number {
    return this.nodeList.length;
  }

  get isEmpty(): boolean {
    return this.nodeList.length === 0;
  }

  get isNotEmpty(): boolean {
    return this.nodeList.length > 0;
  }

  nodeById(id: string): DocumentNode | null {
    return this.nodeList.find(node => node.id === id) ?? null;
  }

  /**
   * Returns the node at `index`.
   * @throws OutOfRangeError when `index` is not in `[0, nodeCount - 1]`.
   */
  nodeAt(index: number): DocumentNode {
    if (!Number.isInteger(index) || index < 0 || index >= this.nodeList.length) {
      throw new OutOfRangeError('Document.nodeAt index', index, 0, this.nodeList.length - 1);
    }
    return this.nodeList[index];
  }

  /** The node after `id`, or null when `id` is last or unknown. */
  nodeAfter(id: string): DocumentNode | null {
    const index = this.getNodeIndexById(id);
    if (index < 0 || index >= this.nodeList.length - 1) return null;
    return this.nodeList[index + 1];
  }

  /** The node before `id`, or null when `id` is first or unknown. */
  nodeBefore(id: string): DocumentNode | null {
    const index = this.getNodeIndexById(id);
    if (index <= 0) return null;
    return this.nodeList[index - 1];
  }

  /** Zero-based index of the node with `id`, or -1 when there is none. */
  getNodeIndexById(id: string): number {
    return this.nodeList.findIndex(node => node.id === id);
  }

  equals(other: Document): boolean {
    if (this === other) return true;
    if (this.nodeList.length !== other.nodeList.length) return false;
    return this.nodeList.every((node, i) => nodesEqual(node, other.nodeList[i]));
  }

  toString(): string {
    return `Document(nodeCount: ${this.nodeCount}, nodes: [${this.nodeList.map(describeNode).join(', ')}])`;
  }
}
