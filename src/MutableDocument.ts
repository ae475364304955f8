// src/MutableDocument.ts

import { Document } from './Document.js';
import { DocumentNode, isTextNode } from './documentModel.js';
import {
  DocumentChangeEvent,
  describeChangeEvent,
  nodeDeleted,
  nodeInserted,
  nodeMoved,
  nodeReplaced,
  textChanged,
} from './changeEvents.js';
import EventEmitter from './EventEmitter.js';
import { createLogger } from './debug.js';
import { assertInRange, NodeNotFoundError, PreconditionError } from './errors.js';
import { createSequentialIdGenerator, NodeIdGenerator } from './nodeId.js';
import { DocumentOptions } from './types.js';

export type ChangeBatch = ReadonlyArray<DocumentChangeEvent>;
export type ChangeListener = (events: ChangeBatch) => void;

interface MutableDocumentEvents {
  change: ChangeBatch;
}

/**
 * A Document that can be edited. Each mutation validates its arguments
 * before touching the node list, so a failing call changes nothing. A
 * successful call returns the events describing it and notifies every
 * listener once, synchronously, with that same batch.
 *
 * Notification keeps only the most recent batch: `changes` is overwritten by
 * every mutation and nothing is queued. A listener registered after a call
 * returns does not see that call's events.
 *
 * Not synchronized: all mutations must come from a single owner.
 */
export class MutableDocument extends Document {
  private readonly emitter = new EventEmitter<MutableDocumentEvents>();
  private readonly idGenerator: NodeIdGenerator;
  private readonly debug: boolean;
  private readonly log = createLogger('MutableDocument', () => this.debug);
  private lastBatch: ChangeBatch = Object.freeze([]);

  constructor(nodes: ReadonlyArray<DocumentNode> = [], options: DocumentOptions = {}) {
    super(nodes);
    this.debug = options.debug ?? false;
    this.idGenerator = options.idGenerator ?? createSequentialIdGenerator('node');
    this.log('Constructor: nodeCount', this.nodeCount);
  }

  /** The events produced by the most recent mutation, or an empty batch before the first. */
  get changes(): ChangeBatch {
    return this.lastBatch;
  }

  /** Registers `listener` for every future batch; returns a function that unregisters it. */
  onChange(listener: ChangeListener): () => void {
    return this.emitter.on('change', listener);
  }

  offChange(listener: ChangeListener): void {
    this.emitter.off('change', listener);
  }

  /** A fresh id from the generator supplied in the options. */
  generateNodeId(): string {
    return this.idGenerator();
  }

  /**
   * Inserts `node` at `index`, shifting later nodes right.
   * @throws OutOfRangeError when `index` is not in `[0, nodeCount]`.
   * @throws PreconditionError when the document already holds a node with the same id.
   */
  insertNode(index: number, node: DocumentNode): ChangeBatch {
    assertInRange('MutableDocument.insertNode index', index, 0, this.nodeList.length);
    this.assertIdAvailable(node.id);
    this.nodeList.splice(index, 0, node);
    return this.notify([nodeInserted(node.id, index)]);
  }

  /** @throws NodeNotFoundError */
  deleteNode(id: string): ChangeBatch {
    const index = this.requireIndex(id);
    this.nodeList.splice(index, 1);
    return this.notify([nodeDeleted(id, index)]);
  }

  /**
   * Puts `newNode` where the node `oldId` was.
   * @throws NodeNotFoundError
   * @throws PreconditionError when `newNode.id` belongs to another node.
   */
  replaceNode(oldId: string, newNode: DocumentNode): ChangeBatch {
    const index = this.requireIndex(oldId);
    if (newNode.id !== oldId) this.assertIdAvailable(newNode.id);
    this.nodeList[index] = newNode;
    return this.notify([nodeReplaced(oldId, newNode.id)]);
  }

  /**
   * Moves the node `id` so that it ends up at `newIndex`.
   * @throws NodeNotFoundError
   * @throws OutOfRangeError when `newIndex` is not in `[0, nodeCount - 1]`.
   */
  moveNode(id: string, newIndex: number): ChangeBatch {
    const oldIndex = this.requireIndex(id);
    assertInRange('MutableDocument.moveNode newIndex', newIndex, 0, this.nodeList.length - 1);
    const [node] = this.nodeList.splice(oldIndex, 1);
    this.nodeList.splice(newIndex, 0, node);
    return this.notify([nodeMoved(id, oldIndex, newIndex)]);
  }

  /**
   * Replaces the node `id` with `updater(node)`. The batch holds a
   * NodeReplaced event, followed by TextChanged when the id is kept and the
   * node's text is different.
   * @throws NodeNotFoundError
   * @throws PreconditionError when the new id belongs to another node.
   */
  updateNode(id: string, updater: (node: DocumentNode) => DocumentNode): ChangeBatch {
    const index = this.requireIndex(id);
    const oldNode = this.nodeList[index];
    const newNode = updater(oldNode);
    if (newNode.id !== oldNode.id) this.assertIdAvailable(newNode.id);
    this.nodeList[index] = newNode;

    const events: DocumentChangeEvent[] = [nodeReplaced(oldNode.id, newNode.id)];
    if (newNode.id === oldNode.id && isTextNode(oldNode) && isTextNode(newNode) && !oldNode.text.equals(newNode.text)) {
      events.push(textChanged(newNode.id));
    }
    return this.notify(events);
  }

  private requireIndex(id: string): number {
    const index = this.getNodeIndexById(id);
    if (index < 0) throw new NodeNotFoundError(id);
    return index;
  }

  private assertIdAvailable(id: string): void {
    if (this.getNodeIndexById(id) >= 0) {
      throw new PreconditionError(`MutableDocument: a node with id "${id}" is already in the document`);
    }
  }

  private notify(events: DocumentChangeEvent[]): ChangeBatch {
    const batch: ChangeBatch = Object.freeze(events);
    this.lastBatch = batch;
    this.log('notify:', batch.map(describeChangeEvent).join(', '));
    this.emitter.emit('change', batch);
    return batch;
  }
}
