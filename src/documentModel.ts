// src/documentModel.ts

import { AttributedText } from './AttributedText.js';

// --- Node Definitions ---

export type NodeMetadata = Readonly<Record<string, unknown>>;

export interface BaseNode {
  readonly type: string;
  readonly id: string; // Unique within a single Document
  readonly metadata: NodeMetadata;
}

export type ParagraphBlockType =
  | 'paragraph'
  | 'header1'
  | 'header2'
  | 'header3'
  | 'header4'
  | 'header5'
  | 'header6'
  | 'blockquote'
  | 'codeBlock';

export interface ParagraphNode extends BaseNode {
  readonly type: 'paragraph';
  readonly text: AttributedText;
  readonly blockType: ParagraphBlockType;
}

export type ListItemType = 'unordered' | 'ordered';

export interface ListItemNode extends BaseNode {
  readonly type: 'listItem';
  readonly text: AttributedText;
  readonly listType: ListItemType;
  readonly indent: number; // 0 is top level
}

export interface CodeBlockNode extends BaseNode {
  readonly type: 'codeBlock';
  readonly text: AttributedText;
  readonly language: string | null;
}

export interface ImageNode extends BaseNode {
  readonly type: 'image';
  readonly imageUrl: string;
  readonly altText: string | null;
  readonly width: number | null;
  readonly height: number | null;
}

export interface HorizontalRuleNode extends BaseNode {
  readonly type: 'horizontalRule';
}

// Text-bearing nodes are addressed with TextNodePosition
export type TextNode = ParagraphNode | ListItemNode | CodeBlockNode;

// Nodes without text only have an upstream and a downstream BinaryNodePosition
export type BinaryNode = ImageNode | HorizontalRuleNode;

export type DocumentNode = TextNode | BinaryNode;

export type DocumentNodeType = DocumentNode['type'];

export function isTextNode(node: DocumentNode): node is TextNode {
  return node.type === 'paragraph' || node.type === 'listItem' || node.type === 'codeBlock';
}

export function isBinaryNode(node: DocumentNode): node is BinaryNode {
  return !isTextNode(node);
}

// --- Factory Functions ---

interface BaseNodeInit {
  id: string;
  metadata?: NodeMetadata;
}

export interface ParagraphInit extends BaseNodeInit {
  text?: AttributedText;
  blockType?: ParagraphBlockType;
}

export interface ListItemInit extends BaseNodeInit {
  text?: AttributedText;
  listType?: ListItemType;
  indent?: number;
}

export interface CodeBlockInit extends BaseNodeInit {
  text?: AttributedText;
  language?: string | null;
}

export interface ImageInit extends BaseNodeInit {
  imageUrl: string;
  altText?: string | null;
  width?: number | null;
  height?: number | null;
}

export type HorizontalRuleInit = BaseNodeInit;

function freezeMetadata(metadata?: NodeMetadata): NodeMetadata {
  return Object.freeze({ ...(metadata || {}) });
}

export function createParagraph(init: ParagraphInit): ParagraphNode {
  const node: ParagraphNode = {
    type: 'paragraph',
    id: init.id,
    metadata: freezeMetadata(init.metadata),
    text: init.text ?? new AttributedText(),
    blockType: init.blockType ?? 'paragraph',
  };
  return Object.freeze(node);
}

export function createListItem(init: ListItemInit): ListItemNode {
  const node: ListItemNode = {
    type: 'listItem',
    id: init.id,
    metadata: freezeMetadata(init.metadata),
    text: init.text ?? new AttributedText(),
    listType: init.listType ?? 'unordered',
    indent: init.indent ?? 0,
  };
  return Object.freeze(node);
}

export function createCodeBlock(init: CodeBlockInit): CodeBlockNode {
  const node: CodeBlockNode = {
    type: 'codeBlock',
    id: init.id,
    metadata: freezeMetadata(init.metadata),
    text: init.text ?? new AttributedText(),
    language: init.language ?? null,
  };
  return Object.freeze(node);
}

export function createImage(init: ImageInit): ImageNode {
  const node: ImageNode = {
    type: 'image',
    id: init.id,
    metadata: freezeMetadata(init.metadata),
    imageUrl: init.imageUrl,
    altText: init.altText ?? null,
    width: init.width ?? null,
    height: init.height ?? null,
  };
  return Object.freeze(node);
}

export function createHorizontalRule(init: HorizontalRuleInit): HorizontalRuleNode {
  const node: HorizontalRuleNode = {
    type: 'horizontalRule',
    id: init.id,
    metadata: freezeMetadata(init.metadata),
  };
  return Object.freeze(node);
}

// --- copyWith ---

// Every field of a variant except its discriminant may be replaced.
export type NodeChanges<N extends BaseNode> = Partial<Omit<N, 'type'>>;

type AnyNodeChanges = NodeChanges<ParagraphNode> &
  NodeChanges<ListItemNode> &
  NodeChanges<CodeBlockNode> &
  NodeChanges<ImageNode>;

// `undefined` keeps the current value; `null` is a value for nullable fields.
function pick<T>(value: T | undefined, current: T): T {
  return value === undefined ? current : value;
}

/**
 * Returns a new node of the same variant with the given fields replaced.
 * Fields that are not mentioned, or given as `undefined`, are preserved.
 */
export function copyWith(node: ParagraphNode, changes: NodeChanges<ParagraphNode>): ParagraphNode;
export function copyWith(node: ListItemNode, changes: NodeChanges<ListItemNode>): ListItemNode;
export function copyWith(node: CodeBlockNode, changes: NodeChanges<CodeBlockNode>): CodeBlockNode;
export function copyWith(node: ImageNode, changes: NodeChanges<ImageNode>): ImageNode;
export function copyWith(node: HorizontalRuleNode, changes: NodeChanges<HorizontalRuleNode>): HorizontalRuleNode;
export function copyWith(node: TextNode, changes: NodeChanges<TextNode>): TextNode;
export function copyWith(node: DocumentNode, changes: NodeChanges<BaseNode>): DocumentNode;
export function copyWith(node: DocumentNode, changes: AnyNodeChanges): DocumentNode {
  const id = pick(changes.id, node.id);
  const metadata = pick(changes.metadata, node.metadata);
  switch (node.type) {
    case 'paragraph':
      return createParagraph({
        id,
        metadata,
        text: pick(changes.text, node.text),
        blockType: pick(changes.blockType, node.blockType),
      });
    case 'listItem':
      return createListItem({
        id,
        metadata,
        text: pick(changes.text, node.text),
        listType: pick(changes.listType, node.listType),
        indent: pick(changes.indent, node.indent),
      });
    case 'codeBlock':
      return createCodeBlock({
        id,
        metadata,
        text: pick(changes.text, node.text),
        language: pick(changes.language, node.language),
      });
    case 'image':
      return createImage({
        id,
        metadata,
        imageUrl: pick(changes.imageUrl, node.imageUrl),
        altText: pick(changes.altText, node.altText),
        width: pick(changes.width, node.width),
        height: pick(changes.height, node.height),
      });
    case 'horizontalRule':
      return createHorizontalRule({ id, metadata });
  }
}

// --- Equality ---

/** Deep structural comparison for metadata values (primitives, arrays, plain objects). */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isPlainRecord(a) && isPlainRecord(b)) {
    return metadataEq(a, b);
  }
  return false;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function metadataEq(a: NodeMetadata, b: NodeMetadata): boolean {
  if (a === b) return true;
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;
  return keysA.every(key => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key]));
}

/** Structural equality over every declared field of the two nodes, text and metadata included. */
export function nodesEqual(a: DocumentNode, b: DocumentNode): boolean {
  if (a === b) return true;
  if (a.id !== b.id || !metadataEq(a.metadata, b.metadata)) return false;
  switch (a.type) {
    case 'paragraph':
      return b.type === 'paragraph' && a.blockType === b.blockType && a.text.equals(b.text);
    case 'listItem':
      return b.type === 'listItem' && a.listType === b.listType && a.indent === b.indent && a.text.equals(b.text);
    case 'codeBlock':
      return b.type === 'codeBlock' && a.language === b.language && a.text.equals(b.text);
    case 'image':
      return b.type === 'image' &&
        a.imageUrl === b.imageUrl &&
        a.altText === b.altText &&
        a.width === b.width &&
        a.height === b.height;
    case 'horizontalRule':
      return b.type === 'horizontalRule';
  }
}

// --- Description ---

export function describeNode(node: DocumentNode): string {
  const metadata = JSON.stringify(node.metadata);
  switch (node.type) {
    case 'paragraph':
      return `ParagraphNode(id: ${node.id}, blockType: ${node.blockType}, text: ${node.text}, metadata: ${metadata})`;
    case 'listItem':
      return `ListItemNode(id: ${node.id}, listType: ${node.listType}, indent: ${node.indent}, text: ${node.text}, metadata: ${metadata})`;
    case 'codeBlock':
      return `CodeBlockNode(id: ${node.id}, language: ${node.language}, text: ${node.text}, metadata: ${metadata})`;
    case 'image':
      return `ImageNode(id: ${node.id}, imageUrl: ${node.imageUrl}, altText: ${node.altText}, width: ${node.width}, height: ${node.height}, metadata: ${metadata})`;
    case 'horizontalRule':
      return `HorizontalRuleNode(id: ${node.id}, metadata: ${metadata})`;
  }
}
