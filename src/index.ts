// src/index.ts

export { Attribution, NamedAttribution, LinkAttribution, attributionsEqual, canMutuallyMerge } from './attribution.js';
export { SpanMarker, SpanMarkerType, AttributionSpan, compareMarkers } from './spanMarker.js';
export { normalizeMarkers } from './spanUtils.js';
export { AttributedText } from './AttributedText.js';
export * from './documentModel.js';
export * from './changeEvents.js';
export { Document } from './Document.js';
export { MutableDocument, ChangeBatch, ChangeListener } from './MutableDocument.js';
export {
  TextAffinity,
  BinarySide,
  TextNodePosition,
  BinaryNodePosition,
  NodePosition,
  DocumentPosition,
  nodePositionsEqual,
} from './position.js';
export { DocumentSelection, comparePositions } from './selection.js';
export * from './errors.js';
export { setDebug, isDebugEnabled, createLogger, Logger } from './debug.js';
export { NodeIdGenerator, createSequentialIdGenerator, createUuidIdGenerator } from './nodeId.js';
export { DocumentOptions } from './types.js';
