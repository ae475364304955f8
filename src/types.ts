// src/types.ts
import { NodeIdGenerator } from './nodeId.js';

export interface DocumentOptions {
  debug?: boolean; // Log every mutation through the 'MutableDocument' logger
  idGenerator?: NodeIdGenerator; // Source for MutableDocument.generateNodeId(), defaults to 'node-<n>'
}
