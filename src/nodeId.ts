// src/nodeId.ts

import { v4 as uuidv4 } from 'uuid';

/** Produces a fresh node id on every call. */
export type NodeIdGenerator = () => string;

/**
 * Returns a generator yielding `prefix-start`, `prefix-(start + 1)`, ...
 * Each generator keeps its own counter, so two documents never share one.
 */
export function createSequentialIdGenerator(prefix: string = 'node', start: number = 0): NodeIdGenerator {
    let counter = start;
    return () => `${prefix}-${counter++}`;
}

export function createUuidIdGenerator(): NodeIdGenerator {
    return () => uuidv4();
}
