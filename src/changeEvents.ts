// src/changeEvents.ts

export interface NodeInserted {
    readonly type: 'nodeInserted';
    readonly nodeId: string;
    readonly index: number; // Position after the insertion
}

export interface NodeDeleted {
    readonly type: 'nodeDeleted';
    readonly nodeId: string;
    readonly index: number; // Position the node held before deletion
}

export interface NodeReplaced {
    readonly type: 'nodeReplaced';
    readonly oldNodeId: string;
    readonly newNodeId: string;
}

export interface NodeMoved {
    readonly type: 'nodeMoved';
    readonly nodeId: string;
    readonly oldIndex: number;
    readonly newIndex: number;
}

export interface TextChanged {
    readonly type: 'textChanged';
    readonly nodeId: string;
}

/**
 * One structural or content change made by a MutableDocument operation.
 * Switch on `type` to handle each case.
 */
export type DocumentChangeEvent = NodeInserted | NodeDeleted | NodeReplaced | NodeMoved | TextChanged;

export function nodeInserted(nodeId: string, index: number): NodeInserted {
    return { type: 'nodeInserted', nodeId, index };
}

export function nodeDeleted(nodeId: string, index: number): NodeDeleted {
    return { type: 'nodeDeleted', nodeId, index };
}

export function nodeReplaced(oldNodeId: string, newNodeId: string): NodeReplaced {
    return { type: 'nodeReplaced', oldNodeId, newNodeId };
}

export function nodeMoved(nodeId: string, oldIndex: number, newIndex: number): NodeMoved {
    return { type: 'nodeMoved', nodeId, oldIndex, newIndex };
}

export function textChanged(nodeId: string): TextChanged {
    return { type: 'textChanged', nodeId };
}

export function changeEventsEqual(a: DocumentChangeEvent, b: DocumentChangeEvent): boolean {
    switch (a.type) {
        case 'nodeInserted':
            return b.type === 'nodeInserted' && a.nodeId === b.nodeId && a.index === b.index;
        case 'nodeDeleted':
            return b.type === 'nodeDeleted' && a.nodeId === b.nodeId && a.index === b.index;
        case 'nodeReplaced':
            return b.type === 'nodeReplaced' && a.oldNodeId === b.oldNodeId && a.newNodeId === b.newNodeId;
        case 'nodeMoved':
            return b.type === 'nodeMoved' &&
                a.nodeId === b.nodeId &&
                a.oldIndex === b.oldIndex &&
                a.newIndex === b.newIndex;
        case 'textChanged':
            return b.type === 'textChanged' && a.nodeId === b.nodeId;
    }
}

export function describeChangeEvent(event: DocumentChangeEvent): string {
    switch (event.type) {
        case 'nodeInserted':
            return `NodeInserted(nodeId: ${event.nodeId}, index: ${event.index})`;
        case 'nodeDeleted':
            return `NodeDeleted(nodeId: ${event.nodeId}, index: ${event.index})`;
        case 'nodeReplaced':
            return `NodeReplaced(oldNodeId: ${event.oldNodeId}, newNodeId: ${event.newNodeId})`;
        case 'nodeMoved':
            return `NodeMoved(nodeId: ${event.nodeId}, oldIndex: ${event.oldIndex}, newIndex: ${event.newIndex})`;
        case 'textChanged':
            return `TextChanged(nodeId: ${event.nodeId})`;
    }
}
