// test/changeEvents.test.ts

import {
    changeEventsEqual,
    describeChangeEvent,
    nodeDeleted,
    nodeInserted,
    nodeMoved,
    nodeReplaced,
    textChanged,
} from '../src/changeEvents.js';

describe('change events', () => {
    it('builds tagged values', () => {
        expect(nodeInserted('n1', 0)).toEqual({ type: 'nodeInserted', nodeId: 'n1', index: 0 });
        expect(nodeMoved('n1', 0, 2)).toEqual({ type: 'nodeMoved', nodeId: 'n1', oldIndex: 0, newIndex: 2 });
        expect(nodeReplaced('a', 'b')).toEqual({ type: 'nodeReplaced', oldNodeId: 'a', newNodeId: 'b' });
    });

    it('compares by variant and every field', () => {
        expect(changeEventsEqual(nodeInserted('n1', 0), nodeInserted('n1', 0))).toBe(true);
        expect(changeEventsEqual(nodeInserted('n1', 0), nodeInserted('n1', 1))).toBe(false);
        expect(changeEventsEqual(nodeInserted('n1', 0), nodeDeleted('n1', 0))).toBe(false);
        expect(changeEventsEqual(nodeMoved('n1', 0, 2), nodeMoved('n1', 0, 2))).toBe(true);
        expect(changeEventsEqual(nodeMoved('n1', 0, 2), nodeMoved('n1', 1, 2))).toBe(false);
        expect(changeEventsEqual(textChanged('n1'), textChanged('n2'))).toBe(false);
    });

    it('describes each variant', () => {
        expect([
            nodeInserted('n2', 1),
            nodeDeleted('n2', 1),
            nodeReplaced('a', 'b'),
            nodeMoved('a', 0, 2),
            textChanged('a'),
        ].map(describeChangeEvent)).toEqual([
            'NodeInserted(nodeId: n2, index: 1)',
            'NodeDeleted(nodeId: n2, index: 1)',
            'NodeReplaced(oldNodeId: a, newNodeId: b)',
            'NodeMoved(nodeId: a, oldIndex: 0, newIndex: 2)',
            'TextChanged(nodeId: a)',
        ]);
    });
});
