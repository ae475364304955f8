// test/position.test.ts

import {
    BinaryNodePosition,
    DocumentPosition,
    nodePositionsEqual,
    TextNodePosition,
} from '../src/position.js';

describe('TextNodePosition', () => {
    it('defaults to downstream affinity', () => {
        const position = new TextNodePosition(3);
        expect(position.type).toBe('text');
        expect(position.affinity).toBe('downstream');
    });

    it('compares offset and affinity', () => {
        expect(new TextNodePosition(3).equals(new TextNodePosition(3))).toBe(true);
        expect(new TextNodePosition(3).equals(new TextNodePosition(3, 'upstream'))).toBe(false);
        expect(new TextNodePosition(3).equals(new TextNodePosition(4))).toBe(false);
        expect(new TextNodePosition(0).equals(BinaryNodePosition.upstream())).toBe(false);
    });

    it('copies with replaced fields', () => {
        const moved = new TextNodePosition(3, 'upstream').copyWith({ offset: 5 });
        expect([moved.offset, moved.affinity]).toEqual([5, 'upstream']);
    });

    it('describes itself', () => {
        expect(new TextNodePosition(2).toString()).toBe('TextNodePosition(offset: 2, affinity: downstream)');
    });
});

describe('BinaryNodePosition', () => {
    it('has an upstream and a downstream side', () => {
        expect(BinaryNodePosition.upstream().side).toBe('upstream');
        expect(BinaryNodePosition.downstream().side).toBe('downstream');
        expect(BinaryNodePosition.upstream().type).toBe('binary');
    });

    it('compares sides', () => {
        expect(BinaryNodePosition.upstream().equals(BinaryNodePosition.upstream())).toBe(true);
        expect(BinaryNodePosition.upstream().equals(BinaryNodePosition.downstream())).toBe(false);
        expect(nodePositionsEqual(BinaryNodePosition.downstream(), new TextNodePosition(0))).toBe(false);
    });

    it('describes itself', () => {
        expect(BinaryNodePosition.downstream().toString()).toBe('BinaryNodePosition(downstream)');
    });
});

describe('DocumentPosition', () => {
    const position = new DocumentPosition('n1', new TextNodePosition(3));

    it('compares node id and node position', () => {
        expect(position.equals(new DocumentPosition('n1', new TextNodePosition(3)))).toBe(true);
        expect(position.equals(new DocumentPosition('n2', new TextNodePosition(3)))).toBe(false);
        expect(position.equals(new DocumentPosition('n1', new TextNodePosition(4)))).toBe(false);
    });

    it('does not check the node exists', () => {
        expect(new DocumentPosition('nowhere', BinaryNodePosition.upstream()).nodeId).toBe('nowhere');
    });

    it('copies with replaced fields', () => {
        const copy = position.copyWith({ nodePosition: BinaryNodePosition.downstream() });
        expect(copy.nodeId).toBe('n1');
        expect(copy.nodePosition.equals(BinaryNodePosition.downstream())).toBe(true);
    });

    it('describes itself', () => {
        expect(position.toString()).toBe(
            'DocumentPosition(nodeId: n1, nodePosition: TextNodePosition(offset: 3, affinity: downstream))'
        );
    });
});
