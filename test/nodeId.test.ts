// test/nodeId.test.ts

import { createSequentialIdGenerator, createUuidIdGenerator } from '../src/nodeId.js';

describe('createSequentialIdGenerator', () => {
    it('counts from zero with the "node" prefix by default', () => {
        const next = createSequentialIdGenerator();
        expect([next(), next(), next()]).toEqual(['node-0', 'node-1', 'node-2']);
    });

    it('takes a prefix and a starting value', () => {
        const next = createSequentialIdGenerator('para', 5);
        expect([next(), next()]).toEqual(['para-5', 'para-6']);
    });

    it('keeps a separate counter per generator', () => {
        const a = createSequentialIdGenerator();
        const b = createSequentialIdGenerator();
        a();
        a();
        expect(b()).toBe('node-0');
        expect(a()).toBe('node-2');
    });
});

describe('createUuidIdGenerator', () => {
    it('yields distinct version 4 UUIDs', () => {
        const next = createUuidIdGenerator();
        const first = next();
        const second = next();
        expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        expect(second).not.toBe(first);
    });
});
