// test/spanUtils.test.ts

import { Attribution, LinkAttribution, NamedAttribution } from '../src/attribution.js';
import { AttributionSpan, SpanMarker } from '../src/spanMarker.js';
import {
    canonicalMarkerOrder,
    isRangeCovered,
    mergeSpans,
    normalizeMarkers,
    resolveSpans,
} from '../src/spanUtils.js';

const bold = NamedAttribution.bold;
const italics = NamedAttribution.italics;

const describeSpans = (spans: ReadonlyArray<AttributionSpan>): string[] => spans.map(span => span.toString());

describe('canonicalMarkerOrder', () => {
    it('orders by offset first', () => {
        expect(canonicalMarkerOrder(SpanMarker.end(bold, 2), SpanMarker.start(bold, 3))).toBeLessThan(0);
    });

    it('puts a start before an end at the same offset', () => {
        expect(canonicalMarkerOrder(SpanMarker.start(bold, 3), SpanMarker.end(bold, 3))).toBeLessThan(0);
        expect(canonicalMarkerOrder(SpanMarker.end(bold, 3), SpanMarker.start(bold, 3))).toBeGreaterThan(0);
    });

    it('breaks remaining ties by attribution', () => {
        expect(canonicalMarkerOrder(SpanMarker.start(bold, 0), SpanMarker.start(italics, 0))).toBe(-1);
        expect(canonicalMarkerOrder(SpanMarker.start(italics, 0), SpanMarker.start(bold, 0))).toBe(1);
        expect(canonicalMarkerOrder(SpanMarker.start(bold, 0), SpanMarker.start(bold, 0))).toBe(0);
    });
});

describe('resolveSpans', () => {
    it('matches each end with the latest open start of the same attribution', () => {
        const spans = resolveSpans([
            SpanMarker.start(bold, 0),
            SpanMarker.start(bold, 3),
            SpanMarker.end(bold, 4),
            SpanMarker.end(bold, 8),
        ]);
        expect(describeSpans(spans)).toEqual([
            'AttributionSpan(NamedAttribution(bold), 3..4)',
            'AttributionSpan(NamedAttribution(bold), 0..8)',
        ]);
    });

    it('keeps attributions on separate stacks', () => {
        const spans = resolveSpans([
            SpanMarker.start(bold, 0),
            SpanMarker.start(italics, 2),
            SpanMarker.end(bold, 4),
            SpanMarker.end(italics, 6),
        ]);
        expect(describeSpans(spans)).toEqual([
            'AttributionSpan(NamedAttribution(bold), 0..4)',
            'AttributionSpan(NamedAttribution(italics), 2..6)',
        ]);
    });

    it('ignores an end without a start', () => {
        expect(resolveSpans([SpanMarker.end(bold, 2)])).toEqual([]);
    });

    it('keeps overlapping spans that never merge as nested pairs', () => {
        const comment: Attribution = {
            id: 'comment',
            canMergeWith: (_other: Attribution) => false,
            equals: (other: Attribution) => other.id === 'comment',
            toString: () => 'comment',
        };
        const spans = resolveSpans([
            SpanMarker.start(comment, 0),
            SpanMarker.start(comment, 3),
            SpanMarker.end(comment, 5),
            SpanMarker.end(comment, 8),
        ]);
        expect(spans.map(s => [s.start, s.end])).toEqual([[3, 5], [0, 8]]);
        expect(mergeSpans(spans).map(s => [s.start, s.end])).toEqual([[3, 5], [0, 8]]);
    });
});

describe('mergeSpans', () => {
    it('folds overlapping and adjacent spans of one class', () => {
        const merged = mergeSpans([
            new AttributionSpan(bold, 4, 6),
            new AttributionSpan(bold, 0, 3),
            new AttributionSpan(bold, 9, 9),
        ]);
        expect(describeSpans(merged)).toEqual([
            'AttributionSpan(NamedAttribution(bold), 0..6)',
            'AttributionSpan(NamedAttribution(bold), 9..9)',
        ]);
    });

    it('groups link spans by URL regardless of encounter order', () => {
        const linkA = new LinkAttribution('https://a.example.test');
        const linkB = new LinkAttribution('https://b.example.test');
        const merged = mergeSpans([
            new AttributionSpan(linkA, 0, 2),
            new AttributionSpan(linkB, 1, 3),
            new AttributionSpan(new LinkAttribution('https://a.example.test'), 3, 5),
        ]);
        expect(describeSpans(merged)).toEqual([
            'AttributionSpan(LinkAttribution(https://a.example.test), 0..5)',
            'AttributionSpan(LinkAttribution(https://b.example.test), 1..3)',
        ]);
    });

    it('returns nothing for no spans', () => {
        expect(mergeSpans([])).toEqual([]);
    });
});

describe('normalizeMarkers', () => {
    it('produces one start and one end per merged span', () => {
        const markers = normalizeMarkers([
            SpanMarker.start(italics, 5),
            SpanMarker.end(italics, 7),
            SpanMarker.start(bold, 0),
            SpanMarker.end(bold, 3),
            SpanMarker.start(bold, 2),
            SpanMarker.end(bold, 5),
        ]);
        expect(markers.map(m => m.toString())).toEqual([
            'SpanMarker(NamedAttribution(bold), 0, start)',
            'SpanMarker(NamedAttribution(italics), 5, start)',
            'SpanMarker(NamedAttribution(bold), 5, end)',
            'SpanMarker(NamedAttribution(italics), 7, end)',
        ]);
    });

    it('is stable when applied to its own output', () => {
        const once = normalizeMarkers([SpanMarker.end(bold, 4), SpanMarker.start(bold, 1)]);
        const twice = normalizeMarkers(once);
        expect(twice.every((marker, i) => marker.equals(once[i]))).toBe(true);
        expect(twice).toHaveLength(once.length);
    });
});

describe('isRangeCovered', () => {
    const spans = [new AttributionSpan(bold, 0, 2), new AttributionSpan(bold, 3, 5), new AttributionSpan(bold, 8, 9)];

    it('accepts a range covered by adjacent spans', () => {
        expect(isRangeCovered(spans, bold, 0, 5)).toBe(true);
        expect(isRangeCovered(spans, bold, 8, 9)).toBe(true);
    });

    it('rejects a range with a gap', () => {
        expect(isRangeCovered(spans, bold, 0, 6)).toBe(false);
        expect(isRangeCovered(spans, bold, 4, 8)).toBe(false);
    });

    it('only counts spans of an equal attribution', () => {
        expect(isRangeCovered(spans, italics, 0, 1)).toBe(false);
    });
});
