// src/spanUtils.ts

import { Attribution, attributionsEqual, canMutuallyMerge } from './attribution.js';
import { AttributionSpan, SpanMarker } from './spanMarker.js';

/**
 * Total order used for stored markers: offset, then 'start' before 'end',
 * then the attribution's string form so that equal span sets always produce
 * identical marker lists.
 */
export function canonicalMarkerOrder(a: SpanMarker, b: SpanMarker): number {
    const byPosition = a.compareTo(b);
    if (byPosition !== 0) return byPosition;
    const aKey = a.attribution.toString();
    const bKey = b.attribution.toString();
    return aKey < bKey ? -1 : aKey > bKey ? 1 : 0;
}

/**
 * Resolves a sorted marker list into spans by bracket matching.
 * Each attribution keeps its own stack of open start offsets; an 'end'
 * closes the most recently opened start of an equal attribution. Unmatched
 * markers are ignored.
 *
 * Overlapping spans of equal attributions come back nested, innermost first:
 * `start 0, start 3, end 5, end 8` resolves to `3..5` then `0..8`. Where the
 * attributions also merge, `mergeSpans` folds the pair into one span; where
 * they do not, both spans survive and coverage is unchanged.
 */
export function resolveSpans(sortedMarkers: ReadonlyArray<SpanMarker>): AttributionSpan[] {
    const spans: AttributionSpan[] = [];
    const openStarts: Array<{ attribution: Attribution; starts: number[] }> = [];

    for (const marker of sortedMarkers) {
        let entry = openStarts.find(e => attributionsEqual(e.attribution, marker.attribution));
        if (marker.isStart) {
            if (!entry) {
                entry = { attribution: marker.attribution, starts: [] };
                openStarts.push(entry);
            }
            entry.starts.push(marker.offset);
        } else if (entry && entry.starts.length > 0) {
            const startOffset = entry.starts.pop();
            if (startOffset !== undefined) {
                spans.push(new AttributionSpan(marker.attribution, startOffset, marker.offset));
            }
        }
    }
    return spans;
}

class UnionFind {
    private readonly parent: number[];

    constructor(size: number) {
        this.parent = Array.from({ length: size }, (_, i) => i);
    }

    find(i: number): number {
        let root = i;
        while (this.parent[root] !== root) root = this.parent[root];
        // Path compression
        let current = i;
        while (this.parent[current] !== root) {
            const next = this.parent[current];
            this.parent[current] = root;
            current = next;
        }
        return root;
    }

    union(a: number, b: number): void {
        const rootA = this.find(a);
        const rootB = this.find(b);
        if (rootA === rootB) return;
        // Keep the lower index as root so class order follows first appearance.
        if (rootA < rootB) this.parent[rootB] = rootA;
        else this.parent[rootA] = rootB;
    }
}

/**
 * Groups spans into merge classes and folds each class.
 *
 * Classes are the connected components of the mutual `canMergeWith`
 * relation over the spans present, computed with union-find so the result
 * does not depend on the order spans are encountered. Within a class, spans
 * sorted by start are folded while the next span starts at most one offset
 * after the current end (overlapping or adjacent). A folded span carries the
 * attribution of its earliest member.
 */
export function mergeSpans(spans: ReadonlyArray<AttributionSpan>): AttributionSpan[] {
    if (spans.length === 0) return [];

    const classes = new UnionFind(spans.length);
    for (let i = 0; i < spans.length; i++) {
        for (let j = i + 1; j < spans.length; j++) {
            if (canMutuallyMerge(spans[i].attribution, spans[j].attribution)) {
                classes.union(i, j);
            }
        }
    }

    const groups = new Map<number, AttributionSpan[]>();
    spans.forEach((span, i) => {
        const root = classes.find(i);
        const group = groups.get(root);
        if (group) group.push(span);
        else groups.set(root, [span]);
    });

    const result: AttributionSpan[] = [];
    for (const group of groups.values()) {
        const sorted = [...group].sort((a, b) => a.start - b.start || a.end - b.end);
        let current = sorted[0];
        for (let i = 1; i < sorted.length; i++) {
            const next = sorted[i];
            if (next.start <= current.end + 1) {
                current = new AttributionSpan(current.attribution, current.start, Math.max(current.end, next.end));
            } else {
                result.push(current);
                current = next;
            }
        }
        result.push(current);
    }
    return result;
}

export function markersFromSpans(spans: ReadonlyArray<AttributionSpan>): SpanMarker[] {
    const markers: SpanMarker[] = [];
    for (const span of spans) {
        markers.push(SpanMarker.start(span.attribution, span.start), SpanMarker.end(span.attribution, span.end));
    }
    return markers.sort(canonicalMarkerOrder);
}

/** Sorts, resolves, merges and re-emits a marker list in canonical form. */
export function normalizeMarkers(markers: ReadonlyArray<SpanMarker>): SpanMarker[] {
    if (markers.length === 0) return [];
    const sorted = [...markers].sort(canonicalMarkerOrder);
    return markersFromSpans(mergeSpans(resolveSpans(sorted)));
}

/** True when every offset in `[start, end]` lies inside a span equal to `attribution`. */
export function isRangeCovered(
    spans: ReadonlyArray<AttributionSpan>,
    attribution: Attribution,
    start: number,
    end: number
): boolean {
    if (start > end) return true;
    const matching = spans
        .filter(span => attributionsEqual(span.attribution, attribution))
        .sort((a, b) => a.start - b.start);

    let covered = start;
    for (const span of matching) {
        if (span.start > covered) break;
        if (span.end >= covered) covered = span.end + 1;
        if (covered > end) return true;
    }
    return false;
}
