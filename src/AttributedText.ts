// src/AttributedText.ts

import { Attribution, attributionsEqual } from './attribution.js';
import { AttributionSpan, SpanMarker } from './spanMarker.js';
import { isRangeCovered, normalizeMarkers, resolveSpans } from './spanUtils.js';
import { assertInRange, assertOrdered } from './errors.js';

/**
 * Immutable rich text: a string plus a sorted, normalized list of span
 * markers. Offsets are UTF-16 code unit indices into `text`.
 *
 * Every mutating method returns a new instance. Span end offsets are
 * inclusive everywhere except the `end` argument of `copyText` and `delete`,
 * which is exclusive like `String.prototype.slice`.
 *
 * An inclusive span `end` may equal `length`, one past the last character.
 * Such a span covers the end-of-text caret, and text later inserted at
 * `length` falls inside it and takes the attribution.
 *
 * ```ts
 * const text = new AttributedText('hello world')
 *     .applyAttribution(NamedAttribution.bold, 0, 4);
 * text.hasAttributionAt(2, NamedAttribution.bold); // true
 * text.hasAttributionAt(5, NamedAttribution.bold); // false
 * ```
 */
export class AttributedText {
    public readonly markers: ReadonlyArray<SpanMarker>;
    private spanCache: ReadonlyArray<AttributionSpan> | null = null;

    constructor(public readonly text: string = '', markers: ReadonlyArray<SpanMarker> = []) {
        this.markers = Object.freeze(normalizeMarkers(markers));
    }

    get length(): number {
        return this.text.length;
    }

    // --- Queries ---

    /** Every resolved span, ordered by where each span ends. */
    getAllSpans(): ReadonlyArray<AttributionSpan> {
        if (!this.spanCache) {
            this.spanCache = Object.freeze(resolveSpans(this.markers));
        }
        return this.spanCache;
    }

    getAttributionsAt(offset: number): Set<Attribution> {
        const result = new Set<Attribution>();
        for (const span of this.getAllSpans()) {
            if (span.contains(offset)) result.add(span.attribution);
        }
        return result;
    }

    hasAttributionAt(offset: number, attribution: Attribution): boolean {
        return this.getAttributionSpanAt(offset, attribution) !== null;
    }

    getAttributionSpanAt(offset: number, attribution: Attribution): AttributionSpan | null {
        for (const span of this.getAllSpans()) {
            if (span.contains(offset) && attributionsEqual(span.attribution, attribution)) {
                return span;
            }
        }
        return null;
    }

    /** Spans with `span.start <= end && span.end >= start`. */
    getAttributionSpansInRange(start: number, end: number): AttributionSpan[] {
        return this.getAllSpans().filter(span => span.overlaps(start, end));
    }

    // --- Attribution changes ---

    /**
     * Applies `attribution` over `[start, end]`. Spans of the same merge class
     * that now overlap or touch are collapsed into one.
     */
    applyAttribution(attribution: Attribution, start: number, end: number): AttributedText {
        this.checkRange('applyAttribution', start, end);
        return new AttributedText(this.text, [
            ...this.markers,
            SpanMarker.start(attribution, start),
            SpanMarker.end(attribution, end),
        ]);
    }

    /**
     * Removes `attribution` from `[start, end]`, keeping the parts of existing
     * spans that lie outside the range. Returns this same instance when the
     * attribution does not occur at all.
     */
    removeAttribution(attribution: Attribution, start: number, end: number): AttributedText {
        this.checkRange('removeAttribution', start, end);
        const existing = this.getAllSpans().filter(span => attributionsEqual(span.attribution, attribution));
        if (existing.length === 0) return this;

        const updated = this.markers.filter(marker => !attributionsEqual(marker.attribution, attribution));
        for (const span of existing) {
            if (span.start < start) {
                updated.push(SpanMarker.start(attribution, span.start), SpanMarker.end(attribution, Math.min(span.end, start - 1)));
            }
            if (span.end > end) {
                updated.push(SpanMarker.start(attribution, Math.max(span.start, end + 1)), SpanMarker.end(attribution, span.end));
            }
        }
        return new AttributedText(this.text, updated);
    }

    /**
     * Removes `attribution` from `[start, end]` when every offset in the range
     * already carries it, otherwise applies it over the entire range.
     */
    toggleAttribution(attribution: Attribution, start: number, end: number): AttributedText {
        this.checkRange('toggleAttribution', start, end);
        if (isRangeCovered(this.getAllSpans(), attribution, start, end)) {
            return this.removeAttribution(attribution, start, end);
        }
        return this.applyAttribution(attribution, start, end);
    }

    // --- Text changes ---

    /**
     * Copies `[start, end)`; `end` defaults to the text length. Spans are
     * clipped to the copied range and re-indexed so that `start` becomes 0.
     */
    copyText(start: number, end: number = this.length): AttributedText {
        this.checkRange('copyText', start, end);
        const markers: SpanMarker[] = [];
        for (const span of this.getAllSpans()) {
            if (span.end < start || span.start >= end) continue;
            const clippedStart = Math.max(span.start, start);
            const clippedEnd = Math.min(span.end, end - 1);
            markers.push(
                SpanMarker.start(span.attribution, clippedStart - start),
                SpanMarker.end(span.attribution, clippedEnd - start)
            );
        }
        return new AttributedText(this.text.slice(start, end), markers);
    }

    /**
     * Splices `other` in at `offset`. Markers at or after `offset` move right
     * by `other.length`; the markers of `other` move right by `offset`.
     */
    insert(offset: number, other: AttributedText): AttributedText {
        assertInRange('AttributedText.insert offset', offset, 0, this.length);
        const insertLength = other.length;
        const shifted = this.markers.map(marker =>
            marker.offset >= offset ? marker.copyWith({ offset: marker.offset + insertLength }) : marker
        );
        const inserted = other.markers.map(marker => marker.copyWith({ offset: marker.offset + offset }));
        const text = this.text.slice(0, offset) + other.text + this.text.slice(offset);
        return new AttributedText(text, [...shifted, ...inserted]);
    }

    /**
     * Deletes `[start, end)`. Spans inside the range are dropped, spans after
     * it shift left, and spans crossing a boundary keep only what survives.
     */
    delete(start: number, end: number): AttributedText {
        this.checkRange('delete', start, end);
        const deleteLength = end - start;
        const markers: SpanMarker[] = [];

        for (const span of this.getAllSpans()) {
            let newStart: number;
            let newEnd: number;
            if (span.start >= start && span.end < end) {
                continue;
            } else if (span.start >= end) {
                newStart = span.start - deleteLength;
                newEnd = span.end - deleteLength;
            } else if (span.end < start) {
                newStart = span.start;
                newEnd = span.end;
            } else {
                newStart = Math.min(span.start, start);
                newEnd = span.end >= end ? span.end - deleteLength : start - 1;
            }
            if (newStart <= newEnd) {
                markers.push(SpanMarker.start(span.attribution, newStart), SpanMarker.end(span.attribution, newEnd));
            }
        }

        return new AttributedText(this.text.slice(0, start) + this.text.slice(end), markers);
    }

    /**
     * Replaces `[start, end]` (both inclusive) with `replacement`; the same as
     * `delete(start, end + 1).insert(start, replacement)`.
     */
    replaceSub(start: number, end: number, replacement: AttributedText): AttributedText {
        return this.delete(start, end + 1).insert(start, replacement);
    }

    // --- Equality & debugging ---

    equals(other: AttributedText): boolean {
        if (this === other) return true;
        if (this.text !== other.text || this.markers.length !== other.markers.length) return false;
        return this.markers.every((marker, i) => marker.equals(other.markers[i]));
    }

    toString(): string {
        return `AttributedText("${this.text}", markers: [${this.markers.join(', ')}])`;
    }

    private checkRange(operation: string, start: number, end: number): void {
        assertOrdered(`AttributedText.${operation}`, start, end);
        assertInRange(`AttributedText.${operation} start`, start, 0, this.length);
        assertInRange(`AttributedText.${operation} end`, end, 0, this.length);
    }
}
