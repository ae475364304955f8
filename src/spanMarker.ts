// src/spanMarker.ts

import { Attribution, attributionsEqual } from './attribution.js';

export type SpanMarkerType = 'start' | 'end';

/**
 * One boundary of an attribution span. Markers sort by offset, and at the
 * same offset a 'start' sorts before an 'end'.
 */
export class SpanMarker {
    constructor(
        public readonly attribution: Attribution,
        public readonly offset: number,
        public readonly markerType: SpanMarkerType
    ) {}

    static start(attribution: Attribution, offset: number): SpanMarker {
        return new SpanMarker(attribution, offset, 'start');
    }

    static end(attribution: Attribution, offset: number): SpanMarker {
        return new SpanMarker(attribution, offset, 'end');
    }

    get isStart(): boolean {
        return this.markerType === 'start';
    }

    get isEnd(): boolean {
        return this.markerType === 'end';
    }

    copyWith(changes: { attribution?: Attribution; offset?: number; markerType?: SpanMarkerType }): SpanMarker {
        return new SpanMarker(
            changes.attribution ?? this.attribution,
            changes.offset ?? this.offset,
            changes.markerType ?? this.markerType
        );
    }

    compareTo(other: SpanMarker): number {
        if (this.offset !== other.offset) return this.offset - other.offset;
        if (this.markerType === other.markerType) return 0;
        return this.markerType === 'start' ? -1 : 1;
    }

    equals(other: SpanMarker): boolean {
        return this.offset === other.offset &&
            this.markerType === other.markerType &&
            attributionsEqual(this.attribution, other.attribution);
    }

    toString(): string {
        return `SpanMarker(${this.attribution}, ${this.offset}, ${this.markerType})`;
    }
}

export function compareMarkers(a: SpanMarker, b: SpanMarker): number {
    return a.compareTo(b);
}

/** A resolved span; `start` and `end` are both inclusive. */
export class AttributionSpan {
    constructor(
        public readonly attribution: Attribution,
        public readonly start: number,
        public readonly end: number
    ) {}

    get length(): number {
        return this.end - this.start + 1;
    }

    contains(offset: number): boolean {
        return this.start <= offset && offset <= this.end;
    }

    overlaps(start: number, end: number): boolean {
        return this.start <= end && this.end >= start;
    }

    equals(other: AttributionSpan): boolean {
        return this.start === other.start &&
            this.end === other.end &&
            attributionsEqual(this.attribution, other.attribution);
    }

    toString(): string {
        return `AttributionSpan(${this.attribution}, ${this.start}..${this.end})`;
    }
}
