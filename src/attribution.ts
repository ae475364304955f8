// src/attribution.ts

/**
 * A named tag that can be applied to a span of text.
 *
 * `id` names the kind of attribution; two attributions with the same id are
 * not necessarily equal (two links to different URLs share the id "link").
 * `equals` is full structural equality. `canMergeWith` decides whether two
 * overlapping or adjacent spans collapse into one, and must behave as an
 * equivalence relation: symmetric and transitive across every attribution
 * that can meet in the same text.
 */
export interface Attribution {
    readonly id: string;
    canMergeWith(other: Attribution): boolean;
    equals(other: Attribution): boolean;
    toString(): string;
}

export class NamedAttribution implements Attribution {
    constructor(public readonly id: string) {}

    static readonly bold = new NamedAttribution('bold');
    static readonly italics = new NamedAttribution('italics');
    static readonly underline = new NamedAttribution('underline');
    static readonly strikethrough = new NamedAttribution('strikethrough');
    static readonly code = new NamedAttribution('code');

    canMergeWith(other: Attribution): boolean {
        return this.equals(other);
    }

    equals(other: Attribution): boolean {
        return other instanceof NamedAttribution && other.id === this.id;
    }

    toString(): string {
        return `NamedAttribution(${this.id})`;
    }
}

/** A hyperlink. Links only merge with, and only equal, links to the same URL. */
export class LinkAttribution implements Attribution {
    readonly id = 'link';

    constructor(public readonly url: string) {}

    canMergeWith(other: Attribution): boolean {
        return other instanceof LinkAttribution && other.url === this.url;
    }

    equals(other: Attribution): boolean {
        return other instanceof LinkAttribution && other.url === this.url;
    }

    toString(): string {
        return `LinkAttribution(${this.url})`;
    }
}

export function attributionsEqual(a: Attribution, b: Attribution): boolean {
    return a === b || a.equals(b);
}

/** Two attributions belong to the same merge class when each accepts the other. */
export function canMutuallyMerge(a: Attribution, b: Attribution): boolean {
    return a.canMergeWith(b) && b.canMergeWith(a);
}
