// src/errors.ts

export type DocumentModelErrorCode = 'OUT_OF_RANGE' | 'NODE_NOT_FOUND' | 'PRECONDITION';

/**
 * Base class for every failure raised by the document model.
 * Failures are thrown synchronously at the call site and never leave a
 * document or value partially changed.
 */
export class DocumentModelError extends Error {
    constructor(message: string, public readonly code: DocumentModelErrorCode) {
        super(message);
        this.name = 'DocumentModelError';
    }
}

/** An index or offset fell outside the range the operation accepts. */
export class OutOfRangeError extends DocumentModelError {
    constructor(
        message: string,
        public readonly value: number,
        public readonly min: number,
        public readonly max: number
    ) {
        super(`${message}: ${value} is outside [${min}, ${max}]`, 'OUT_OF_RANGE');
        this.name = 'OutOfRangeError';
    }
}

export class NodeNotFoundError extends DocumentModelError {
    constructor(public readonly nodeId: string) {
        super(`No node with id "${nodeId}" found in document.`, 'NODE_NOT_FOUND');
        this.name = 'NodeNotFoundError';
    }
}

export class PreconditionError extends DocumentModelError {
    constructor(message: string) {
        super(message, 'PRECONDITION');
        this.name = 'PreconditionError';
    }
}

export function assertInRange(context: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new OutOfRangeError(context, value, min, max);
    }
}

export function assertOrdered(context: string, start: number, end: number): void {
    if (start > end) {
        throw new PreconditionError(`${context}: 'start' (${start}) must be less than or equal to 'end' (${end})`);
    }
}
