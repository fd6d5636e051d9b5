export type CollectionErrorCode = 'NOT_FOUND' | 'CONFLICT' | 'INVALID_WEIGHT' | 'EMPTY';

export class CollectionError extends Error {
    readonly code: CollectionErrorCode;
    readonly context: Record<string, unknown> | undefined;

    constructor(code: CollectionErrorCode, message: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'CollectionError';
        this.code = code;
        this.context = context;
    }
}

/** A direct lookup or an update targeted a key, value or item that is not present. */
export class NotFoundError extends CollectionError {
    constructor(message: string, context?: Record<string, unknown>) {
        super('NOT_FOUND', message, context);
        this.name = 'NotFoundError';
    }
}

/** An insert would break uniqueness: the key, value or item is already present. */
export class ConflictError extends CollectionError {
    constructor(message: string, context?: Record<string, unknown>) {
        super('CONFLICT', message, context);
        this.name = 'ConflictError';
    }
}

export class InvalidWeightError extends CollectionError {
    constructor(message: string, context?: Record<string, unknown>) {
        super('INVALID_WEIGHT', message, context);
        this.name = 'InvalidWeightError';
    }
}

export class EmptyError extends CollectionError {
    constructor(message: string, context?: Record<string, unknown>) {
        super('EMPTY', message, context);
        this.name = 'EmptyError';
    }
}

export function isCollectionError(error: unknown): error is CollectionError {
    return error instanceof CollectionError;
}
