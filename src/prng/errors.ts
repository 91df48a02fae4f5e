export class PrngError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'PrngError';
    }
}

/** An optional operation (see `capabilities`) was called on a generator that lacks it. */
export class UnsupportedOperationError extends PrngError {
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedOperationError';
    }
}

export class DeserializationError extends PrngError {
    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'DeserializationError';
    }
}

/** A restored word differs from the word that was written. */
export class StateMismatchError extends PrngError {
    constructor(message: string) {
        super(message);
        this.name = 'StateMismatchError';
    }
}
