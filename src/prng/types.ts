export type PrngLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type SerializerOptions = {
    /**
     * What to do when a restored word differs from the one written (a stream
     * word the generator had to remap). Padding and hex case never count.
     * - 'warn' (default): log through `logger`, if any, and return the generator as restored
     * - 'strict': throw StateMismatchError
     */
    integrityMode?: 'strict' | 'warn';
    /** Optional logger hook; nothing in src/ writes to the console. */
    logger?: PrngLogger | null;
};

export const SERIALIZER_DEFAULTS: Required<SerializerOptions> = {
    integrityMode: 'warn',
    logger: null,
};
