/**
 * Shared types for the generator core and its base contract.
 *
 * @module trace-prng
 */

/** A 64-bit unsigned word. Always held in the range [0, 2^64). */
export type U64 = bigint;

/** Anything accepted where a seed is expected; numbers must be safe integers. */
export type SeedInput = bigint | number;

/** The six words of a TraceRandom, in index order 0..5. */
export type TraceWords = readonly [a: U64, b: U64, c: U64, d: U64, e: U64, f: U64];

/**
 * What a generator can do beyond producing the next value.
 */
export interface GeneratorCapabilities {
    /** `getWord()` is supported. */
    readAccess: boolean;
    /** `setWord()` writes the selected word instead of reseeding. */
    writeAccess: boolean;
    /** `previousULong()` is supported. */
    previous: boolean;
    /** `skip()` is supported. */
    skip: boolean;
    /** `leap()` is supported. */
    leap: boolean;
}

/**
 * Contract shared by every generator and wrapper.
 *
 * Only `nextULong()` is mandatory; the optional operations are described by
 * `capabilities` and throw `UnsupportedOperationError` when absent.
 */
export interface EnhancedRandom {
    /** Short identifier used as the serialization prefix. Never contains a backtick. */
    readonly tag: string;
    readonly wordCount: number;
    readonly capabilities: Readonly<GeneratorCapabilities>;

    seed(seed: SeedInput): void;
    nextULong(): U64;
    previousULong(): U64;
    skip(distance: U64): U64;
    leap(): U64;

    getWord(index: number): U64;
    setWord(index: number, value: U64): void;
    setState(...words: U64[]): void;

    nextLong(): bigint;
    nextBoundedULong(bound: U64): U64;
    nextULongBetween(inner: U64, outer: U64): U64;
    nextLongBetween(inner: bigint, outer: bigint): bigint;
    nextInt(outerBound: number): number;
    nextIntBetween(innerBound: number, outerBound: number): number;
    nextBits(bits: number): number;
    nextBool(): boolean;
    nextFloat(): number;
    nextDouble(): number;
    nextSparseFloat(): number;
    nextSparseDouble(): number;
    nextBytes(bytes: Uint8Array): void;
    shuffle<T>(items: T[], start?: number, length?: number): void;

    copy(): EnhancedRandom;
    equals(other: EnhancedRandom): boolean;
    stringSerialize(): string;
    stringDeserialize(data: string): this;
}

/** Builds a blank generator of one registered kind, ready for `stringDeserialize()`. */
export type GeneratorFactory = () => EnhancedRandom;
