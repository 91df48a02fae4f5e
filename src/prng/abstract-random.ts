/**
 * AbstractRandom: base class for generators.
 *
 * Subclasses supply `nextULong()`, seeding, word access and their capability
 * flags; every derived output here consumes exactly one `nextULong()`.
 */
import type { EnhancedRandom, GeneratorCapabilities, SeedInput, U64 } from '../prng-types.js';
import { formatHex64, formSparseDouble, formSparseFloat, parseHex64, requireInteger, toU64 } from '../prng-utils.js';
import { DeserializationError, UnsupportedOperationError } from './errors.js';

const FLOAT_ADJUST = 2 ** -24;
const DOUBLE_ADJUST = 2 ** -53;

export abstract class AbstractRandom implements EnhancedRandom {
    abstract readonly tag: string;
    abstract readonly wordCount: number;
    abstract readonly capabilities: Readonly<GeneratorCapabilities>;

    abstract seed(seed: SeedInput): void;
    abstract nextULong(): U64;
    abstract copy(): EnhancedRandom;

    previousULong(): U64 {
        throw new UnsupportedOperationError(`${this.tag}: previousULong() is not supported`);
    }

    skip(_distance: U64): U64 {
        throw new UnsupportedOperationError(`${this.tag}: skip() is not supported`);
    }

    leap(): U64 {
        throw new UnsupportedOperationError(`${this.tag}: leap() is not supported`);
    }

    getWord(_index: number): U64 {
        throw new UnsupportedOperationError(`${this.tag}: getWord() is not supported`);
    }

    /** Without write access, any write reseeds the generator with `value`. */
    setWord(_index: number, value: U64): void {
        this.seed(value);
    }

    /** Assigns words by index; values past `wordCount` are ignored. */
    setState(...words: U64[]): void {
        const n = Math.min(words.length, this.wordCount);
        for (let i = 0; i < n; i++) {
            this.setWord(i, words[i]);
        }
    }

    nextLong(): bigint {
        return BigInt.asIntN(64, this.nextULong());
    }

    /** In [0, bound); 0 when bound is 0. */
    nextBoundedULong(bound: U64): U64 {
        return (this.nextULong() * toU64(bound)) >> 64n;
    }

    /**
     * Between `inner` (inclusive) and `outer` (exclusive). If `outer` is below
     * `inner`, the result is in (outer, inner] instead.
     */
    nextULongBetween(inner: U64, outer: U64): U64 {
        const rand = this.nextULong();
        let lo = toU64(inner);
        let hi = toU64(outer);
        if (hi < lo) {
            const t = hi;
            hi = toU64(lo + 1n);
            lo = toU64(t + 1n);
        }
        return toU64(lo + ((rand * toU64(hi - lo)) >> 64n));
    }

    /** Signed counterpart of `nextULongBetween()`. */
    nextLongBetween(inner: bigint, outer: bigint): bigint {
        const rand = this.nextULong();
        let lo: U64;
        let hi: U64;
        if (outer < inner) {
            lo = toU64(outer + 1n);
            hi = toU64(inner + 1n);
        } else {
            lo = toU64(inner);
            hi = toU64(outer);
        }
        return BigInt.asIntN(64, lo + ((rand * toU64(hi - lo)) >> 64n));
    }

    /** In [0, outerBound), or (outerBound, 0] for a negative bound. */
    nextInt(outerBound: number): number {
        return this.nextIntBetween(0, outerBound);
    }

    /** @throws PrngError if either bound is not an integer */
    nextIntBetween(innerBound: number, outerBound: number): number {
        const inner = BigInt(requireInteger('innerBound', innerBound));
        const outer = BigInt(requireInteger('outerBound', outerBound));
        return Number(this.nextLongBetween(inner, outer));
    }

    /** The top `bits` bits of one output, for `bits` from 1 to 32. */
    nextBits(bits: number): number {
        const shift = BigInt(64 - requireInteger('bits', bits));
        return Number(this.nextULong() >> shift);
    }

    nextBool(): boolean {
        return this.nextULong() >= 0x8000000000000000n;
    }

    /** In [0, 1), in steps of 2^-24. */
    nextFloat(): number {
        return Number(this.nextULong() >> 40n) * FLOAT_ADJUST;
    }

    /** In [0, 1), in steps of 2^-53. */
    nextDouble(): number {
        return Number(this.nextULong() >> 11n) * DOUBLE_ADJUST;
    }

    /** In [0, 1) with 23 random mantissa bits; faster, coarser near 0. */
    nextSparseFloat(): number {
        return formSparseFloat(this.nextULong());
    }

    /** In [0, 1) with 52 random mantissa bits. */
    nextSparseDouble(): number {
        return formSparseDouble(this.nextULong());
    }

    /** Fills `bytes`, low byte of each output first. */
    nextBytes(bytes: Uint8Array): void {
        for (let i = 0; i < bytes.length;) {
            let n = Math.min(bytes.length - i, 8);
            for (let r = this.nextULong(); n-- > 0; r >>= 8n) {
                bytes[i++] = Number(r & 0xFFn);
            }
        }
    }

    /**
     * Fisher-Yates shuffle of `items[start, start + length)` in place.
     */
    shuffle<T>(items: T[], start: number = 0, length: number = items.length - start): void {
        for (let i = length - 1; i > 0; i--) {
            const j = this.nextIntBetween(0, i + 1);
            const a = start + i;
            const b = start + j;
            [items[a], items[b]] = [items[b], items[a]];
        }
    }

    equals(other: EnhancedRandom): boolean {
        if (other.tag !== this.tag || other.wordCount !== this.wordCount) return false;
        if (!this.capabilities.readAccess || !other.capabilities.readAccess) return other === this;
        for (let i = 0; i < this.wordCount; i++) {
            if (this.getWord(i) !== other.getWord(i)) return false;
        }
        return true;
    }

    /**
     * `TAG` + backtick + words as hex joined by `~` + backtick.
     */
    stringSerialize(): string {
        const words: string[] = [];
        for (let i = 0; i < this.wordCount; i++) {
            words.push(formatHex64(this.getWord(i)));
        }
        return `${this.tag}\`${words.join('~')}\``;
    }

    /**
     * Restores words from `stringSerialize()` output. The tag is not checked
     * here; `Serializer` picks the generator by tag.
     */
    stringDeserialize(data: string): this {
        const words = parseStateWords(data, this.tag, this.wordCount);
        for (let i = 0; i < words.length; i++) {
            this.setWord(i, words[i]);
        }
        return this;
    }
}

/**
 * The words between the backticks of `TAG`word~word~...``, as written.
 * `owner` only labels error messages.
 * @throws DeserializationError on missing delimiters, a wrong word count or bad hex
 */
export function parseStateWords(data: string, owner: string, wordCount: number): U64[] {
    const open = data.indexOf('`');
    const close = data.indexOf('`', open + 1);
    if (open < 0 || close < 0) {
        throw new DeserializationError(`${owner}: missing state delimiters in "${data}"`);
    }
    const body = data.slice(open + 1, close);
    const parts = wordCount === 0 ? [] : body.split('~');
    if (parts.length !== wordCount) {
        throw new DeserializationError(`${owner}: expected ${wordCount} words, got ${parts.length}`);
    }
    const words: U64[] = [];
    for (const part of parts) {
        const word = parseHex64(part);
        if (word === null) {
            throw new DeserializationError(`${owner}: invalid hex word "${part}"`);
        }
        words.push(word);
    }
    return words;
}
