/**
 * Bit utilities for 64-bit words held as bigints.
 *
 * @module trace-prng
 */
import type { SeedInput, U64 } from './prng-types.js';
import { PrngError } from './prng/errors.js';

export const U64_MASK = 0xFFFFFFFFFFFFFFFFn;

/**
 * Reduce any bigint (or integer number) modulo 2^64.
 * @throws PrngError for a fractional or non-finite number
 */
export function toU64(value: SeedInput): U64 {
    if (typeof value === 'bigint') return BigInt.asUintN(64, value);
    return BigInt.asUintN(64, BigInt(requireInteger('value', value)));
}

/** Returns `value` if it is an integer; otherwise throws a PrngError naming `name`. */
export function requireInteger(name: string, value: number): number {
    if (!Number.isInteger(value)) {
        throw new PrngError(`${name} must be an integer, got ${value}`);
    }
    return value;
}

/**
 * Bitwise left-rotation of a 64-bit word by `amount` bits.
 */
export function rotateLeft64(value: U64, amount: number): U64 {
    const k = BigInt(amount & 63);
    if (k === 0n) return value;
    return ((value << k) | (value >> (64n - k))) & U64_MASK;
}

/**
 * Bitwise right-rotation of a 64-bit word by `amount` bits.
 */
export function rotateRight64(value: U64, amount: number): U64 {
    const k = BigInt(amount & 63);
    if (k === 0n) return value;
    return ((value >> k) | (value << (64n - k))) & U64_MASK;
}

function bitCount32(n: number): number {
    n = n - ((n >>> 1) & 0x55555555);
    n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
    return Math.imul((n + (n >>> 4)) & 0x0F0F0F0F, 0x01010101) >>> 24;
}

/** Population count of a 64-bit word. */
export function bitCount64(value: U64): number {
    return bitCount32(Number(value >> 32n)) + bitCount32(Number(value & 0xFFFFFFFFn));
}

// Scratch view for reinterpreting integer bits as IEEE-754 values
const scratch = new DataView(new ArrayBuffer(8));

/**
 * Top 23 bits of `bits` as the mantissa of a float in [1, 2), minus 1.
 * The result is exactly representable as a single.
 */
export function formSparseFloat(bits: U64): number {
    scratch.setUint32(0, Number(bits >> 41n) | 0x3F800000);
    return scratch.getFloat32(0) - 1;
}

/**
 * Top 52 bits of `bits` as the mantissa of a double in [1, 2), minus 1.
 */
export function formSparseDouble(bits: U64): number {
    scratch.setBigUint64(0, (bits >> 12n) | 0x3FF0000000000000n);
    return scratch.getFloat64(0) - 1;
}

/** Upper-case hex with no padding, the word format used by string serialization. */
export function formatHex64(value: U64): string {
    return value.toString(16).toUpperCase();
}

const HEX_WORD = /^[0-9A-Fa-f]{1,16}$/;

/**
 * Parse one hex word; `null` if `text` is not 1 to 16 hex digits.
 */
export function parseHex64(text: string): U64 | null {
    if (!HEX_WORD.test(text)) return null;
    return BigInt(`0x${text}`);
}
