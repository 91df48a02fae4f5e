/**
 * Stream ("gamma") constraint for the sixth TraceRandom word.
 *
 * A valid stream is odd, at least 2^32, and rates at or below the threshold.
 * Valid values are returned unchanged. Anything else is mixed by an odd
 * multiplier and only its high half is repaired, so distinct odd inputs below
 * 2^32 keep distinct low halves and stay distinct.
 */
import type { U64 } from '../prng-types.js';
import { bitCount64, U64_MASK } from '../prng-utils.js';

const GAMMA_MIX = 0xD1342543DE82EF95n;
const HIGH_LCG_MUL = 0x2C1B3C6D;
const HIGH_LCG_ADD = 0x297A2D39;

/**
 * Rates how far a gamma's bit statistics stray from balanced: 0 when both its
 * population count and its bit-transition count are within 7 of 32, 1 within 15,
 * and so on. Lower is better.
 */
export function rateGamma(gamma: U64): number {
    const ones = Math.abs(bitCount64(gamma) - 32);
    const transitions = Math.abs(bitCount64(gamma ^ (gamma >> 1n)) - 32);
    return Math.max(ones, transitions) >> 3;
}

/**
 * Maps any word to an odd gamma rating at or below `threshold`.
 * Thresholds below 1 are treated as 1; a passing value always exists at that level.
 */
export function fixGamma(gamma: U64, threshold: number = 1): U64 {
    const limit = Math.max(1, threshold);
    if (gamma >= 0x100000000n && (gamma & 1n) === 1n && rateGamma(gamma) <= limit) {
        return gamma;
    }
    let mixed = ((gamma | 1n) * GAMMA_MIX) & U64_MASK;
    const low = mixed & 0xFFFFFFFFn;
    let high = Number(mixed >> 32n);
    // full-period LCG over the high half; visits every value before repeating
    while (high === 0 || rateGamma(mixed) > limit) {
        high = (Math.imul(high, HIGH_LCG_MUL) + HIGH_LCG_ADD) >>> 0;
        mixed = (BigInt(high) << 32n) | low;
    }
    return mixed;
}
