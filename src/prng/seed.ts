import { randomBytes } from 'node:crypto';
import type { U64 } from '../prng-types.js';

/**
 * 64 random bits for "don't care" seeding. Not meant to be reproducible.
 */
export function makeSeed(): U64 {
    return randomBytes(8).readBigUInt64LE(0);
}
