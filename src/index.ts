/**
 * trace-prng public API
 *
 * @module trace-prng
 */

import { TraceRandom } from './prng/trace-random.js';
import { ReversingWrapper } from './prng/reversing-wrapper.js';
import { Serializer } from './prng/serializer.js';
import type { EnhancedRandom, SeedInput, U64 } from './prng-types.js';
import type { SerializerOptions } from './prng/types.js';

export type { U64, SeedInput, TraceWords, GeneratorCapabilities, EnhancedRandom, GeneratorFactory } from './prng-types.js';
export type { PrngLogger, SerializerOptions } from './prng/types.js';
export { SERIALIZER_DEFAULTS } from './prng/types.js';
export { PrngError, UnsupportedOperationError, DeserializationError, StateMismatchError } from './prng/errors.js';
export { AbstractRandom } from './prng/abstract-random.js';
export { TraceRandom, ReversingWrapper, Serializer };
export { rateGamma, fixGamma } from './prng/gamma.js';
export { makeSeed } from './prng/seed.js';
export {
    toU64, requireInteger, rotateLeft64, rotateRight64, bitCount64,
    formSparseFloat, formSparseDouble, formatHex64, parseHex64,
} from './prng-utils.js';

const defaultSerializer = Serializer.withDefaultTags();

export const Trace = {
    /**
     * A TraceRandom seeded from `seed`, or with random state when omitted.
     */
    create: (seed?: SeedInput): TraceRandom => {
        return seed === undefined ? new TraceRandom() : new TraceRandom(seed);
    },

    /**
     * A TraceRandom holding exactly these words (the stream word constrained).
     */
    fromState: (a: U64, b: U64, c: U64, d: U64, e: U64, f: U64): TraceRandom => {
        return new TraceRandom(a, b, c, d, e, f);
    },

    serialize: (rng: EnhancedRandom): string => defaultSerializer.serialize(rng),

    /**
     * Restores any generator known to the default serializer. Pass options to
     * use a fresh serializer instead (e.g. `integrityMode: 'strict'`).
     */
    deserialize: (data: string, options?: SerializerOptions): EnhancedRandom => {
        const serializer = options ? Serializer.withDefaultTags(options) : defaultSerializer;
        return serializer.deserialize(data);
    },

    Random: TraceRandom,

    Reversing: ReversingWrapper,

    Serializer,
};

export default Trace;
