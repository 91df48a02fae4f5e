import type { EnhancedRandom, GeneratorCapabilities, SeedInput, U64 } from '../prng-types.js';
import { toU64 } from '../prng-utils.js';
import { AbstractRandom } from './abstract-random.js';
import { UnsupportedOperationError } from './errors.js';
import { TraceRandom } from './trace-random.js';

/**
 * Runs a reversible generator backwards: `nextULong()` calls the wrapped
 * generator's `previousULong()` and vice versa. State is shared with the
 * wrapped generator, not copied.
 */
export class ReversingWrapper extends AbstractRandom {
    readonly wrapped: EnhancedRandom;

    constructor(wrapped: EnhancedRandom = new TraceRandom()) {
        super();
        if (!wrapped.capabilities.previous) {
            throw new UnsupportedOperationError(`ReversingWrapper: ${wrapped.tag} does not support previousULong()`);
        }
        this.wrapped = wrapped;
    }

    get tag(): string {
        return `R${this.wrapped.tag}`;
    }

    get wordCount(): number {
        return this.wrapped.wordCount;
    }

    /** Same as the wrapped generator's, except that leaping has no reverse. */
    get capabilities(): Readonly<GeneratorCapabilities> {
        return { ...this.wrapped.capabilities, leap: false };
    }

    override seed(seed: SeedInput): void {
        this.wrapped.seed(seed);
    }

    override nextULong(): U64 {
        return this.wrapped.previousULong();
    }

    override previousULong(): U64 {
        return this.wrapped.nextULong();
    }

    override skip(distance: U64): U64 {
        return this.wrapped.skip(toU64(-distance));
    }

    override getWord(index: number): U64 {
        return this.wrapped.getWord(index);
    }

    override setWord(index: number, value: U64): void {
        this.wrapped.setWord(index, value);
    }

    override copy(): ReversingWrapper {
        return new ReversingWrapper(this.wrapped.copy());
    }
}
