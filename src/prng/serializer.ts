/**
 * Serializer: tag registry and string (de)serialization for generators.
 *
 * Text layout is `TAG` + backtick + hex words joined by `~` + backtick, as
 * written by `AbstractRandom.stringSerialize()`. A tag of `R` + a registered
 * tag restores a ReversingWrapper around that generator.
 */
import type { EnhancedRandom, GeneratorFactory } from '../prng-types.js';
import { formatHex64 } from '../prng-utils.js';
import { parseStateWords } from './abstract-random.js';
import { DeserializationError, PrngError, StateMismatchError } from './errors.js';
import { ReversingWrapper } from './reversing-wrapper.js';
import { TraceRandom } from './trace-random.js';
import { SERIALIZER_DEFAULTS } from './types.js';
import type { SerializerOptions } from './types.js';

export class Serializer {
    private readonly options: Required<SerializerOptions>;
    private readonly factories = new Map<string, GeneratorFactory>();

    constructor(options: SerializerOptions = {}) {
        this.options = { ...SERIALIZER_DEFAULTS, ...options };
    }

    /** A serializer that knows every generator in this package. */
    static withDefaultTags(options: SerializerOptions = {}): Serializer {
        const serializer = new Serializer(options);
        serializer.register('TrcR', () => new TraceRandom(1n));
        return serializer;
    }

    has(tag: string): boolean {
        return this.factories.has(tag);
    }

    register(tag: string, factory: GeneratorFactory): void {
        if (tag.includes('`')) {
            throw new PrngError(`Serializer: tag "${tag}" cannot contain a backtick`);
        }
        if (this.factories.has(tag)) {
            throw new PrngError(`Serializer: tag "${tag}" is already registered`);
        }
        this.factories.set(tag, factory);
    }

    /** Like `register()`, but returns false instead of throwing. */
    tryRegister(tag: string, factory: GeneratorFactory): boolean {
        if (tag.includes('`') || this.factories.has(tag)) return false;
        this.factories.set(tag, factory);
        return true;
    }

    /** Registers `tag`, replacing any existing factory for it. */
    forceRegister(tag: string, factory: GeneratorFactory): void {
        if (this.unregister(tag)) {
            this.options.logger?.info?.(`[Serializer] Replaced factory for tag "${tag}"`);
        }
        this.register(tag, factory);
    }

    unregister(tag: string): boolean {
        return this.factories.delete(tag);
    }

    serialize(rng: EnhancedRandom): string {
        return rng.stringSerialize();
    }

    /**
     * Restores a generator from `serialize()` output. Words the generator
     * remaps on restore (such as an out-of-range stream word) are compared
     * against what was written and handled per `integrityMode`.
     * @throws DeserializationError if the tag is unknown or the body malformed
     * @throws StateMismatchError in strict mode, if a restored word differs from the written one
     */
    deserialize(data: string): EnhancedRandom {
        const open = data.indexOf('`');
        if (open < 0) {
            throw new DeserializationError(`Serializer: no tag delimiter in "${data}"`);
        }
        const tag = data.slice(0, open);
        const rng = this.create(tag).stringDeserialize(data);

        // Unreadable generators have nothing to compare
        if (!rng.capabilities.readAccess) return rng;

        const written = parseStateWords(data, tag, rng.wordCount);
        for (let i = 0; i < written.length; i++) {
            const restored = rng.getWord(i);
            if (restored === written[i]) continue;
            const msg = `${tag} word ${i} written as ${formatHex64(written[i])}, restored as ${formatHex64(restored)}`;
            if (this.options.integrityMode === 'strict') {
                throw new StateMismatchError(`Serializer: ${msg}`);
            }
            this.options.logger?.warn?.(`[Serializer] ${msg}`);
        }
        return rng;
    }

    private create(tag: string): EnhancedRandom {
        const factory = this.factories.get(tag);
        if (factory) {
            try {
                return factory();
            } catch (err) {
                throw new DeserializationError(`Serializer: factory for tag "${tag}" failed`, err);
            }
        }
        if (tag.length > 1 && tag.startsWith('R')) {
            return new ReversingWrapper(this.create(tag.slice(1)));
        }
        throw new DeserializationError(`Serializer: unknown tag "${tag}"`);
    }
}
