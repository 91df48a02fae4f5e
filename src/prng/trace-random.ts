/**
 * TraceRandom: six-word generator with a reversible transition.
 *
 * Five words (A through E) are updated by two adds, two XORs and one rotation
 * per step, each new word depending only on the old ones, so every step can be
 * undone exactly. The minimum period is 2^64. The sixth word (F) is a "stream"
 * that only seeding and word writes touch; the step itself does not read it.
 *
 * Stream inputs are passed through `fixGamma()`, so F is always odd and
 * rates to a threshold of 1. Odd stream inputs below 2^29 all become distinct
 * streams, which gives at least 2^28 of them.
 *
 * Not for cryptographic use. One owner at a time; `copy()` per consumer.
 */
import type { GeneratorCapabilities, SeedInput, TraceWords, U64 } from '../prng-types.js';
import { rotateLeft64, rotateRight64, toU64 } from '../prng-utils.js';
import { AbstractRandom } from './abstract-random.js';
import { PrngError } from './errors.js';
import { fixGamma } from './gamma.js';
import { makeSeed } from './seed.js';

const GOLDEN = 0x9E3779B97F4A7C15n;

const TRACE_CAPABILITIES: Readonly<GeneratorCapabilities> = Object.freeze({
    readAccess: true,
    writeAccess: true,
    previous: true,
    skip: false,
    leap: false,
});

export class TraceRandom extends AbstractRandom {
    readonly tag = 'TrcR';
    readonly wordCount = 6;
    readonly capabilities = TRACE_CAPABILITIES;

    private a = 0n;
    private b = 0n;
    private c = 0n;
    private d = 0n;
    private e = 0n;
    private f = 1n;

    /** Random state: every word from `makeSeed()`. */
    constructor();
    /** State expanded from one seed; any 64-bit value. */
    constructor(seed: SeedInput);
    /** The given words verbatim, except that the stream word is constrained. */
    constructor(stateA: U64, stateB: U64, stateC: U64, stateD: U64, stateE: U64, stateF: U64);
    constructor(...args: SeedInput[]) {
        super();
        if (args.length === 0) {
            this.setState(makeSeed(), makeSeed(), makeSeed(), makeSeed(), makeSeed(), makeSeed());
        } else if (args.length === 1) {
            this.seed(args[0]);
        } else if (args.length === 6) {
            this.setState(...args.map(toU64));
        } else {
            throw new PrngError(`TraceRandom: expected 0, 1 or 6 arguments, got ${args.length}`);
        }
    }

    get stateA(): U64 { return this.a; }
    set stateA(value: U64) { this.a = toU64(value); }

    get stateB(): U64 { return this.b; }
    set stateB(value: U64) { this.b = toU64(value); }

    get stateC(): U64 { return this.c; }
    set stateC(value: U64) { this.c = toU64(value); }

    get stateD(): U64 { return this.d; }
    set stateD(value: U64) { this.d = toU64(value); }

    get stateE(): U64 { return this.e; }
    set stateE(value: U64) { this.e = toU64(value); }

    /** The stream; writes are remapped by `fixGamma(value, 1)`. */
    get stateF(): U64 { return this.f; }
    set stateF(value: U64) { this.f = fixGamma(toU64(value), 1); }

    /**
     * Index 0..4 reads A..E; 5 and anything else reads F.
     */
    override getWord(index: number): U64 {
        switch (index) {
            case 0: return this.a;
            case 1: return this.b;
            case 2: return this.c;
            case 3: return this.d;
            case 4: return this.e;
            default: return this.f;
        }
    }

    /**
     * Index 0..4 writes A..E as-is; 5 and anything else writes F through its constraint.
     */
    override setWord(index: number, value: U64): void {
        switch (index) {
            case 0: this.stateA = value; break;
            case 1: this.stateB = value; break;
            case 2: this.stateC = value; break;
            case 3: this.stateD = value; break;
            case 4: this.stateE = value; break;
            default: this.stateF = value; break;
        }
    }

    /** All six words, in index order. */
    getState(): TraceWords {
        return [this.a, this.b, this.c, this.d, this.e, this.f];
    }

    override seed(seed: SeedInput): void {
        let s = toU64((toU64(seed) ^ 0x1C69B3F74AC4AE35n) * 0x3C79AC492BA7B653n); // XLCG
        this.a = s ^ 0x3943D8696D4A3CDCn;                       // ~0xC6BC279692B5C323
        s ^= s >> 32n;
        this.b = s ^ 0xD3833E804F4C574Bn;
        s = toU64(s * 0xBEA225F9EB34556Dn);                      // MX3 rounds, outputs taken between them
        s ^= s >> 29n;
        this.c = s ^ 0x2C7CC17FB0B3A8B4n;                       // ~0xD3833E804F4C574B
        s = toU64(s * 0xBEA225F9EB34556Dn);
        s ^= s >> 32n;
        this.d = s ^ 0xC6BC279692B5C323n;
        s = toU64(s * 0xBEA225F9EB34556Dn);
        s ^= s >> 29n;
        this.e = s;
        s ^= toU64(s * s) | 7n;
        s ^= s >> 27n;
        this.stateF = s ^ 0xBEA225F9EB34556Dn;
    }

    override nextULong(): U64 {
        const fa = this.a;
        const fb = this.b;
        const fc = this.c;
        const fd = this.d;
        const fe = this.e;
        this.a = toU64(fa + GOLDEN);
        this.b = fa ^ fe;
        this.c = toU64(fb + fd);
        this.d = rotateLeft64(fc, 52);
        return (this.e = toU64(fb - fc));
    }

    /**
     * Rewinds one step and returns the value that step produced, which is the
     * value `nextULong()` returned to arrive at the current state.
     */
    override previousULong(): U64 {
        const fb = this.b;
        const fc = this.c;
        const fd = this.d;
        const fe = this.e;
        this.a = toU64(this.a - GOLDEN);
        this.c = rotateRight64(fd, 52);
        this.b = toU64(this.c + fe);
        this.d = toU64(fc - this.b);
        this.e = fb ^ this.a;
        return fe;
    }

    override copy(): TraceRandom {
        return new TraceRandom(this.a, this.b, this.c, this.d, this.e, this.f);
    }
}
