/**
 * AbstractRandom Tests
 *
 * Tests:
 * 1. Derived outputs from a known first output (seed 0)
 * 2. Bounded ranges, including reversed and signed bounds
 * 3. Bytes and shuffling
 * 4. Defaults for generators without optional capabilities
 * 5. String serialization layout and malformed input
 */
import { TraceRandom } from '../src/prng/trace-random.js';
import { DeserializationError, PrngError, UnsupportedOperationError } from '../src/prng/errors.js';
import { CounterRandom, FixedRandom } from './helpers/test-utils.js';

// Seed 0's first output is 0x9318D7AF4A986DA3.
describe('AbstractRandom', () => {

    describe('derived outputs', () => {
        it('views the output as signed for nextLong()', () => {
            expect(new TraceRandom(0n).nextLong()).toBe(-7847285202822337117n);
        });

        it('takes the top bits for nextBits() and nextBool()', () => {
            expect(new TraceRandom(0n).nextBits(8)).toBe(0x93);
            expect(new TraceRandom(0n).nextBits(32)).toBe(0x9318D7AF);
            expect(new TraceRandom(0n).nextBool()).toBe(true);
            expect(new FixedRandom([0x7FFFFFFFFFFFFFFFn]).nextBool()).toBe(false);
        });

        it('scales the top bits for nextFloat() and nextDouble()', () => {
            expect(new TraceRandom(0n).nextFloat()).toBe(0.5745977759361267);
            expect(new TraceRandom(0n).nextDouble()).toBe(0.5745978167493334);
            expect(new FixedRandom([0xFFFFFFFFFFFFFFFFn]).nextDouble()).toBe(1 - 2 ** -53);
            expect(new FixedRandom([0xFFFFFFFFFFFFFFFFn]).nextFloat()).toBe(1 - 2 ** -24);
            expect(new FixedRandom([0n]).nextDouble()).toBe(0);
        });
    });

    describe('bounded outputs', () => {
        it('multiplies into the bound with nextBoundedULong()', () => {
            expect(new TraceRandom(0n).nextBoundedULong(100n)).toBe(57n);
            expect(new TraceRandom(0n).nextBoundedULong(0n)).toBe(0n);
            expect(new FixedRandom([0xFFFFFFFFFFFFFFFFn]).nextBoundedULong(10n)).toBe(9n);
        });

        it('handles ordered and reversed unsigned bounds', () => {
            expect(new TraceRandom(1n).nextULongBetween(10n, 20n)).toBe(15n);
            // reversed: (10, 20]
            expect(new TraceRandom(1n).nextULongBetween(20n, 10n)).toBe(16n);
        });

        it('handles ordered, reversed and negative int bounds', () => {
            expect(new TraceRandom(0n).nextInt(10)).toBe(5);
            expect(new TraceRandom(0n).nextIntBetween(10, 0)).toBe(6);
            expect(new TraceRandom(0n).nextIntBetween(-5, 5)).toBe(0);
            expect(new TraceRandom(0n).nextLongBetween(-5n, 5n)).toBe(0n);
        });

        it('rejects fractional bounds without consuming output', () => {
            const rng = new TraceRandom(0n);
            expect(() => rng.nextIntBetween(0, 2.5)).toThrow('outerBound must be an integer, got 2.5');
            expect(() => rng.nextInt(Number.POSITIVE_INFINITY)).toThrow(PrngError);
            expect(() => rng.nextBits(1.5)).toThrow('bits must be an integer, got 1.5');
            expect(rng.nextULong()).toBe(0x9318D7AF4A986DA3n);
        });

        it('stays within bounds', () => {
            const rng = new TraceRandom(8n);
            for (let i = 0; i < 2_000; i++) {
                const n = rng.nextInt(7);
                expect(n >= 0 && n < 7).toBe(true);
                const m = rng.nextIntBetween(-3, 3);
                expect(m >= -3 && m < 3).toBe(true);
                const neg = rng.nextInt(-4);
                expect(neg <= 0 && neg > -4).toBe(true);
            }
        });

        it('covers a small range', () => {
            const rng = new TraceRandom(3n);
            const seen = new Set<number>();
            for (let i = 0; i < 500; i++) seen.add(rng.nextInt(4));
            expect([...seen].sort()).toEqual([0, 1, 2, 3]);
        });
    });

    describe('nextBytes()', () => {
        it('writes each output low byte first', () => {
            const bytes = new Uint8Array(10);
            new TraceRandom(0n).nextBytes(bytes);
            expect(Array.from(bytes)).toEqual([163, 109, 152, 74, 175, 215, 24, 147, 212, 232]);
        });

        it('consumes one output per started group of eight bytes', () => {
            const a = new TraceRandom(0n);
            a.nextBytes(new Uint8Array(9));
            const b = new TraceRandom(0n);
            b.nextULong();
            b.nextULong();
            expect(a.getState()).toEqual(b.getState());
        });
    });

    describe('shuffle()', () => {
        it('permutes the whole array deterministically', () => {
            const items = [0, 1, 2, 3, 4];
            new TraceRandom(42n).shuffle(items);
            expect(items).toEqual([1, 2, 3, 0, 4]);
        });

        it('shuffles only the selected slice', () => {
            const items = ['a', 'b', 'c', 'd', 'e', 'f'];
            new TraceRandom(42n).shuffle(items, 1, 5);
            expect(items[0]).toBe('a');
            expect(items.slice(1)).toEqual(['c', 'd', 'e', 'b', 'f']);
        });

        it('leaves empty and single-item arrays alone', () => {
            const rng = new TraceRandom(0n);
            const empty: number[] = [];
            rng.shuffle(empty);
            const single = [9];
            rng.shuffle(single);
            expect(empty).toEqual([]);
            expect(single).toEqual([9]);
            expect(rng.stateA).toBe(new TraceRandom(0n).stateA);
        });
    });

    describe('optional operation defaults', () => {
        it('throws UnsupportedOperationError for missing operations', () => {
            const rng = new CounterRandom(5n);
            expect(() => rng.previousULong()).toThrow(UnsupportedOperationError);
            expect(() => rng.skip(1n)).toThrow(UnsupportedOperationError);
            expect(() => rng.leap()).toThrow(UnsupportedOperationError);
            expect(() => rng.getWord(0)).toThrow(UnsupportedOperationError);
        });

        it('reseeds on setWord() without write access', () => {
            const rng = new CounterRandom(5n);
            rng.setWord(3, 100n);
            expect(rng.state).toBe(100n);
            rng.setState(7n, 8n);
            expect(rng.state).toBe(7n);
        });

        it('compares unreadable generators by identity', () => {
            const rng = new CounterRandom(5n);
            expect(rng.equals(rng)).toBe(true);
            expect(rng.equals(rng.copy())).toBe(false);
            expect(rng.equals(new TraceRandom(0n))).toBe(false);
        });
    });

    describe('string serialization', () => {
        it('writes the tag and upper-case hex words', () => {
            expect(new TraceRandom(0n).stringSerialize()).toBe(
                'TrcR`BF05996BF07B15F3~55C57F82543B3F66~C2ACA7D309A2D1C3~C71B2D5F11E3F341~E50A85A17BFF0E88~F1300D75C14D6319`',
            );
            expect(new TraceRandom(1n, 2n, 0n, 0xABn, 5n, 0xF1300D75C14D6319n).stringSerialize()).toBe(
                'TrcR`1~2~0~AB~5~F1300D75C14D6319`',
            );
        });

        it('restores words through setWord()', () => {
            const rng = new TraceRandom(0n).stringDeserialize('TrcR`1~2~3~4~5~2`');
            expect(rng.getState()).toEqual([1n, 2n, 3n, 4n, 5n, 0x739C6FCB9B88CEBFn]);
        });

        it('restores an exact copy of its own output', () => {
            const source = new TraceRandom(77n);
            source.nextULong();
            const restored = new TraceRandom(0n).stringDeserialize(source.stringSerialize());
            expect(restored.equals(source)).toBe(true);
            expect(restored.nextULong()).toBe(source.nextULong());
        });

        it('rejects malformed bodies', () => {
            const rng = new TraceRandom(0n);
            expect(() => rng.stringDeserialize('TrcR 1~2~3~4~5~6')).toThrow(DeserializationError);
            expect(() => rng.stringDeserialize('TrcR`1~2~3~4~5~6')).toThrow(DeserializationError);
            expect(() => rng.stringDeserialize('TrcR`1~2~3`')).toThrow(DeserializationError);
            expect(() => rng.stringDeserialize('TrcR`1~2~3~4~5~G`')).toThrow(DeserializationError);
            expect(() => rng.stringDeserialize('TrcR`1~2~3~4~5~`')).toThrow(DeserializationError);
        });

        it('leaves the state untouched when parsing fails', () => {
            const rng = new TraceRandom(0n);
            expect(() => rng.stringDeserialize('TrcR`1~2~3~4~5~ZZ`')).toThrow(DeserializationError);
            expect(rng.stringSerialize()).toBe(new TraceRandom(0n).stringSerialize());
        });
    });
});
