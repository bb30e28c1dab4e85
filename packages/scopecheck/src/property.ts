// ============================================================================
// Scopecheck - fast-check Value Source
// Adapts a fast-check Arbitrary to the runner's ValueSource interface.
// fast-check does the generating and proposes shrink candidates; the runner
// owns the trial loop and decides which candidates still fail.
// ============================================================================

import * as fc from 'fast-check';
import { xoroshiro128plus } from 'pure-rand';
import { type Generated, type Seed, type ValueSource, seedToInt32 } from 'scopecheck-runner';

/**
 * fast-check has no size parameter; it biases towards small values instead.
 * Small sizes get a strong bias, larger sizes a weaker one.
 */
export function biasFactorForSize(size: number): number {
	return 2 + Math.floor(Math.log(size + 1) / Math.log(10));
}

/**
 * Wrap an arbitrary so the runner can generate, shrink and show its values.
 *
 * ```ts
 * const source = arbitrarySource(fc.array(fc.nat()));
 * const { value } = source.generate(seed, 10);
 * ```
 */
export function arbitrarySource<T>(
	arbitrary: fc.Arbitrary<T>,
	showValue: (value: T) => string = (value) => fc.stringify(value),
): ValueSource<T> {
	return {
		generate(seed: Seed, size: number): Generated<T> {
			// xoroshiro128plus takes a 32-bit seed: leaf seeds that agree on
			// seedToInt32 generate the same value.
			const random = new fc.Random(xoroshiro128plus(seedToInt32(seed)));
			return arbitrary.generate(random, biasFactorForSize(size));
		},

		async shrink(failing, stillFails, limit) {
			let current: fc.Value<T> =
				failing instanceof fc.Value ? failing : new fc.Value(failing.value, undefined);
			let shrinks = 0;
			let tried = 0;

			// Greedy: adopt the first candidate that still fails, then start
			// over from it. Stops when no candidate fails or the limit is hit.
			search: while (tried < limit) {
				for (const candidate of arbitrary.shrink(current.value_, current.context)) {
					if (tried >= limit) break search;
					tried++;
					if (await stillFails(candidate.value)) {
						current = candidate;
						shrinks++;
						continue search;
					}
				}
				break;
			}

			return { value: current.value, shrinks };
		},

		show: showValue,
	};
}
