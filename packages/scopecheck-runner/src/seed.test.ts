import { describe, expect, it } from 'vitest';
import {
	SeedFormatError,
	formatSeed,
	freshSeed,
	nextWord64,
	parseSeed,
	seedFrom,
	seedToInt32,
	seedsEqual,
	splitSeed,
	toSeed,
} from './seed.js';

const SEED_42 = { value: 9297814886316923340n, gamma: 13679457532755275413n };

describe('seedFrom', () => {
	it('should mix a word into a seed', () => {
		expect(seedFrom(42n)).toEqual(SEED_42);
	});

	it('should give zero a non-zero odd gamma', () => {
		expect(seedFrom(0n)).toEqual({ value: 0n, gamma: 16294208416658607535n });
	});

	it('should reduce words modulo 2^64', () => {
		expect(seedFrom(42n + (1n << 64n))).toEqual(SEED_42);
	});
});

describe('splitSeed', () => {
	it('should split into a mixed left half and an advanced right half', () => {
		const [left, right] = splitSeed(SEED_42);
		expect(left).toEqual({ value: 1275548033995301424n, gamma: 10514482549683702313n });
		expect(right).toEqual({ value: 18209985878117922550n, gamma: 13679457532755275413n });
	});

	it('should be pure', () => {
		expect(splitSeed(SEED_42)).toEqual(splitSeed(SEED_42));
	});

	it('should keep both gammas odd', () => {
		let seed = SEED_42;
		for (let i = 0; i < 50; i++) {
			const [left, right] = splitSeed(seed);
			expect(left.gamma & 1n).toBe(1n);
			expect(right.gamma & 1n).toBe(1n);
			seed = i % 2 === 0 ? left : right;
		}
	});
});

describe('nextWord64', () => {
	it('should return a word and the advanced seed', () => {
		const [word, next] = nextWord64(SEED_42);
		expect(word).toBe(1275548033995301424n);
		expect(next).toEqual({ value: 4530528345362647137n, gamma: 13679457532755275413n });
	});
});

describe('seedToInt32', () => {
	it('should take the high half of the next word as a signed integer', () => {
		expect(seedToInt32(SEED_42)).toBe(296986669);
	});
});

describe('freshSeed', () => {
	it('should produce an odd gamma', () => {
		expect(freshSeed().gamma & 1n).toBe(1n);
	});
});

describe('seedsEqual', () => {
	it('should compare both parts', () => {
		expect(seedsEqual(SEED_42, seedFrom(42n))).toBe(true);
		expect(seedsEqual(SEED_42, { value: SEED_42.value, gamma: 1n })).toBe(false);
	});
});

describe('text form', () => {
	it('should format value and gamma in decimal', () => {
		expect(formatSeed(SEED_42)).toBe('9297814886316923340 13679457532755275413');
	});

	it('should parse what it formats', () => {
		expect(parseSeed(formatSeed(SEED_42))).toEqual(SEED_42);
	});

	it('should accept surrounding and repeated whitespace', () => {
		expect(parseSeed('  5   7 ')).toEqual({ value: 5n, gamma: 7n });
	});

	it('should reject the wrong number of parts', () => {
		expect(() => parseSeed('')).toThrow('Invalid seed "": expected 2 numbers, got 0.');
		expect(() => parseSeed('1 3 5')).toThrow('expected 2 numbers, got 3');
	});

	it('should reject non-numeric parts', () => {
		expect(() => parseSeed('1 abc')).toThrow('"abc" is not an unsigned integer');
		expect(() => parseSeed('-1 3')).toThrow('"-1" is not an unsigned integer');
	});

	it('should reject values wider than 64 bits', () => {
		expect(() => parseSeed('18446744073709551616 3')).toThrow('does not fit in 64 bits');
		expect(parseSeed('18446744073709551615 3').value).toBe(18446744073709551615n);
	});

	it('should reject an even gamma', () => {
		expect(() => parseSeed('1 2')).toThrow(SeedFormatError);
		expect(() => parseSeed('1 2')).toThrow('gamma must be odd');
	});

	it('should keep the input on the error', () => {
		try {
			parseSeed('x');
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(SeedFormatError);
			expect(error instanceof SeedFormatError && error.input).toBe('x');
		}
	});

	it('should pass seeds through toSeed untouched', () => {
		expect(toSeed(SEED_42)).toBe(SEED_42);
		expect(toSeed('5 7')).toEqual({ value: 5n, gamma: 7n });
	});
});
