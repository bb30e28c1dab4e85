// ============================================================================
// Scopecheck Runner - Seeds
// Splittable SplitMix64 state. Every leaf of a run gets its own seed, derived
// by splitting, so a captured seed replays the exact same random stream.
//
// const [forLeaf, rest] = splitSeed(seed);
// formatSeed(forLeaf); // "1275548033995301424 10514482549683702313"
// ============================================================================

import { randomBytes } from 'node:crypto';

/** Opaque PRNG state: a 64-bit value and an odd 64-bit increment. */
export interface Seed {
	readonly value: bigint;
	readonly gamma: bigint;
}

const MASK_64 = (1n << 64n) - 1n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

/** Thrown when a seed cannot be parsed or is out of range */
export class SeedFormatError extends Error {
	override readonly name = 'SeedFormatError';
	readonly input: string;

	constructor(input: string, reason: string) {
		super(`Invalid seed "${input}": ${reason}. Expected "<value> <gamma>" (two unsigned 64-bit integers, gamma odd).`);
		this.input = input;
	}
}

// ---------------------------------------------------------------------------
// Mixing
// ---------------------------------------------------------------------------

function shiftXorMultiply(z: bigint, shift: bigint, multiplier: bigint): bigint {
	return ((z ^ (z >> shift)) * multiplier) & MASK_64;
}

function mix64(z: bigint): bigint {
	const z1 = shiftXorMultiply(z, 33n, 0xff51afd7ed558ccdn);
	const z2 = shiftXorMultiply(z1, 33n, 0xc4ceb9fe1a85ec53n);
	return z2 ^ (z2 >> 33n);
}

function mix64variant13(z: bigint): bigint {
	const z1 = shiftXorMultiply(z, 30n, 0xbf58476d1ce4e5b9n);
	const z2 = shiftXorMultiply(z1, 27n, 0x94d049bb133111ebn);
	return z2 ^ (z2 >> 31n);
}

function popCount(z: bigint): number {
	let count = 0;
	let rest = z;
	while (rest > 0n) {
		count += Number(rest & 1n);
		rest >>= 1n;
	}
	return count;
}

/** Gammas must be odd and have enough bit transitions to spread well. */
function mixGamma(z: bigint): bigint {
	const gamma = mix64variant13(z) | 1n;
	const transitions = popCount(gamma ^ (gamma >> 1n));
	return transitions >= 24 ? gamma : gamma ^ 0xaaaaaaaaaaaaaaaan;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build a seed from a single 64-bit word.
 */
export function seedFrom(word: bigint): Seed {
	const x = word & MASK_64;
	return {
		value: mix64(x),
		gamma: mixGamma((x + GOLDEN_GAMMA) & MASK_64),
	};
}

/**
 * Draw a fresh seed from the operating system's entropy source.
 */
export function freshSeed(): Seed {
	return seedFrom(randomBytes(8).readBigUInt64BE(0));
}

// ---------------------------------------------------------------------------
// Stepping
// ---------------------------------------------------------------------------

/**
 * Produce one pseudo-random 64-bit word and the advanced seed.
 */
export function nextWord64(seed: Seed): [bigint, Seed] {
	const value = (seed.value + seed.gamma) & MASK_64;
	return [mix64(value), { value, gamma: seed.gamma }];
}

/**
 * Split a seed into two independent seeds. Pure: the same input always
 * yields the same pair. The first half is meant for the current consumer,
 * the second for everything after it.
 */
export function splitSeed(seed: Seed): [Seed, Seed] {
	const v1 = (seed.value + seed.gamma) & MASK_64;
	const v2 = (v1 + seed.gamma) & MASK_64;
	return [
		{ value: mix64(v1), gamma: mixGamma(v2) },
		{ value: v2, gamma: seed.gamma },
	];
}

/**
 * Signed 32-bit integer view of a seed, for PRNGs seeded from a number.
 * Only 32 of the seed's bits survive, so distinct seeds can map to the
 * same integer (and the same generated values).
 */
export function seedToInt32(seed: Seed): number {
	const [word] = nextWord64(seed);
	return Number(BigInt.asIntN(32, word >> 32n));
}

export function seedsEqual(a: Seed, b: Seed): boolean {
	return a.value === b.value && a.gamma === b.gamma;
}

// ---------------------------------------------------------------------------
// Text form
// ---------------------------------------------------------------------------

/** `"<value> <gamma>"`, both in decimal. */
export function formatSeed(seed: Seed): string {
	return `${seed.value} ${seed.gamma}`;
}

/**
 * Parse the text form produced by {@link formatSeed}.
 * Accepts any run of whitespace between the two numbers.
 */
export function parseSeed(text: string): Seed {
	const parts = text.trim().split(/\s+/);
	if (parts.length !== 2) {
		throw new SeedFormatError(text, `expected 2 numbers, got ${parts[0] === '' ? 0 : parts.length}`);
	}

	const [valueText = '', gammaText = ''] = parts;
	const value = parseWord(text, valueText);
	const gamma = parseWord(text, gammaText);

	if ((gamma & 1n) === 0n) {
		throw new SeedFormatError(text, 'gamma must be odd');
	}

	return { value, gamma };
}

function parseWord(input: string, digits: string): bigint {
	if (!/^\d+$/.test(digits)) {
		throw new SeedFormatError(input, `"${digits}" is not an unsigned integer`);
	}
	const word = BigInt(digits);
	if (word > MASK_64) {
		throw new SeedFormatError(input, `"${digits}" does not fit in 64 bits`);
	}
	return word;
}

/** Accept either a seed or its text form. */
export function toSeed(seed: Seed | string): Seed {
	return typeof seed === 'string' ? parseSeed(seed) : seed;
}
