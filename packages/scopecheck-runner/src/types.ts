// ============================================================================
// Scopecheck Runner - Types
// ============================================================================

import type { Seed } from './seed.js';

/** Handed to every unit check and property action while it runs */
export interface CheckContext {
	/** The seed this leaf (or property trial) runs under */
	readonly seed: Seed;
	/** Attach a note that is printed if the check fails */
	footnote(message: string): void;
	/** End the check as skipped */
	skip(reason?: string): never;
	/** End the check as pending (not written yet) */
	pending(reason?: string): never;
	/** Reject the current input */
	discard(): never;
	/** Reject the current input unless `condition` holds */
	assume(condition: boolean): asserts condition;
}

/** A single-shot check. Throwing (or rejecting) means failure. */
export type UnitCheck = (t: CheckContext) => void | Promise<void>;

/** A check over one generated value. */
export type PropertyAction<T> = (value: T, t: CheckContext) => void | Promise<void>;

// ---------------------------------------------------------------------------
// Value generation (supplied by an external engine)
// ---------------------------------------------------------------------------

/** A generated value. Engines may attach whatever they need to shrink it. */
export interface Generated<T> {
	readonly value: T;
}

export interface ShrinkOutcome<T> {
	/** Smallest value found that still fails */
	value: T;
	/** Number of successful shrink steps taken */
	shrinks: number;
}

/**
 * Engine-neutral generation and shrinking.
 *
 * `generate` must be a pure function of its arguments: the same seed and
 * size always give the same value.
 */
export interface ValueSource<T> {
	generate(seed: Seed, size: number): Generated<T>;
	shrink(
		failing: Generated<T>,
		stillFails: (candidate: T) => Promise<boolean>,
		limit: number,
	): Promise<ShrinkOutcome<T>>;
	show(value: T): string;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Limits for property leaves; per-leaf values override run-wide ones */
export interface PropertyOptions {
	/** Passing trials required (default: 100) */
	trials?: number;
	/** Discards allowed before giving up (default: 100) */
	maxDiscards?: number;
	/** Shrink candidates to try after a failure (default: 1000) */
	maxShrinks?: number;
}

/** Whether giving up should fail the run */
export type GaveUpPolicy = 'warn' | 'fail' | 'fail-if-all';

/** Run-wide settings the engine needs (mirrors scopecheck's ScopecheckConfig) */
export interface RunnerConfig {
	trials: number;
	maxDiscards: number;
	maxShrinks: number;
	/** Largest size passed to value sources; sizes cycle 0..maxSize */
	maxSize: number;
	gaveUpPolicy: GaveUpPolicy;
	/** Colour the rendered report with ANSI escapes */
	color: boolean;
	/** Trace phases and seeds to stderr */
	debug: boolean;
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
	trials: 100,
	maxDiscards: 100,
	maxShrinks: 1000,
	maxSize: 99,
	gaveUpPolicy: 'warn',
	color: false,
	debug: false,
};
