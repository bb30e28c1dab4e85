// ============================================================================
// Scopecheck - Assertions
// Plain functions that throw on mismatch. Use them inside unit checks and
// property actions.
//
// unitTest(() => expectEq(1 + 1, 2));
// propertyTest(fc.array(fc.integer()), (xs) => expectEq([...xs].reverse().reverse(), xs));
// ============================================================================

import { isDeepStrictEqual } from 'node:util';
import * as fc from 'fast-check';
import { AssertionMismatchError, CrashError } from './errors.js';

/** A success-or-error value, discriminated by `ok` */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** Options for the Result assertions */
export interface ShowOptions {
	/** Print the unexpected payload in the failure message (default: true) */
	show?: boolean;
}

/** Render a value the way counterexamples are rendered. */
export function show(value: unknown): string {
	return fc.stringify(value);
}

/**
 * Assert deep (strict) equality.
 */
export function expectEq<T>(actual: T, expected: T): void {
	if (isDeepStrictEqual(actual, expected)) return;
	throw new AssertionMismatchError({
		message: `Expected values to be equal\n  expected: ${show(expected)}\n  actual:   ${show(actual)}`,
		expected,
		actual,
	});
}

/**
 * Assert the two values are not deeply equal.
 */
export function expectNeq<T>(actual: T, unexpected: T): void {
	if (!isDeepStrictEqual(actual, unexpected)) return;
	throw new AssertionMismatchError({
		message: `Expected values to differ, both were ${show(actual)}`,
		expected: unexpected,
		actual,
	});
}

/**
 * Assert a condition holds.
 */
export function expectTrue(condition: boolean, message = 'Expected condition to hold'): asserts condition {
	if (condition) return;
	throw new AssertionMismatchError({ message, expected: true, actual: false });
}

/**
 * Assert the value is neither `undefined` nor `null`, and return it.
 */
export function expectDefined<T>(value: T | null | undefined): T {
	if (value !== undefined && value !== null) return value;
	throw new AssertionMismatchError({
		message: `Expected a value, got ${value === null ? 'null' : 'undefined'}`,
		expected: 'a value',
		actual: value,
	});
}

/**
 * Assert a Result is ok, and return its value.
 */
export function expectOk<T, E>(result: Result<T, E>, options: ShowOptions = {}): T {
	if (result.ok) return result.value;
	const detail = options.show === false ? '' : `: ${show(result.error)}`;
	throw new AssertionMismatchError({
		message: `Expected an ok result, got an error${detail}`,
		expected: 'ok',
		actual: options.show === false ? 'error' : result.error,
	});
}

/**
 * Assert a Result is an error, and return the error.
 */
export function expectErr<T, E>(result: Result<T, E>, options: ShowOptions = {}): E {
	if (!result.ok) return result.error;
	const detail = options.show === false ? '' : `: ${show(result.value)}`;
	throw new AssertionMismatchError({
		message: `Expected an error result, got ok${detail}`,
		expected: 'error',
		actual: options.show === false ? 'ok' : result.value,
	});
}

/**
 * Fail the current check with a message.
 */
export function fail(message: string): never {
	throw new CrashError(message);
}
