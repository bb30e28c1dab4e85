// ============================================================================
// Scopecheck - Test Authoring
// Build scope trees out of unit checks and fast-check properties.
//
// import fc from 'fast-check';
// import { tests, scope, unitTest, propertyTest, expectEq } from 'scopecheck';
//
// export default tests([
//   scope('addition.commutes', propertyTest(fc.tuple(fc.integer(), fc.integer()), ([a, b]) => {
//     expectEq(a + b, b + a);
//   })),
//   scope('addition.ex1', unitTest(() => expectEq(1 + 1, 2))),
// ]);
// ============================================================================

import type * as fc from 'fast-check';
import {
	type PropertyAction,
	type PropertyOptions,
	type Test,
	type UnitCheck,
	propertyTest as propertyLeaf,
} from 'scopecheck-runner';
import { requireInteger } from './config.js';
import { CrashError } from './errors.js';
import { expectTrue } from './expect.js';
import { arbitrarySource } from './property.js';

export { tests, scope, unitTest } from 'scopecheck-runner';

/** Per-property options */
export interface PropertyTestOptions<T> extends PropertyOptions {
	/** Render counterexamples (default: fast-check's stringify) */
	show?: (value: T) => string;
}

/**
 * A check run against values drawn from a fast-check arbitrary. When a value
 * fails, it is shrunk and the smallest failing value is reported.
 *
 * Call `t.assume(condition)` (or `t.discard()`) to reject inputs that don't
 * meet a precondition; too many rejections make the property give up.
 *
 * ```ts
 * propertyTest(fc.array(fc.integer()), (xs) => {
 *   expectEq([...xs].reverse().reverse(), xs);
 * }, { trials: 500 });
 * ```
 */
export function propertyTest<T>(
	arbitrary: fc.Arbitrary<T>,
	action: PropertyAction<T>,
	options: PropertyTestOptions<T> = {},
): Test {
	const { show, ...limits } = options;
	validatePropertyOptions(limits);
	return propertyLeaf(arbitrarySource(arbitrary, show), action, limits);
}

function validatePropertyOptions(options: PropertyOptions): void {
	if (options.trials !== undefined) requireInteger('trials', options.trials, 1);
	if (options.maxDiscards !== undefined) requireInteger('maxDiscards', options.maxDiscards, 1);
	if (options.maxShrinks !== undefined) requireInteger('maxShrinks', options.maxShrinks, 0);
}

// ---------------------------------------------------------------------------
// Ready-made unit checks
// ---------------------------------------------------------------------------

/** Always passes. */
export const ok: UnitCheck = () => undefined;

/**
 * Fails with `message`.
 *
 * ```ts
 * scope('todo.login', unitTest(crash('not wired up yet')));
 * ```
 */
export function crash(message: string): UnitCheck {
	return () => {
		throw new CrashError(message);
	};
}

/** Passes when `condition` is true. */
export function expect(condition: boolean, message?: string): UnitCheck {
	return () => {
		expectTrue(condition, message);
	};
}

/** Reports the leaf as skipped. */
export function skip(reason?: string): UnitCheck {
	return (t) => t.skip(reason);
}

/** Reports the leaf as pending: known, not written yet. */
export function pending(reason?: string): UnitCheck {
	return (t) => t.pending(reason);
}
