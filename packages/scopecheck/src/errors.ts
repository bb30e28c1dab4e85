// ============================================================================
// Scopecheck - Error Types
// Every failing check names what was expected and what happened instead.
//
// The runner tells these apart by `name`, so keep the names stable:
// - AssertionMismatchError → reported as an assertion failure
// - CrashError             → reported as an explicit crash
// - anything else          → reported as an unexpected fault
// ============================================================================

/**
 * Base error class for all Scopecheck errors.
 */
export class ScopecheckError extends Error {
	override readonly name: string = 'ScopecheckError';

	/** Hint for how to fix the issue */
	readonly hint?: string;

	constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
		super(options.hint ? `${message}\nHint: ${options.hint}` : message);
		this.hint = options.hint;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/**
 * An expected/actual comparison did not hold.
 */
export class AssertionMismatchError extends ScopecheckError {
	override readonly name = 'AssertionMismatchError';

	readonly expected: unknown;
	readonly actual: unknown;

	constructor(options: { message: string; expected: unknown; actual: unknown }) {
		super(options.message);
		this.expected = options.expected;
		this.actual = options.actual;
	}
}

/**
 * The check asked to fail.
 *
 * ```ts
 * unitTest(() => {
 *   if (!ready) fail('service never became ready');
 * });
 * ```
 */
export class CrashError extends ScopecheckError {
	override readonly name = 'CrashError';
}

/**
 * Invalid configuration, flag or test option. Raised before anything runs.
 */
export class ConfigError extends ScopecheckError {
	override readonly name = 'ConfigError';

	/** The setting that was rejected */
	readonly key: string;

	constructor(key: string, message: string, hint?: string) {
		super(`Invalid ${key}: ${message}`, { hint });
		this.key = key;
	}
}
