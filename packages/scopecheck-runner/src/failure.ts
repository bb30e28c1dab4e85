// ============================================================================
// Scopecheck Runner - Failure Classification
//
// Sorts whatever a check threw into the report kinds:
// - assertion: an expected/actual comparison failed
// - crash:     the check asked to fail, with a message
// - fault:     anything else thrown while the check ran
//
// Matches on error names (no instanceof): the runner can't import
// scopecheck's error classes directly.
// ============================================================================

export type FailureKind = 'assertion' | 'crash' | 'fault';

export interface FailureClassification {
	kind: FailureKind;
	/** Text shown under the failing leaf */
	message: string;
	/** The thrown value, normalized to an Error */
	error: Error;
}

const ASSERTION_NAMES = new Set([
	'AssertionMismatchError',
	'AssertionError',
	'AssertionError [ERR_ASSERTION]',
	'ERR_ASSERTION',
]);

export function classifyFailure(thrown: unknown): FailureClassification {
	if (!(thrown instanceof Error)) {
		const text = typeof thrown === 'string' ? thrown : String(thrown);
		return {
			kind: 'fault',
			message: `Non-Error thrown: ${text}`,
			error: new Error(text),
		};
	}

	const name = thrown.name ?? '';

	if (ASSERTION_NAMES.has(name) || thrown.constructor?.name === 'AssertionError') {
		return { kind: 'assertion', message: thrown.message, error: thrown };
	}

	if (name === 'CrashError') {
		return { kind: 'crash', message: thrown.message, error: thrown };
	}

	return {
		kind: 'fault',
		message: thrown.message ? `${name}: ${thrown.message}` : name,
		error: thrown,
	};
}
