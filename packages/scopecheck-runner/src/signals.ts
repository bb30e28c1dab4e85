// ============================================================================
// Scopecheck Runner - Control Signals
// Thrown from inside a check to end it early with a non-failure outcome.
// The executor catches these before failure classification.
// ============================================================================

export type ControlKind = 'skip' | 'pending' | 'discard';

export class ControlSignal extends Error {
	override readonly name = 'ControlSignal';
	readonly kind: ControlKind;
	readonly reason?: string;

	constructor(kind: ControlKind, reason?: string) {
		super(reason ? `${kind}: ${reason}` : kind);
		this.kind = kind;
		this.reason = reason;
	}
}

export function isControlSignal(error: unknown): error is ControlSignal {
	return error instanceof ControlSignal;
}

/** Stop the current check and record it as skipped. */
export function skipCheck(reason?: string): never {
	throw new ControlSignal('skip', reason);
}

/** Stop the current check and record it as not yet implemented. */
export function pendingCheck(reason?: string): never {
	throw new ControlSignal('pending', reason);
}

/** Reject the current input; counts against the discard budget. */
export function discardInput(): never {
	throw new ControlSignal('discard');
}
