// ============================================================================
// Scopecheck Runner - Executor
// Walks a (filtered) scope tree, gives every leaf its own seed, runs it and
// collects one result per leaf.
//
// Seeds are planned for the whole tree before the first leaf runs:
// - a scope passes its seed through untouched
// - a sequence splits once per child (left half to the child, right half on)
// So a leaf's seed depends only on the run seed and its position.
// ============================================================================

import type { EventBus } from './event-bus.js';
import { type FailureClassification, type FailureKind, classifyFailure } from './failure.js';
import { type Seed, formatSeed, splitSeed } from './seed.js';
import { type ControlSignal, discardInput, isControlSignal, pendingCheck, skipCheck } from './signals.js';
import { type Leaf, type PropertySpec, type ScopePath, type Test, displayName } from './tree.js';
import {
	type CheckContext,
	DEFAULT_RUNNER_CONFIG,
	type Generated,
	type RunnerConfig,
	type ShrinkOutcome,
	type UnitCheck,
} from './types.js';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface FailureReport {
	kind: FailureKind;
	message: string;
	/** Notes attached by the failing run (after shrinking, the smallest one) */
	footnotes: string[];
	/** Seed of the leaf; replaying the leaf with it reproduces the failure */
	seed: Seed;
	/** Trials run, including the failing one */
	trials: number;
	shrinks: number;
	/** Shown minimal counterexample (property leaves only) */
	counterexample?: string;
	/** Size the failing value was generated at (property leaves only) */
	size?: number;
	error: Error;
}

export type LeafResult =
	| { status: 'passed'; trials: number }
	| { status: 'failed'; report: FailureReport }
	| { status: 'skipped'; reason?: string }
	| { status: 'pending'; reason?: string }
	| { status: 'gave-up'; discards: number; trials: number };

export type LeafStatus = LeafResult['status'];

export interface ExecutedLeaf {
	/** Display name ("(unnamed)" for unscoped leaves) */
	name: string;
	path: ScopePath;
	seed: Seed;
	/** Seed of the run the leaf belongs to */
	runSeed: Seed;
	result: LeafResult;
	/** Wall-clock time in milliseconds */
	duration: number;
}

export interface PlannedLeaf {
	path: ScopePath;
	leaf: Leaf;
	seed: Seed;
}

export type ExecutorSettings = Pick<RunnerConfig, 'trials' | 'maxDiscards' | 'maxShrinks' | 'maxSize' | 'debug'>;

export interface ExecutorOptions {
	config?: Partial<ExecutorSettings>;
	/** Receives leaf and trial events as they happen */
	bus?: EventBus;
}

// ---------------------------------------------------------------------------
// Seed planning
// ---------------------------------------------------------------------------

/**
 * Assign every leaf its seed, in depth-first child order.
 */
export function planLeaves(tree: Test, seed: Seed): PlannedLeaf[] {
	const planned: PlannedLeaf[] = [];
	walk(tree, [], seed, planned);
	return planned;
}

function walk(test: Test, path: ScopePath, seed: Seed, out: PlannedLeaf[]): void {
	switch (test.kind) {
		case 'leaf':
			out.push({ path, leaf: test.leaf, seed });
			return;
		case 'scope':
			walk(test.child, [...path, ...test.segments], seed, out);
			return;
		case 'tests': {
			let rest = seed;
			for (const child of test.children) {
				const [here, next] = splitSeed(rest);
				walk(child, path, here, out);
				rest = next;
			}
			return;
		}
	}
}

// ---------------------------------------------------------------------------
// Check context
// ---------------------------------------------------------------------------

class TrialContext implements CheckContext {
	readonly seed: Seed;
	readonly notes: string[] = [];

	constructor(seed: Seed) {
		this.seed = seed;
	}

	footnote(message: string): void {
		this.notes.push(message);
	}

	skip(reason?: string): never {
		return skipCheck(reason);
	}

	pending(reason?: string): never {
		return pendingCheck(reason);
	}

	discard(): never {
		return discardInput();
	}

	assume(condition: boolean): asserts condition {
		if (!condition) discardInput();
	}
}

type TrialOutcome =
	| { status: 'pass' }
	| { status: 'discard' }
	| { status: 'skip' | 'pending'; reason?: string }
	| FailedTrial;

interface FailedTrial {
	status: 'fail';
	failure: FailureClassification;
	footnotes: string[];
}

async function attempt(run: (t: CheckContext) => void | Promise<void>, seed: Seed): Promise<TrialOutcome> {
	const context = new TrialContext(seed);
	try {
		await run(context);
		return { status: 'pass' };
	} catch (error) {
		if (isControlSignal(error)) {
			return signalOutcome(error);
		}
		return { status: 'fail', failure: classifyFailure(error), footnotes: context.notes };
	}
}

function signalOutcome(signal: ControlSignal): TrialOutcome {
	switch (signal.kind) {
		case 'discard':
			return { status: 'discard' };
		case 'skip':
			return { status: 'skip', reason: signal.reason };
		case 'pending':
			return { status: 'pending', reason: signal.reason };
	}
}

/**
 * A value source threw while handling a failure. The leaf still fails, as a
 * fault, and keeps the property's own failure as a footnote.
 */
function sourceFault(
	stage: string,
	thrown: unknown,
	trial: FailedTrial,
	report: Pick<FailureReport, 'seed' | 'trials' | 'shrinks' | 'size'>,
): LeafResult {
	const failure = classifyFailure(thrown);
	return {
		status: 'failed',
		report: {
			kind: 'fault',
			message: `${stage} failed: ${failure.message}`,
			footnotes: [...trial.footnotes, `Property failure: ${trial.failure.message}`],
			...report,
			error: failure.error,
		},
	};
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

/**
 * Runs leaves one at a time, in plan order.
 *
 * ```ts
 * const executor = new Executor({ config: { trials: 50 }, bus });
 * const results = await executor.execute(tree, seed);
 * ```
 */
export class Executor {
	private config: ExecutorSettings;
	private bus?: EventBus;

	constructor(options: ExecutorOptions = {}) {
		this.config = {
			trials: options.config?.trials ?? DEFAULT_RUNNER_CONFIG.trials,
			maxDiscards: options.config?.maxDiscards ?? DEFAULT_RUNNER_CONFIG.maxDiscards,
			maxShrinks: options.config?.maxShrinks ?? DEFAULT_RUNNER_CONFIG.maxShrinks,
			maxSize: options.config?.maxSize ?? DEFAULT_RUNNER_CONFIG.maxSize,
			debug: options.config?.debug ?? DEFAULT_RUNNER_CONFIG.debug,
		};
		this.bus = options.bus;
	}

	async execute(tree: Test, seed: Seed): Promise<ExecutedLeaf[]> {
		const plan = planLeaves(tree, seed);
		const executed: ExecutedLeaf[] = [];

		for (const [index, planned] of plan.entries()) {
			const name = displayName(planned.path);
			this.bus?.emit('leaf:start', {
				name,
				path: planned.path,
				seed: planned.seed,
				index,
				total: plan.length,
			});
			this.trace(`${name} seed=${formatSeed(planned.seed)}`);

			const startTime = Date.now();
			const result = await this.runLeaf(name, planned);
			const leaf: ExecutedLeaf = {
				name,
				path: planned.path,
				seed: planned.seed,
				runSeed: seed,
				result,
				duration: Date.now() - startTime,
			};

			this.trace(`${name} ${result.status} (${leaf.duration}ms)`);
			this.bus?.emit('leaf:end', leaf);
			executed.push(leaf);
		}

		return executed;
	}

	private runLeaf(name: string, planned: PlannedLeaf): Promise<LeafResult> {
		const { leaf, seed } = planned;
		switch (leaf.kind) {
			case 'unit':
				return this.runUnit(leaf.check, seed);
			case 'property':
				return leaf.property.unpack<Promise<LeafResult>>((spec) => this.runProperty(name, spec, seed));
		}
	}

	// -----------------------------------------------------------------------
	// Unit checks
	// -----------------------------------------------------------------------

	private async runUnit(check: UnitCheck, seed: Seed): Promise<LeafResult> {
		const outcome = await attempt(check, seed);
		switch (outcome.status) {
			case 'pass':
				return { status: 'passed', trials: 1 };
			case 'discard':
				return { status: 'gave-up', discards: 1, trials: 0 };
			case 'skip':
				return { status: 'skipped', reason: outcome.reason };
			case 'pending':
				return { status: 'pending', reason: outcome.reason };
			case 'fail':
				return {
					status: 'failed',
					report: {
						kind: outcome.failure.kind,
						message: outcome.failure.message,
						footnotes: outcome.footnotes,
						seed,
						trials: 1,
						shrinks: 0,
						error: outcome.failure.error,
					},
				};
		}
	}

	// -----------------------------------------------------------------------
	// Property checks
	// -----------------------------------------------------------------------

	private async runProperty<T>(name: string, spec: PropertySpec<T>, seed: Seed): Promise<LeafResult> {
		const trials = spec.options.trials ?? this.config.trials;
		const maxDiscards = spec.options.maxDiscards ?? this.config.maxDiscards;
		const maxShrinks = spec.options.maxShrinks ?? this.config.maxShrinks;

		let passed = 0;
		let discards = 0;
		let attempts = 0;
		let rest = seed;

		while (passed < trials) {
			if (discards >= maxDiscards) {
				return { status: 'gave-up', discards, trials: passed };
			}

			const [trialSeed, next] = splitSeed(rest);
			rest = next;
			const size = attempts % (this.config.maxSize + 1);
			attempts++;

			let generated: Generated<T>;
			try {
				generated = spec.source.generate(trialSeed, size);
			} catch (error) {
				const failure = classifyFailure(error);
				return {
					status: 'failed',
					report: {
						kind: failure.kind,
						message: `Value generation failed: ${failure.message}`,
						footnotes: [],
						seed,
						trials: passed + 1,
						shrinks: 0,
						size,
						error: failure.error,
					},
				};
			}

			const outcome = await attempt((t) => spec.action(generated.value, t), trialSeed);
			switch (outcome.status) {
				case 'pass':
					passed++;
					break;
				case 'discard':
					discards++;
					break;
				case 'skip':
					return { status: 'skipped', reason: outcome.reason };
				case 'pending':
					return { status: 'pending', reason: outcome.reason };
				case 'fail': {
					this.bus?.emit('trial:fail', { name, trial: passed + 1, size });
					return this.shrinkFailure(name, spec, generated, outcome, {
						seed,
						trialSeed,
						size,
						trials: passed + 1,
						maxShrinks,
					});
				}
			}
		}

		return { status: 'passed', trials };
	}

	private async shrinkFailure<T>(
		name: string,
		spec: PropertySpec<T>,
		generated: Generated<T>,
		firstFailure: FailedTrial,
		run: { seed: Seed; trialSeed: Seed; size: number; trials: number; maxShrinks: number },
	): Promise<LeafResult> {
		let lastFailure: FailedTrial = firstFailure;
		const partial = { seed: run.seed, trials: run.trials, size: run.size };

		// The source adopts every candidate we report as still failing,
		// so lastFailure always belongs to the value it ends up returning.
		let shrunk: ShrinkOutcome<T>;
		try {
			shrunk = await spec.source.shrink(
				generated,
				async (candidate) => {
					const outcome = await attempt((t) => spec.action(candidate, t), run.trialSeed);
					if (outcome.status !== 'fail') return false;
					lastFailure = outcome;
					return true;
				},
				run.maxShrinks,
			);
		} catch (error) {
			return sourceFault('Shrinking', error, firstFailure, { ...partial, shrinks: 0 });
		}

		this.bus?.emit('trial:shrunk', { name, shrinks: shrunk.shrinks });
		this.trace(`${name} shrunk ${shrunk.shrinks} time(s)`);

		let counterexample: string;
		try {
			counterexample = spec.source.show(shrunk.value);
		} catch (error) {
			return sourceFault('Showing the counterexample', error, lastFailure, { ...partial, shrinks: shrunk.shrinks });
		}

		return {
			status: 'failed',
			report: {
				kind: lastFailure.failure.kind,
				message: lastFailure.failure.message,
				footnotes: lastFailure.footnotes,
				...partial,
				shrinks: shrunk.shrinks,
				counterexample,
				error: lastFailure.failure.error,
			},
		};
	}

	private trace(message: string): void {
		if (this.config.debug) {
			console.error(`[scopecheck:debug] ${message}`);
		}
	}
}
