// ============================================================================
// Scopecheck Runner - Test Runner
// The four run entry points. Each is one linear pass:
//
//   start → filtering → executing → summarizing → terminal
//
// | entry point               | seed           | filter |
// |---------------------------|----------------|--------|
// | run(tree)                 | fresh          | -      |
// | runOnly(prefix, tree)     | fresh          | prefix |
// | rerun(seed, tree)         | given          | -      |
// | rerunOnly(prefix, seed,…) | given          | prefix |
//
// The runner does NOT exit the process; it returns an exit code and lets
// the caller decide.
// ============================================================================

import { EventBus, type RunPhase } from './event-bus.js';
import { Executor } from './executor.js';
import { filterTree } from './filter.js';
import { ResultAggregator, type Summary } from './result-aggregator.js';
import { type Seed, formatSeed, freshSeed, toSeed } from './seed.js';
import type { Test } from './tree.js';
import { DEFAULT_RUNNER_CONFIG, type RunnerConfig } from './types.js';

export interface RunOutcome {
	summary: Summary;
	/** 0 when the summary succeeded, 1 otherwise */
	exitCode: number;
	/** The full rendered report */
	report: string;
}

export interface TestRunnerOptions {
	config?: Partial<RunnerConfig>;
	/** Event bus for live progress; one is created when omitted */
	bus?: EventBus;
	/** Where fresh run seeds come from (default: OS entropy) */
	seedSource?: () => Seed;
	/** Receives the report line by line while the run progresses */
	write?: (text: string) => void;
}

interface RunPlan {
	label: string;
	seed: Seed;
	prefix?: string;
}

/**
 * Runs scope trees and reports on them.
 *
 * ```ts
 * const runner = new TestRunner({ write: console.log });
 * const { exitCode } = await runner.runOnly('addition', suite);
 * process.exitCode = exitCode;
 * ```
 */
export class TestRunner {
	readonly bus: EventBus;
	private config: RunnerConfig;
	private seedSource: () => Seed;
	private write?: (text: string) => void;
	private aggregator = new ResultAggregator();
	private phase: RunPhase = 'terminal';

	constructor(options: TestRunnerOptions = {}) {
		this.config = { ...DEFAULT_RUNNER_CONFIG, ...options.config };
		this.bus = options.bus ?? new EventBus();
		this.seedSource = options.seedSource ?? freshSeed;
		this.write = options.write;
	}

	async run(tree: Test): Promise<RunOutcome> {
		return this.execute(tree, { label: 'run', seed: this.seedSource() });
	}

	async runOnly(prefix: string, tree: Test): Promise<RunOutcome> {
		return this.execute(tree, {
			label: `runOnly ${JSON.stringify(prefix)}`,
			seed: this.seedSource(),
			prefix,
		});
	}

	async rerun(seed: Seed | string, tree: Test): Promise<RunOutcome> {
		return this.execute(tree, { label: 'rerun', seed: toSeed(seed) });
	}

	async rerunOnly(prefix: string, seed: Seed | string, tree: Test): Promise<RunOutcome> {
		return this.execute(tree, {
			label: `rerunOnly ${JSON.stringify(prefix)}`,
			seed: toSeed(seed),
			prefix,
		});
	}

	/** Current stage; 'terminal' when no run is in progress */
	get currentPhase(): RunPhase {
		return this.phase;
	}

	// -----------------------------------------------------------------------
	// The run pipeline
	// -----------------------------------------------------------------------

	private async execute(tree: Test, plan: RunPlan): Promise<RunOutcome> {
		if (this.phase !== 'terminal') {
			throw new Error(`TestRunner is already running (phase: ${this.phase})`);
		}

		this.transition('start');
		this.bus.emit('run:start', { label: plan.label, seed: plan.seed, prefix: plan.prefix });
		this.trace(`${plan.label} seed=${formatSeed(plan.seed)}`);

		const stopStreaming = this.streamLeaves();
		try {
			this.write?.(`━━━ ${plan.label} ━━━`);

			this.transition('filtering');
			const selected = plan.prefix === undefined ? tree : filterTree(plan.prefix, tree);

			this.transition('executing');
			const executor = new Executor({ config: this.config, bus: this.bus });
			const results = await executor.execute(selected, plan.seed);

			this.transition('summarizing');
			const summary = this.aggregator.summarize(results, {
				seed: plan.seed,
				label: plan.label,
				gaveUpPolicy: this.config.gaveUpPolicy,
			});
			const format = { color: this.config.color };
			this.write?.(this.aggregator.formatFooter(summary, format));
			this.write?.(this.aggregator.formatSeedLine(summary, format));

			this.bus.emit('run:end', { summary });
			return {
				summary,
				exitCode: summary.status === 'failed' ? 1 : 0,
				report: this.aggregator.formatReport(summary, format),
			};
		} finally {
			stopStreaming();
			this.transition('terminal');
		}
	}

	private streamLeaves(): () => void {
		const write = this.write;
		if (!write) return () => undefined;

		return this.bus.on('leaf:end', (leaf) => {
			for (const line of this.aggregator.formatLeaf(leaf, { color: this.config.color })) {
				write(line);
			}
		});
	}

	private transition(next: RunPhase): void {
		this.phase = next;
		this.bus.emit('run:phase', { phase: next });
		this.trace(`phase ${next}`);
	}

	private trace(message: string): void {
		if (this.config.debug) {
			console.error(`[scopecheck:debug] ${message}`);
		}
	}
}
