// ============================================================================
// Scopecheck - Run Entry Points
// run / runOnly / rerun / rerunOnly: execute a scope tree, print the report,
// and signal the exit status to the host process.
//
// import { run } from 'scopecheck';
// import suite from './suite.js';
//
// await run(suite);   // exit code 1 if anything failed
// ============================================================================

import {
	type EventBus,
	type RunOutcome,
	type Seed,
	type Summary,
	type Test,
	TestRunner,
	formatSeed,
	toSeed,
} from 'scopecheck-runner';
import { type UserConfig, resolveConfig, seedFromEnv } from './config.js';

/** Where output goes and how the exit status is signalled */
export interface RunHost {
	write(text: string): void;
	exit(code: number): void;
}

export interface RunOptions {
	/** Settings from code or a config file */
	config?: UserConfig;
	/** Applied after the environment, e.g. command-line flags */
	overrides?: UserConfig;
	/** Output and exit hooks (default: console.log and process.exitCode) */
	host?: RunHost;
	/** Event bus for live progress */
	bus?: EventBus;
	/** Environment to read SCOPECHECK_* settings from (default: process.env) */
	env?: NodeJS.ProcessEnv;
}

/**
 * Prints to stdout. Sets `process.exitCode` rather than calling
 * `process.exit()` so buffered output is flushed.
 */
export const processHost: RunHost = {
	write(text) {
		console.log(text);
	},
	exit(code) {
		if (code !== 0) process.exitCode = code;
	},
};

/**
 * Run every leaf with a fresh seed. With `SCOPECHECK_SEED` set, replays
 * that seed instead.
 */
export async function run(tree: Test, options: RunOptions = {}): Promise<Summary> {
	const replay = seedFromEnv(options.env);
	return launch(options, (runner) => (replay ? runner.rerun(replay, tree) : runner.run(tree)));
}

/**
 * Run the leaves whose qualified name starts with `prefix` (whole
 * segments: "add" matches "add.ex1" but not "addendum").
 */
export async function runOnly(prefix: string, tree: Test, options: RunOptions = {}): Promise<Summary> {
	const replay = seedFromEnv(options.env);
	return launch(options, (runner) =>
		replay ? runner.rerunOnly(prefix, replay, tree) : runner.runOnly(prefix, tree),
	);
}

/** Run every leaf with a known seed. */
export async function rerun(seed: Seed | string, tree: Test, options: RunOptions = {}): Promise<Summary> {
	const parsed = toSeed(seed);
	return launch(options, (runner) => runner.rerun(parsed, tree));
}

/**
 * Reproduce a failure: the report prints the exact call to make.
 *
 * ```ts
 * await rerunOnly('list.reversal', '1275548033995301424 10514482549683702313', suite);
 * ```
 */
export async function rerunOnly(
	prefix: string,
	seed: Seed | string,
	tree: Test,
	options: RunOptions = {},
): Promise<Summary> {
	const parsed = toSeed(seed);
	return launch(options, (runner) => runner.rerunOnly(prefix, parsed, tree));
}

async function launch(
	options: RunOptions,
	start: (runner: TestRunner) => Promise<RunOutcome>,
): Promise<Summary> {
	const host = options.host ?? processHost;
	const config = resolveConfig(options.config, {
		env: options.env,
		overrides: options.overrides,
	});

	const runner = new TestRunner({ config, bus: options.bus, write: (text) => host.write(text) });
	const { summary, exitCode } = await start(runner);

	if (config.debug) {
		console.error(
			`[scopecheck:debug] ${summary.label} finished: ${summary.status}, seed ${formatSeed(summary.seed)}`,
		);
	}

	host.exit(exitCode);
	return summary;
}
