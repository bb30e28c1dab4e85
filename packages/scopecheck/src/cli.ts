#!/usr/bin/env tsx
// ============================================================================
// Scopecheck - CLI
// Load a suite module and run it.
//
// scopecheck suite.ts                          # Run everything
// scopecheck suite.ts --only list.reversal     # Run one scope
// scopecheck suite.ts --seed "<value> <gamma>" # Replay a run
// scopecheck suite.ts --list                   # Show leaf names
// ============================================================================

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { type Test, collectLeaves, displayName, isTest } from 'scopecheck-runner';
import { type UserConfig, toUserConfig } from './config.js';
import { ConfigError } from './errors.js';
import { type CLIFlags, parseFlags } from './flags.js';
import { rerun, rerunOnly, run, runOnly } from './run.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
	const flags = parseFlags(process.argv.slice(2));

	if (flags.version) {
		console.log(`scopecheck v${VERSION}`);
		return;
	}

	if (flags.help || flags.file === undefined) {
		printHelp();
		return;
	}

	const suite = await loadSuite(resolve(process.cwd(), flags.file));

	if (flags.list) {
		for (const { path } of collectLeaves(suite)) {
			console.log(displayName(path));
		}
		return;
	}

	const config = await loadConfig();
	await runSuite(suite, flags, config);
}

function runSuite(suite: Test, flags: CLIFlags, config: UserConfig | undefined): Promise<unknown> {
	const options = { config, overrides: flags.overrides };

	if (flags.seed !== undefined) {
		return flags.only !== undefined
			? rerunOnly(flags.only, flags.seed, suite, options)
			: rerun(flags.seed, suite, options);
	}
	return flags.only !== undefined ? runOnly(flags.only, suite, options) : run(suite, options);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

async function loadSuite(file: string): Promise<Test> {
	if (!existsSync(file)) {
		throw new ConfigError('suite file', `${file} does not exist`);
	}
	if (isTypeScript(file)) {
		await ensureTypeScriptLoader();
	}

	const mod: unknown = await import(pathToFileURL(file).href);
	const suite = exportNamed(mod, 'default') ?? exportNamed(mod, 'suite');
	if (!isTest(suite)) {
		throw new ConfigError(
			'suite file',
			`${file} does not export a test tree`,
			'Export one as default: export default tests([...]);',
		);
	}
	return suite;
}

async function loadConfig(): Promise<UserConfig | undefined> {
	const cwd = process.cwd();
	const candidates = [
		'scopecheck.config.ts',
		'scopecheck.config.mts',
		'scopecheck.config.js',
		'scopecheck.config.mjs',
	];

	for (const name of candidates) {
		const configPath = resolve(cwd, name);
		if (!existsSync(configPath)) continue;

		if (isTypeScript(name)) {
			await ensureTypeScriptLoader();
		}
		const mod: unknown = await import(pathToFileURL(configPath).href);
		return toUserConfig(exportNamed(mod, 'default') ?? mod, name);
	}

	return undefined;
}

function exportNamed(mod: unknown, name: string): unknown {
	if (typeof mod !== 'object' || mod === null || !(name in mod)) return undefined;
	return Reflect.get(mod, name);
}

function isTypeScript(file: string): boolean {
	return file.endsWith('.ts') || file.endsWith('.mts');
}

// ---------------------------------------------------------------------------
// TypeScript Loader
// ---------------------------------------------------------------------------

let tsLoaderRegistered = false;

/**
 * Make sure .ts suites and config files can be imported. The `scopecheck`
 * bin already runs under tsx; plain `node` invocations register it here.
 */
async function ensureTypeScriptLoader(): Promise<void> {
	if (tsLoaderRegistered) return;
	tsLoaderRegistered = true;

	if (process.execArgv.join(' ').includes('tsx')) return;

	const { register } = await import('tsx/esm/api');
	register();
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp(): void {
	console.log(`
  scopecheck v${VERSION} -- scoped unit and property tests with replayable seeds

  Usage:
    scopecheck <suite-file> [options]

  The suite file's default export (or a named "suite" export) is the test tree.

  Options:
    --only <prefix>       Run only leaves under this scope (whole segments)
    --seed "<v> <g>"      Replay a run with the seed printed in its report
    --trials <n>          Passing trials per property (default: 100)
    --max-discards <n>    Discards before a property gives up (default: 100)
    --max-shrinks <n>     Shrink candidates after a failure (default: 1000)
    --gave-up <policy>    warn | fail | fail-if-all (default: warn)
    --no-color            Plain output
    --debug               Trace phases and seeds to stderr
    --list                Print leaf names and exit
    -h, --help            Show this help
    -v, --version         Show version

  Environment:
    SCOPECHECK_SEED           Replay this seed (turns a run into a rerun)
    SCOPECHECK_TRIALS         Default trials
    SCOPECHECK_MAX_DISCARDS   Default discard budget
    SCOPECHECK_MAX_SHRINKS    Default shrink budget
    SCOPECHECK_GAVE_UP        Default gave-up policy
    SCOPECHECK_DEBUG          1 or true to trace
    NO_COLOR                  Disable colour

  Config file:
    scopecheck.config.{ts,mts,js,mjs} in the working directory
`);
}

main().catch((err: unknown) => {
	console.error(`[scopecheck] ${err instanceof Error ? err.message : String(err)}`);
	process.exitCode = 1;
});
