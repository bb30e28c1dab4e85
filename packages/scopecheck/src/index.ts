// ============================================================================
// Scopecheck - Public API
//
// import { tests, scope, unitTest, propertyTest, expectEq, run } from 'scopecheck';
// ============================================================================

// Authoring
export { tests, scope, unitTest, propertyTest, ok, crash, expect, skip, pending } from './test.js';
export type { PropertyTestOptions } from './test.js';

// Assertions
export {
	expectEq,
	expectNeq,
	expectTrue,
	expectDefined,
	expectOk,
	expectErr,
	fail,
	show,
} from './expect.js';
export type { Result, ShowOptions } from './expect.js';

// Running
export { run, runOnly, rerun, rerunOnly, processHost } from './run.js';
export type { RunHost, RunOptions } from './run.js';

// Config
export { defineConfig, resolveConfig, configFromEnv, seedFromEnv, toUserConfig } from './config.js';
export type { ScopecheckConfig, UserConfig, ResolveOptions } from './config.js';

// Errors
export { ScopecheckError, AssertionMismatchError, CrashError, ConfigError } from './errors.js';

// fast-check adapter
export { arbitrarySource, biasFactorForSize } from './property.js';

// Engine types and helpers users commonly need
export {
	EventBus,
	SeedFormatError,
	filterTree,
	collectLeaves,
	displayName,
	formatSeed,
	parseSeed,
	seedFrom,
} from 'scopecheck-runner';
export type {
	Test,
	Seed,
	Summary,
	CheckContext,
	ExecutedLeaf,
	LeafResult,
	FailureReport,
	GaveUpPolicy,
	PropertyOptions,
	RunnerEvents,
} from 'scopecheck-runner';
