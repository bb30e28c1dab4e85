// ============================================================================
// Scopecheck Runner - Public API
// Scope trees, seed derivation, execution, aggregation and reporting.
// ============================================================================

export { TestRunner } from './runner.js';
export type { RunOutcome, TestRunnerOptions } from './runner.js';
export { DEFAULT_RUNNER_CONFIG } from './types.js';
export type {
	CheckContext,
	UnitCheck,
	PropertyAction,
	Generated,
	ShrinkOutcome,
	ValueSource,
	PropertyOptions,
	GaveUpPolicy,
	RunnerConfig,
} from './types.js';

// Scope tree
export {
	tests,
	scope,
	unitTest,
	propertyTest,
	splitScopeName,
	qualifiedName,
	displayName,
	collectLeaves,
	isTest,
} from './tree.js';
export type { Test, Leaf, ScopePath, PropertySpec, PackedProperty, LeafEntry } from './tree.js';

export { filterTree, matchesPrefix } from './filter.js';

// Seeds
export {
	seedFrom,
	freshSeed,
	nextWord64,
	splitSeed,
	seedToInt32,
	seedsEqual,
	formatSeed,
	parseSeed,
	toSeed,
	SeedFormatError,
} from './seed.js';
export type { Seed } from './seed.js';

// Execution
export { Executor, planLeaves } from './executor.js';
export type {
	ExecutedLeaf,
	LeafResult,
	LeafStatus,
	FailureReport,
	PlannedLeaf,
	ExecutorOptions,
	ExecutorSettings,
} from './executor.js';

export { ControlSignal, isControlSignal, skipCheck, pendingCheck, discardInput } from './signals.js';
export type { ControlKind } from './signals.js';

export { classifyFailure } from './failure.js';
export type { FailureKind, FailureClassification } from './failure.js';

// Aggregation
export { ResultAggregator } from './result-aggregator.js';
export type { Summary, RunStatus, SummarizeOptions, FormatOptions } from './result-aggregator.js';

// Live progress
export { EventBus } from './event-bus.js';
export type { RunnerEvents, RunPhase, EventListener } from './event-bus.js';
