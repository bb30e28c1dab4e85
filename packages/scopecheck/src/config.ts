// ============================================================================
// Scopecheck - Configuration
// Zero config by default. Override only what you need.
//
// Precedence, lowest first: defaults, config file / code, environment,
// command-line flags.
// ============================================================================

import { type GaveUpPolicy, type Seed, parseSeed } from 'scopecheck-runner';
import { ConfigError } from './errors.js';

/** Full configuration with all options */
export interface ScopecheckConfig {
	/** Passing trials each property needs (default: 100) */
	trials: number;
	/** Discarded inputs a property may accumulate before giving up (default: 100) */
	maxDiscards: number;
	/** Shrink candidates tried after a property fails (default: 1000) */
	maxShrinks: number;
	/** Largest size handed to generators; sizes cycle from 0 (default: 99) */
	maxSize: number;
	/**
	 * What a gave-up property means for the run (default: 'warn').
	 *
	 * - `'warn'`:        reported, never fails the run
	 * - `'fail'`:        any gave-up leaf fails the run
	 * - `'fail-if-all'`: fails only when every leaf gave up
	 */
	gaveUpPolicy: GaveUpPolicy;
	/** Colour the report (default: stdout is a TTY and NO_COLOR is unset) */
	color: boolean;
	/** Trace phases, seeds and timings to stderr (default: false) */
	debug: boolean;
}

/** Users provide a partial config -- everything has smart defaults */
export type UserConfig = Partial<ScopecheckConfig>;

export interface ResolveOptions {
	/** Environment to read overrides from (default: process.env) */
	env?: NodeJS.ProcessEnv;
	/** Applied last, e.g. command-line flags */
	overrides?: UserConfig;
}

const GAVE_UP_POLICIES: readonly GaveUpPolicy[] = ['warn', 'fail', 'fail-if-all'];

/** Smart defaults -- works out of the box with zero config */
const DEFAULTS: Omit<ScopecheckConfig, 'color'> = {
	trials: 100,
	maxDiscards: 100,
	maxShrinks: 1000,
	maxSize: 99,
	gaveUpPolicy: 'warn',
	debug: false,
};

/**
 * Define your Scopecheck config with full type safety.
 * This function is optional -- it's just a type helper for your IDE.
 *
 * ```ts
 * // scopecheck.config.ts
 * import { defineConfig } from 'scopecheck';
 *
 * export default defineConfig({
 *   trials: 500,
 *   gaveUpPolicy: 'fail',
 * });
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Merge defaults, user config, environment and overrides, then validate.
 */
export function resolveConfig(userConfig?: UserConfig, options: ResolveOptions = {}): ScopecheckConfig {
	const env = options.env ?? process.env;

	const config: ScopecheckConfig = {
		...DEFAULTS,
		color: env.NO_COLOR === undefined && process.stdout.isTTY === true,
		...userConfig,
		...configFromEnv(env),
		...options.overrides,
	};

	validateConfig(config);
	return config;
}

/**
 * Settings from `SCOPECHECK_*` variables. `NO_COLOR` turns colour off.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): UserConfig {
	const config: UserConfig = {};

	if (env.SCOPECHECK_TRIALS !== undefined) {
		config.trials = parseCount('SCOPECHECK_TRIALS', env.SCOPECHECK_TRIALS);
	}
	if (env.SCOPECHECK_MAX_DISCARDS !== undefined) {
		config.maxDiscards = parseCount('SCOPECHECK_MAX_DISCARDS', env.SCOPECHECK_MAX_DISCARDS);
	}
	if (env.SCOPECHECK_MAX_SHRINKS !== undefined) {
		config.maxShrinks = parseCount('SCOPECHECK_MAX_SHRINKS', env.SCOPECHECK_MAX_SHRINKS);
	}
	if (env.SCOPECHECK_GAVE_UP !== undefined) {
		config.gaveUpPolicy = parseGaveUpPolicy('SCOPECHECK_GAVE_UP', env.SCOPECHECK_GAVE_UP);
	}
	if (env.SCOPECHECK_DEBUG !== undefined) {
		config.debug = env.SCOPECHECK_DEBUG === '1' || env.SCOPECHECK_DEBUG.toLowerCase() === 'true';
	}
	if (env.NO_COLOR !== undefined) {
		config.color = false;
	}

	return config;
}

/**
 * A replay seed from `SCOPECHECK_SEED`, if set.
 */
export function seedFromEnv(env: NodeJS.ProcessEnv = process.env): Seed | undefined {
	const text = env.SCOPECHECK_SEED;
	if (text === undefined || text.trim() === '') return undefined;
	return parseSeed(text);
}

/**
 * Check an untyped value (e.g. a config file's default export) and keep the
 * known settings.
 */
export function toUserConfig(value: unknown, source = 'config'): UserConfig {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		throw new ConfigError(source, 'expected an object', 'Export the result of defineConfig({...}).');
	}

	const config: UserConfig = {};
	for (const [key, raw] of Object.entries(value)) {
		switch (key) {
			case 'trials':
			case 'maxDiscards':
			case 'maxShrinks':
			case 'maxSize':
				if (typeof raw !== 'number') throw new ConfigError(key, `expected a number, got ${typeof raw}`);
				config[key] = raw;
				break;
			case 'gaveUpPolicy':
				config.gaveUpPolicy = parseGaveUpPolicy(key, raw);
				break;
			case 'color':
			case 'debug':
				if (typeof raw !== 'boolean') throw new ConfigError(key, `expected a boolean, got ${typeof raw}`);
				config[key] = raw;
				break;
			default:
				console.warn(`[scopecheck] Ignoring unknown config key "${key}" in ${source}`);
		}
	}
	return config;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfig(config: ScopecheckConfig): void {
	requireInteger('trials', config.trials, 1);
	requireInteger('maxDiscards', config.maxDiscards, 1);
	requireInteger('maxShrinks', config.maxShrinks, 0);
	requireInteger('maxSize', config.maxSize, 0);
	parseGaveUpPolicy('gaveUpPolicy', config.gaveUpPolicy);
}

export function requireInteger(key: string, value: number, min: number): void {
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(key, `expected an integer >= ${min}, got ${value}`);
	}
}

function parseCount(key: string, text: string): number {
	const value = Number(text.trim());
	if (text.trim() === '' || !Number.isInteger(value)) {
		throw new ConfigError(key, `expected an integer, got "${text}"`);
	}
	return value;
}

function parseGaveUpPolicy(key: string, value: unknown): GaveUpPolicy {
	const match = GAVE_UP_POLICIES.find((policy) => policy === value);
	if (!match) {
		throw new ConfigError(key, `expected one of ${GAVE_UP_POLICIES.join(', ')}, got ${String(value)}`);
	}
	return match;
}
