// ============================================================================
// Scopecheck - Command-Line Flags
// ============================================================================

import type { GaveUpPolicy } from 'scopecheck-runner';
import type { UserConfig } from './config.js';
import { ConfigError } from './errors.js';

export interface CLIFlags {
	/** Suite module to load */
	file?: string;
	/** Only run leaves under this scope prefix */
	only?: string;
	/** Replay this seed ("<value> <gamma>") */
	seed?: string;
	/** Print the qualified names of the suite's leaves instead of running */
	list: boolean;
	help: boolean;
	version: boolean;
	/** Settings that override config file and environment */
	overrides: UserConfig;
}

/**
 * Parse `scopecheck <suite-file> [options]`. Unknown flags and bad values
 * throw a ConfigError.
 */
export function parseFlags(args: readonly string[]): CLIFlags {
	const flags: CLIFlags = { list: false, help: false, version: false, overrides: {} };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';
		const value = (): string => {
			const next = args[++i];
			if (next === undefined) {
				throw new ConfigError(arg, 'missing value', `Pass a value after ${arg}.`);
			}
			return next;
		};

		switch (arg) {
			case '--help':
			case '-h':
				flags.help = true;
				break;
			case '--version':
			case '-v':
				flags.version = true;
				break;
			case '--list':
				flags.list = true;
				break;
			case '--debug':
				flags.overrides.debug = true;
				break;
			case '--no-color':
				flags.overrides.color = false;
				break;
			case '--only':
				flags.only = value();
				break;
			case '--seed':
				flags.seed = value();
				break;
			case '--trials':
				flags.overrides.trials = parseInteger(arg, value());
				break;
			case '--max-discards':
				flags.overrides.maxDiscards = parseInteger(arg, value());
				break;
			case '--max-shrinks':
				flags.overrides.maxShrinks = parseInteger(arg, value());
				break;
			case '--gave-up':
				flags.overrides.gaveUpPolicy = parsePolicy(arg, value());
				break;
			default:
				if (arg.startsWith('-')) {
					throw new ConfigError(arg, 'unknown option', 'Run "scopecheck --help" for usage information.');
				}
				if (flags.file !== undefined) {
					throw new ConfigError(arg, `only one suite file can be given (already have ${flags.file})`);
				}
				flags.file = arg;
		}
	}

	return flags;
}

function parseInteger(flag: string, text: string): number {
	if (!/^\d+$/.test(text)) {
		throw new ConfigError(flag, `expected a non-negative integer, got "${text}"`);
	}
	return Number.parseInt(text, 10);
}

function parsePolicy(flag: string, text: string): GaveUpPolicy {
	switch (text) {
		case 'warn':
		case 'fail':
		case 'fail-if-all':
			return text;
		default:
			throw new ConfigError(flag, `expected warn, fail or fail-if-all, got "${text}"`);
	}
}
