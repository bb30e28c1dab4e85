import { afterEach, describe, expect, it, vi } from 'vitest';
import { configFromEnv, defineConfig, resolveConfig, seedFromEnv, toUserConfig } from './config.js';
import { ConfigError } from './errors.js';

afterEach(() => {
	vi.restoreAllMocks();
});

describe('resolveConfig', () => {
	it('should fill in defaults', () => {
		expect(resolveConfig(undefined, { env: { NO_COLOR: '1' } })).toEqual({
			trials: 100,
			maxDiscards: 100,
			maxShrinks: 1000,
			maxSize: 99,
			gaveUpPolicy: 'warn',
			color: false,
			debug: false,
		});
	});

	it('should apply config, then environment, then overrides', () => {
		const config = resolveConfig(
			{ trials: 10, maxDiscards: 5, maxShrinks: 7 },
			{ env: { SCOPECHECK_TRIALS: '20', SCOPECHECK_MAX_DISCARDS: '6' }, overrides: { trials: 30 } },
		);
		expect(config).toMatchObject({ trials: 30, maxDiscards: 6, maxShrinks: 7 });
	});

	it('should let config files turn colour on', () => {
		expect(resolveConfig({ color: true }, { env: {} }).color).toBe(true);
	});

	it('should reject invalid values', () => {
		expect(() => resolveConfig({ trials: 0 }, { env: {} })).toThrow('Invalid trials: expected an integer >= 1, got 0');
		expect(() => resolveConfig({ maxSize: -1 }, { env: {} })).toThrow(ConfigError);
		expect(() => resolveConfig({ maxDiscards: 2.5 }, { env: {} })).toThrow('Invalid maxDiscards');
	});
});

describe('configFromEnv', () => {
	it('should read every supported variable', () => {
		expect(
			configFromEnv({
				SCOPECHECK_TRIALS: '5',
				SCOPECHECK_MAX_DISCARDS: '9',
				SCOPECHECK_MAX_SHRINKS: '0',
				SCOPECHECK_GAVE_UP: 'fail',
				SCOPECHECK_DEBUG: 'true',
				NO_COLOR: '',
			}),
		).toEqual({ trials: 5, maxDiscards: 9, maxShrinks: 0, gaveUpPolicy: 'fail', debug: true, color: false });
	});

	it('should return nothing for an empty environment', () => {
		expect(configFromEnv({})).toEqual({});
	});

	it('should treat other debug values as off', () => {
		expect(configFromEnv({ SCOPECHECK_DEBUG: '0' })).toEqual({ debug: false });
	});

	it('should reject malformed numbers and policies', () => {
		expect(() => configFromEnv({ SCOPECHECK_TRIALS: 'many' })).toThrow(
			'Invalid SCOPECHECK_TRIALS: expected an integer, got "many"',
		);
		expect(() => configFromEnv({ SCOPECHECK_GAVE_UP: 'panic' })).toThrow(
			'Invalid SCOPECHECK_GAVE_UP: expected one of warn, fail, fail-if-all, got panic',
		);
	});
});

describe('seedFromEnv', () => {
	it('should parse SCOPECHECK_SEED', () => {
		expect(seedFromEnv({ SCOPECHECK_SEED: '5 7' })).toEqual({ value: 5n, gamma: 7n });
	});

	it('should ignore an unset or blank variable', () => {
		expect(seedFromEnv({})).toBeUndefined();
		expect(seedFromEnv({ SCOPECHECK_SEED: '  ' })).toBeUndefined();
	});

	it('should reject a malformed seed', () => {
		expect(() => seedFromEnv({ SCOPECHECK_SEED: '5 8' })).toThrow('gamma must be odd');
	});
});

describe('toUserConfig', () => {
	it('should keep known settings', () => {
		expect(toUserConfig({ trials: 3, gaveUpPolicy: 'fail-if-all', debug: true })).toEqual({
			trials: 3,
			gaveUpPolicy: 'fail-if-all',
			debug: true,
		});
	});

	it('should warn about unknown keys', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
		expect(toUserConfig({ retries: 2 }, 'scopecheck.config.ts')).toEqual({});
		expect(warn).toHaveBeenCalledWith('[scopecheck] Ignoring unknown config key "retries" in scopecheck.config.ts');
	});

	it('should reject values of the wrong type', () => {
		expect(() => toUserConfig({ trials: '3' })).toThrow('Invalid trials: expected a number, got string');
		expect(() => toUserConfig({ color: 1 })).toThrow('Invalid color: expected a boolean, got number');
		expect(() => toUserConfig(null)).toThrow('Invalid config: expected an object');
	});

	it('should accept what defineConfig returns', () => {
		expect(toUserConfig(defineConfig({ maxShrinks: 50 }))).toEqual({ maxShrinks: 50 });
	});
});
