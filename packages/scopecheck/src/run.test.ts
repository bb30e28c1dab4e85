import * as fc from 'fast-check';
import { type Summary, formatSeed } from 'scopecheck-runner';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from './errors.js';
import { expectEq } from './expect.js';
import { type RunHost, processHost, rerun, rerunOnly, run, runOnly } from './run.js';
import { crash, propertyTest, scope, tests, unitTest } from './test.js';

const PLAIN = { NO_COLOR: '1' };

function createHost() {
	const lines: string[] = [];
	const exits: number[] = [];
	const host: RunHost = {
		write: (text) => lines.push(text),
		exit: (code) => exits.push(code),
	};
	return { host, lines, exits };
}

const suite = tests([scope('a', unitTest(() => expectEq(1 + 1, 2))), scope('b', unitTest(crash('x')))]);

const numbers = tests([
	scope('numbers.any', unitTest(() => undefined)),
	scope(
		'numbers.small',
		propertyTest(fc.integer({ min: 10, max: 1000 }), (n) => {
			expectEq(n < 10, true);
		}),
	),
]);

function failureOf(summary: Summary, name: string) {
	const leaf = summary.results.find((r) => r.name === name);
	if (!leaf || leaf.result.status !== 'failed') throw new Error(`${name} did not fail`);
	return leaf.result.report;
}

afterEach(() => {
	vi.restoreAllMocks();
});

describe('run', () => {
	it('should report results and signal failure to the host', async () => {
		const { host, lines, exits } = createHost();
		const summary = await run(suite, { host, env: PLAIN });

		expect(summary.results.map((r) => [r.name, r.result.status])).toEqual([
			['a', 'passed'],
			['b', 'failed'],
		]);
		expect(summary.status).toBe('failed');
		expect(exits).toEqual([1]);
		expect(lines[0]).toBe('━━━ run ━━━');
		expect(lines).toContain('  ✗ 1 failed, 1 succeeded.');
	});

	it('should replay SCOPECHECK_SEED instead of drawing a fresh seed', async () => {
		const { host, lines } = createHost();
		const summary = await run(suite, { host, env: { ...PLAIN, SCOPECHECK_SEED: '5 7' } });

		expect(summary.label).toBe('rerun');
		expect(formatSeed(summary.seed)).toBe('5 7');
		expect(lines.at(-1)).toBe('  seed: 5 7');
	});

	it('should apply overrides on top of the config', async () => {
		const action = vi.fn();
		const { host } = createHost();
		await run(scope('p', propertyTest(fc.nat(), action)), {
			host,
			env: PLAIN,
			config: { trials: 50 },
			overrides: { trials: 4 },
		});
		expect(action).toHaveBeenCalledTimes(4);
	});

	it('should reject invalid config before running anything', async () => {
		const check = vi.fn();
		const { host, exits } = createHost();
		await expect(run(unitTest(check), { host, env: PLAIN, config: { trials: -1 } })).rejects.toThrow(ConfigError);
		expect(check).not.toHaveBeenCalled();
		expect(exits).toEqual([]);
	});
});

describe('runOnly', () => {
	it('should run only the selected scope', async () => {
		const { host, exits } = createHost();
		const summary = await runOnly('a', suite, { host, env: PLAIN });

		expect(summary).toMatchObject({ label: 'runOnly "a"', total: 1, passed: 1, failed: 0, status: 'succeeded' });
		expect(exits).toEqual([0]);
	});

	it('should become rerunOnly when SCOPECHECK_SEED is set', async () => {
		const { host } = createHost();
		const summary = await runOnly('b', suite, { host, env: { ...PLAIN, SCOPECHECK_SEED: '5 7' } });

		expect(summary.label).toBe('rerunOnly "b"');
		expect(formatSeed(summary.results[0]?.seed ?? summary.seed)).toBe('5 7');
	});
});

describe('gave up', () => {
	const never = tests([scope('never', propertyTest(fc.nat(), (n, t) => t.assume(n < 0), { maxDiscards: 1 }))]);

	it('should flag a property whose precondition never holds without failing the run', async () => {
		const { host, lines, exits } = createHost();
		const summary = await run(never, { host, env: PLAIN });

		expect(summary).toMatchObject({ total: 1, gaveUp: 1, failed: 0, status: 'succeeded' });
		expect(lines).toContain('  ⚐ never gave up after 1 discard, passed 0 tests.');
		expect(lines).toContain('  ⚐ 1 gave up.');
		expect(exits).toEqual([0]);
	});

	it('should fail the run under the fail policy', async () => {
		const { host, exits } = createHost();
		const summary = await run(never, { host, env: PLAIN, overrides: { gaveUpPolicy: 'fail' } });

		expect(summary.status).toBe('failed');
		expect(exits).toEqual([1]);
	});
});

describe('rerun / rerunOnly', () => {
	it('should print a replay call that reproduces the counterexample', async () => {
		const first = createHost();
		const original = await rerun('5 7', numbers, { host: first.host, env: PLAIN });
		const report = failureOf(original, 'numbers.small');
		const seedText = formatSeed(report.seed);

		expect(report.counterexample).toBe('10');
		expect(first.lines).toContain(`    > rerunOnly("numbers.small", "${seedText}")`);
		expect(first.lines).toContain('    Counterexample: 10');

		const second = createHost();
		const replay = await rerunOnly('numbers.small', seedText, numbers, { host: second.host, env: PLAIN });
		const replayed = failureOf(replay, 'numbers.small');

		expect(replay.total).toBe(1);
		expect(replayed.counterexample).toBe('10');
		expect(replayed.seed).toEqual(report.seed);
		expect(second.exits).toEqual([1]);
	});

	it('should give identical results for the same seed', async () => {
		const first = await rerun('5 7', numbers, { host: createHost().host, env: PLAIN });
		const second = await rerun('5 7', numbers, { host: createHost().host, env: PLAIN });
		expect(second.results.map((r) => [r.name, r.seed, r.result.status])).toEqual(
			first.results.map((r) => [r.name, r.seed, r.result.status]),
		);
	});

	it('should reject a malformed seed', async () => {
		const { host } = createHost();
		await expect(rerun('one two', suite, { host, env: PLAIN })).rejects.toThrow('Invalid seed "one two"');
	});
});

describe('processHost', () => {
	it('should print through console.log', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		processHost.write('  ✓ a passed 1 test.');
		expect(log).toHaveBeenCalledWith('  ✓ a passed 1 test.');
	});

	it('should leave the exit code alone on success', () => {
		const before = process.exitCode;
		processHost.exit(0);
		expect(process.exitCode).toBe(before);
	});
});
