import * as fc from 'fast-check';
import { type ExecutedLeaf, Executor, type Test, seedFrom } from 'scopecheck-runner';
import { describe, expect, it } from 'vitest';
import { ConfigError } from './errors.js';
import { expectEq } from './expect.js';
import { crash, expect as check, ok, pending, propertyTest, scope, skip, tests, unitTest } from './test.js';

async function execute(tree: Test): Promise<ExecutedLeaf[]> {
	return new Executor({ config: { trials: 20 } }).execute(tree, seedFrom(1n));
}

describe('unit check helpers', () => {
	it('should pass ok and fail crash', async () => {
		const [a, b] = await execute(tests([scope('a', unitTest(ok)), scope('b', unitTest(crash('x')))]));
		expect(a?.result).toEqual({ status: 'passed', trials: 1 });
		expect(b?.result.status === 'failed' && b.result.report).toMatchObject({
			kind: 'crash',
			message: 'x',
		});
	});

	it('should check a condition', async () => {
		const results = await execute(
			tests([unitTest(check(1 + 1 === 2)), unitTest(check(1 + 1 === 3, 'arithmetic is broken'))]),
		);
		expect(results.map((r) => r.result.status)).toEqual(['passed', 'failed']);
		const [, second] = results;
		expect(second?.result.status === 'failed' && second.result.report).toMatchObject({
			kind: 'assertion',
			message: 'arithmetic is broken',
		});
	});

	it('should mark skipped and pending leaves', async () => {
		const results = await execute(tests([unitTest(skip('needs a network')), unitTest(pending())]));
		expect(results.map((r) => r.result)).toEqual([
			{ status: 'skipped', reason: 'needs a network' },
			{ status: 'pending', reason: undefined },
		]);
	});
});

describe('propertyTest', () => {
	it('should pass a property that holds', async () => {
		const [leaf] = await execute(
			propertyTest(fc.array(fc.integer()), (xs) => {
				expectEq([...xs].reverse().reverse(), xs);
			}),
		);
		expect(leaf?.result).toEqual({ status: 'passed', trials: 20 });
	});

	it('should report the shrunk counterexample', async () => {
		const [leaf] = await execute(
			scope(
				'numbers.small',
				propertyTest(fc.integer({ min: 10, max: 1000 }), (n) => {
					expectEq(n < 10, true);
				}),
			),
		);
		expect(leaf?.result.status).toBe('failed');
		expect(leaf?.result.status === 'failed' && leaf.result.report).toMatchObject({
			kind: 'assertion',
			trials: 1,
			counterexample: '10',
		});
	});

	it('should render counterexamples with a custom show', async () => {
		const [leaf] = await execute(
			propertyTest(
				fc.constant('x'),
				() => {
					throw new Error('always');
				},
				{ show: (value) => `<${value}>` },
			),
		);
		expect(leaf?.result.status === 'failed' && leaf.result.report.counterexample).toBe('<x>');
	});

	it('should give up when assumptions never hold', async () => {
		const [leaf] = await execute(
			scope(
				'never',
				propertyTest(fc.nat(), (n, t) => t.assume(n < 0), { maxDiscards: 1 }),
			),
		);
		expect(leaf?.result).toEqual({ status: 'gave-up', discards: 1, trials: 0 });
	});

	it('should reject invalid options when the tree is built', () => {
		expect(() => propertyTest(fc.nat(), () => undefined, { trials: 0 })).toThrow(
			'Invalid trials: expected an integer >= 1, got 0',
		);
		expect(() => propertyTest(fc.nat(), () => undefined, { maxDiscards: 1.5 })).toThrow(ConfigError);
		expect(() => propertyTest(fc.nat(), () => undefined, { maxShrinks: -1 })).toThrow(
			'Invalid maxShrinks: expected an integer >= 0, got -1',
		);
	});
});
