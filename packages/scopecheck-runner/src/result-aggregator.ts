// ============================================================================
// Scopecheck Runner - Result Aggregator
// Rolls leaf results up into a run summary and renders the console report.
//
// ━━━ runOnly "addition" ━━━
//   ✓ addition.ex1 passed 1 test.
//   ⚐ addition.slow gave up after 100 discards, passed 3 tests.
//   ✗ addition.ex2 failed after 1 test.
//   ✗ 1 failed, 1 gave up, 1 succeeded.
//
// Rendering is pure: it returns strings and never writes anywhere.
// ============================================================================

import type { ExecutedLeaf, FailureReport, LeafResult } from './executor.js';
import { type Seed, formatSeed } from './seed.js';
import { qualifiedName } from './tree.js';
import type { GaveUpPolicy } from './types.js';

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export type RunStatus = 'succeeded' | 'failed';

export interface Summary {
	/** Which entry point produced it, e.g. `runOnly "addition"` */
	label: string;
	/** The run seed every leaf seed was derived from */
	seed: Seed;
	total: number;
	passed: number;
	failed: number;
	skipped: number;
	pending: number;
	gaveUp: number;
	status: RunStatus;
	results: readonly ExecutedLeaf[];
}

export interface SummarizeOptions {
	seed: Seed;
	label?: string;
	/** Whether gave-up leaves fail the run (default: 'warn', they don't) */
	gaveUpPolicy?: GaveUpPolicy;
}

export interface FormatOptions {
	/** Colour glyphs with ANSI escapes (default: false) */
	color?: boolean;
}

const GLYPH = {
	passed: '✓',
	failed: '✗',
	flagged: '⚐',
} as const;

const ANSI = {
	green: '\x1b[32m',
	red: '\x1b[31m',
	yellow: '\x1b[33m',
	dim: '\x1b[2m',
	reset: '\x1b[0m',
} as const;

// ---------------------------------------------------------------------------
// ResultAggregator
// ---------------------------------------------------------------------------

/**
 * Turns executed leaves into a {@link Summary} and formats it.
 *
 * ```ts
 * const aggregator = new ResultAggregator();
 * const summary = aggregator.summarize(results, { seed, label: 'run' });
 * console.log(aggregator.formatReport(summary, { color: true }));
 * ```
 */
export class ResultAggregator {
	summarize(results: readonly ExecutedLeaf[], options: SummarizeOptions): Summary {
		const counts = { passed: 0, failed: 0, skipped: 0, pending: 0, gaveUp: 0 };

		for (const { result } of results) {
			switch (result.status) {
				case 'passed':
					counts.passed++;
					break;
				case 'failed':
					counts.failed++;
					break;
				case 'skipped':
					counts.skipped++;
					break;
				case 'pending':
					counts.pending++;
					break;
				case 'gave-up':
					counts.gaveUp++;
					break;
			}
		}

		const total = results.length;
		const policy = options.gaveUpPolicy ?? 'warn';

		return {
			label: options.label ?? 'run',
			seed: options.seed,
			total,
			...counts,
			status: decideStatus(total, counts.failed, counts.gaveUp, policy),
			results: [...results],
		};
	}

	// -----------------------------------------------------------------------
	// Formatting
	// -----------------------------------------------------------------------

	formatHeader(summary: Summary): string {
		return `━━━ ${summary.label} ━━━`;
	}

	/**
	 * One line for the leaf, followed by a detail block when it failed.
	 */
	formatLeaf(leaf: ExecutedLeaf, options: FormatOptions = {}): string[] {
		const glyph = paint(glyphFor(leaf.result), options);
		const lines = [`  ${glyph} ${leaf.name} ${describeOutcome(leaf.result)}`];

		if (leaf.result.status === 'failed') {
			lines.push(...this.formatFailure(leaf, leaf.result.report));
		}

		return lines;
	}

	formatFooter(summary: Summary, options: FormatOptions = {}): string {
		const parts: string[] = [];
		if (summary.failed > 0) parts.push(`${summary.failed} failed`);
		if (summary.gaveUp > 0) parts.push(`${summary.gaveUp} gave up`);
		if (summary.skipped > 0) parts.push(`${summary.skipped} skipped`);
		if (summary.pending > 0) parts.push(`${summary.pending} pending`);
		if (summary.passed > 0) parts.push(`${summary.passed} succeeded`);

		let glyph: string;
		if (summary.status === 'failed') {
			glyph = paint('failed', options);
		} else if (summary.total === 0 || summary.passed < summary.total) {
			glyph = paint('flagged', options);
		} else {
			glyph = paint('passed', options);
		}

		const text = parts.length > 0 ? `${parts.join(', ')}.` : 'no tests ran.';
		return `  ${glyph} ${text}`;
	}

	/**
	 * The whole report: header, every leaf, footer and the run seed.
	 */
	formatReport(summary: Summary, options: FormatOptions = {}): string {
		const lines = [this.formatHeader(summary)];
		for (const leaf of summary.results) {
			lines.push(...this.formatLeaf(leaf, options));
		}
		lines.push(this.formatFooter(summary, options));
		lines.push(this.formatSeedLine(summary, options));
		return lines.join('\n');
	}

	formatSeedLine(summary: Summary, options: FormatOptions = {}): string {
		const text = `  seed: ${formatSeed(summary.seed)}`;
		return options.color ? `${ANSI.dim}${text}${ANSI.reset}` : text;
	}

	/**
	 * The call that replays a failing leaf. An unnamed leaf can't be
	 * selected by prefix, so it gets the whole run again.
	 */
	formatReplay(leaf: Pick<ExecutedLeaf, 'path' | 'runSeed'>, seed: Seed): string {
		if (leaf.path.length === 0) {
			return `rerun(${JSON.stringify(formatSeed(leaf.runSeed))})`;
		}
		return `rerunOnly(${JSON.stringify(qualifiedName(leaf.path))}, ${JSON.stringify(formatSeed(seed))})`;
	}

	private formatFailure(leaf: ExecutedLeaf, report: FailureReport): string[] {
		const lines = [''];
		for (const line of report.message.split('\n')) {
			lines.push(indent(line));
		}
		for (const note of report.footnotes) {
			lines.push(indent(note));
		}
		if (report.counterexample !== undefined) {
			lines.push(indent(`Counterexample: ${report.counterexample}`));
		}
		lines.push('');
		lines.push(indent('This failure can be reproduced by running:'));
		lines.push(indent(`> ${this.formatReplay(leaf, report.seed)}`));
		lines.push('');
		return lines;
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function decideStatus(total: number, failed: number, gaveUp: number, policy: GaveUpPolicy): RunStatus {
	if (failed > 0) return 'failed';
	switch (policy) {
		case 'warn':
			return 'succeeded';
		case 'fail':
			return gaveUp > 0 ? 'failed' : 'succeeded';
		case 'fail-if-all':
			return total > 0 && gaveUp === total ? 'failed' : 'succeeded';
	}
}

function glyphFor(result: LeafResult): keyof typeof GLYPH {
	switch (result.status) {
		case 'passed':
			return 'passed';
		case 'failed':
			return 'failed';
		default:
			return 'flagged';
	}
}

function paint(kind: keyof typeof GLYPH, options: FormatOptions): string {
	const glyph = GLYPH[kind];
	if (!options.color) return glyph;
	const colour = kind === 'passed' ? ANSI.green : kind === 'failed' ? ANSI.red : ANSI.yellow;
	return `${colour}${glyph}${ANSI.reset}`;
}

function describeOutcome(result: LeafResult): string {
	switch (result.status) {
		case 'passed':
			return `passed ${plural(result.trials, 'test')}.`;
		case 'failed': {
			const { trials, shrinks, counterexample } = result.report;
			if (counterexample === undefined) return `failed after ${plural(trials, 'test')}.`;
			return `failed after ${plural(trials, 'test')} and ${plural(shrinks, 'shrink')}.`;
		}
		case 'skipped':
			return result.reason ? `skipped (${result.reason}).` : 'skipped.';
		case 'pending':
			return result.reason ? `pending (${result.reason}).` : 'pending.';
		case 'gave-up':
			return `gave up after ${plural(result.discards, 'discard')}, passed ${plural(result.trials, 'test')}.`;
	}
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function indent(line: string): string {
	return line.length > 0 ? `    ${line}` : '';
}
