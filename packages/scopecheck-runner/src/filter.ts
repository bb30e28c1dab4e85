// ============================================================================
// Scopecheck Runner - Prefix Filter
// Keeps the leaves whose qualified name starts with the given scope segments.
//
// filterTree('add', tree)  keeps  add.ex1, add.ex2.deep
//                          drops  addendum, list.add
// ============================================================================

import { type ScopePath, type Test, splitScopeName, tests } from './tree.js';

type PathRelation = 'diverged' | 'partial' | 'covered';

/**
 * Select the sub-forest matching `prefix`. Pure; the input tree is untouched.
 *
 * - The empty prefix returns the very same tree.
 * - Branches without matching leaves disappear entirely.
 * - A sequence left with a single child is replaced by that child, below
 *   the matching scope as well as above it, so a lone matching leaf
 *   receives the run seed unchanged. This is what makes a printed
 *   `rerunOnly(name, seed)` hand the leaf its original seed.
 * - Empty sequences are dropped.
 * - When nothing matches the result is an empty `tests([])`.
 */
export function filterTree(prefix: string, tree: Test): Test {
	const wanted = splitScopeName(prefix);
	if (wanted.length === 0) return tree;
	return prune(tree, [], wanted) ?? tests([]);
}

/** Does the (dot-split) qualified name start with the prefix segments? */
export function matchesPrefix(path: ScopePath, prefix: string): boolean {
	return relate(path, splitScopeName(prefix)) === 'covered';
}

function prune(test: Test, path: ScopePath, wanted: ScopePath): Test | undefined {
	const relation = relate(path, wanted);
	if (relation === 'diverged') return undefined;

	switch (test.kind) {
		case 'leaf':
			// Dropped when its name is shorter than the prefix
			return relation === 'covered' ? test : undefined;
		case 'scope': {
			const child = prune(test.child, [...path, ...test.segments], wanted);
			if (!child) return undefined;
			if (child.kind === 'scope') {
				return { kind: 'scope', segments: [...test.segments, ...child.segments], child: child.child };
			}
			return { kind: 'scope', segments: test.segments, child };
		}
		case 'tests': {
			const kept: Test[] = [];
			for (const child of test.children) {
				const pruned = prune(child, path, wanted);
				if (pruned) kept.push(pruned);
			}
			if (kept.length === 0) return undefined;
			if (kept.length === 1) return kept[0];
			return { kind: 'tests', children: kept };
		}
	}
}

function relate(path: ScopePath, wanted: ScopePath): PathRelation {
	const shared = Math.min(path.length, wanted.length);
	for (let i = 0; i < shared; i++) {
		if (path[i] !== wanted[i]) return 'diverged';
	}
	return path.length >= wanted.length ? 'covered' : 'partial';
}
