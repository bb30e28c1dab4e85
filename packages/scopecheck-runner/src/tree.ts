// ============================================================================
// Scopecheck Runner - Scope Tree
// Immutable test trees: leaves are checks, branches sequence or label them.
//
// tests([
//   scope('addition.ex1', unitTest(() => { ... })),
//   scope('list', scope('reversal', propertyTest(source, (xs) => { ... }))),
// ]);
//
// A '.' inside a scope name always means nesting: scope('a.b', t) and
// scope('a', scope('b', t)) are the same tree.
// ============================================================================

import type { PropertyAction, PropertyOptions, UnitCheck, ValueSource } from './types.js';

/** Ordered scope labels from the root down to a node */
export type ScopePath = readonly string[];

/** Everything the executor needs to run one property leaf */
export interface PropertySpec<T> {
	source: ValueSource<T>;
	action: PropertyAction<T>;
	options: PropertyOptions;
}

/**
 * A property spec with its value type hidden, so trees of mixed
 * properties stay homogeneous.
 */
export interface PackedProperty {
	unpack<R>(use: <T>(spec: PropertySpec<T>) => R): R;
}

export type Leaf = { kind: 'unit'; check: UnitCheck } | { kind: 'property'; property: PackedProperty };

export type Test =
	| { readonly kind: 'leaf'; readonly leaf: Leaf }
	| { readonly kind: 'tests'; readonly children: readonly Test[] }
	| { readonly kind: 'scope'; readonly segments: ScopePath; readonly child: Test };

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/**
 * Run several tests in order.
 */
export function tests(children: readonly Test[]): Test {
	return { kind: 'tests', children: [...children] };
}

/**
 * Label a test. Nested scopes are joined with '.'.
 */
export function scope(name: string, child: Test): Test {
	const segments = splitScopeName(name);
	if (segments.length === 0) return child;

	if (child.kind === 'scope') {
		return { kind: 'scope', segments: [...segments, ...child.segments], child: child.child };
	}
	return { kind: 'scope', segments, child };
}

/**
 * A check that runs exactly once.
 */
export function unitTest(check: UnitCheck): Test {
	return { kind: 'leaf', leaf: { kind: 'unit', check } };
}

/**
 * A check run against many generated values.
 */
export function propertyTest<T>(
	source: ValueSource<T>,
	action: PropertyAction<T>,
	options: PropertyOptions = {},
): Test {
	const spec: PropertySpec<T> = { source, action, options: { ...options } };
	const property: PackedProperty = {
		unpack<R>(use: <U>(packed: PropertySpec<U>) => R): R {
			return use(spec);
		},
	};
	return { kind: 'leaf', leaf: { kind: 'property', property } };
}

/**
 * Shallow check that a value is a scope tree node, e.g. a module's export.
 */
export function isTest(value: unknown): value is Test {
	if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
	switch (value.kind) {
		case 'leaf':
			return 'leaf' in value && typeof value.leaf === 'object' && value.leaf !== null;
		case 'tests':
			return 'children' in value && Array.isArray(value.children);
		case 'scope':
			return 'segments' in value && Array.isArray(value.segments) && 'child' in value;
		default:
			return false;
	}
}

// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

/** Split a user-supplied scope name into segments, dropping empty ones. */
export function splitScopeName(name: string): string[] {
	return name.split('.').filter((segment) => segment.length > 0);
}

export function qualifiedName(path: ScopePath): string {
	return path.join('.');
}

/** Qualified name for display; unscoped leaves read "(unnamed)". */
export function displayName(path: ScopePath): string {
	return path.length === 0 ? '(unnamed)' : qualifiedName(path);
}

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

export interface LeafEntry {
	path: ScopePath;
	leaf: Leaf;
}

/**
 * Every leaf with its scope path, in execution order.
 */
export function collectLeaves(test: Test, path: ScopePath = []): LeafEntry[] {
	switch (test.kind) {
		case 'leaf':
			return [{ path, leaf: test.leaf }];
		case 'scope':
			return collectLeaves(test.child, [...path, ...test.segments]);
		case 'tests':
			return test.children.flatMap((child) => collectLeaves(child, path));
	}
}
