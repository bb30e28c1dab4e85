// ============================================================================
// Scopecheck Runner - EventBus
// Type-safe live progress events for the execution engine.
// Console reporters and embedding tools plug into these events.
// ============================================================================

import type { ExecutedLeaf } from './executor.js';
import type { Summary } from './result-aggregator.js';
import type { Seed } from './seed.js';
import type { ScopePath } from './tree.js';

/** Stages of a single run, in order */
export type RunPhase = 'start' | 'filtering' | 'executing' | 'summarizing' | 'terminal';

// ---------------------------------------------------------------------------
// Event Map - every event and its payload
// ---------------------------------------------------------------------------

export interface RunnerEvents {
	// Run lifecycle
	'run:start': { label: string; seed: Seed; prefix?: string };
	'run:phase': { phase: RunPhase };
	'run:end': { summary: Summary };

	// Leaf lifecycle
	'leaf:start': { name: string; path: ScopePath; seed: Seed; index: number; total: number };
	'leaf:end': ExecutedLeaf;

	// Property trials
	'trial:fail': { name: string; trial: number; size: number };
	'trial:shrunk': { name: string; shrinks: number };
}

export type EventListener<K extends keyof RunnerEvents> = (payload: RunnerEvents[K]) => void;

type AnyListener = (payload: never) => void;

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Synchronous event bus. Listeners always see events in emission order.
 *
 * ```ts
 * const bus = new EventBus();
 * bus.on('leaf:end', ({ name, result }) => { ... });
 * bus.on('run:end', ({ summary }) => { ... });
 * ```
 */
export class EventBus {
	private listeners = new Map<keyof RunnerEvents, Set<AnyListener>>();
	private history: Array<{ event: keyof RunnerEvents; payload: unknown }> = [];
	private recordHistory = false;

	/** Returns the unsubscribe function */
	on<K extends keyof RunnerEvents>(event: K, listener: EventListener<K>): () => void {
		const registered = this.listeners.get(event) ?? new Set<AnyListener>();
		this.listeners.set(event, registered.add(listener));

		return () => {
			registered.delete(listener);
			if (registered.size === 0) this.listeners.delete(event);
		};
	}

	/**
	 * Emit an event to all listeners. A throwing listener is reported and
	 * skipped; it never interrupts the run.
	 */
	emit<K extends keyof RunnerEvents>(event: K, payload: RunnerEvents[K]): void {
		if (this.recordHistory) {
			this.history.push({ event, payload });
		}

		const set = this.listeners.get(event);
		if (!set) return;

		for (const listener of set) {
			try {
				(listener as EventListener<K>)(payload);
			} catch (error) {
				console.error(
					`[scopecheck] listener for "${event}" threw: ${error instanceof Error ? error.message : String(error)}`,
				);
			}
		}
	}

	listenerCount(event: keyof RunnerEvents): number {
		return this.listeners.get(event)?.size ?? 0;
	}

	// -----------------------------------------------------------------------
	// History (for test assertions)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this.recordHistory = true;
	}

	/**
	 * Recorded payloads of one event type, oldest first.
	 */
	getEventsOfType<K extends keyof RunnerEvents>(event: K): Array<RunnerEvents[K]> {
		return this.history
			.filter((h) => h.event === event)
			.map((h) => h.payload as RunnerEvents[K]);
	}
}
