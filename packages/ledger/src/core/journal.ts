/**
 * Transition Journal
 *
 * Tracks undo records and buffered events for the transitions currently
 * executing. Each transition runs in its own frame; a transition started
 * while another is in flight (a reentrant call made from inside an outbound
 * transfer) opens a nested frame.
 *
 * - On failure a frame replays its undo records in reverse order, restoring
 *   the exact prior values, and drops its events.
 * - On success a nested frame folds its records and events into the parent,
 *   so a later failure of the parent reverts them as well.
 * - Only the outermost frame hands its events out for appending.
 */

import { LedgerError, LedgerEvent } from "./types.js";

interface JournalFrame {
	undo: Array<() => void>;
	events: LedgerEvent[];
}

export interface JournalRun<T> {
	result: T;
	/** Events to append; empty unless the outermost frame committed */
	committed: LedgerEvent[];
}

export class Journal {
	private readonly frames: JournalFrame[] = [];

	/**
	 * Number of open frames.
	 */
	get depth(): number {
		return this.frames.length;
	}

	/**
	 * Register the inverse of a mutation just applied in the current frame.
	 */
	record(undo: () => void): void {
		this.current("record").undo.push(undo);
	}

	/**
	 * Buffer an event until the outermost frame commits.
	 */
	emit(event: LedgerEvent): void {
		this.current("emit").events.push(
			Object.freeze({
				kind: event.kind,
				identity: event.identity,
				amount: event.amount,
			}),
		);
	}

	/**
	 * Run `fn` in a new frame: commit if it returns, revert if it throws.
	 */
	run<T>(fn: () => T): JournalRun<T> {
		const frame: JournalFrame = { undo: [], events: [] };
		this.frames.push(frame);

		let result: T;
		try {
			result = fn();
		} catch (error) {
			this.frames.pop();
			for (let i = frame.undo.length - 1; i >= 0; i--) {
				frame.undo[i]();
			}
			throw error;
		}

		this.frames.pop();
		if (this.frames.length > 0) {
			const parent = this.frames[this.frames.length - 1];
			parent.undo.push(...frame.undo);
			parent.events.push(...frame.events);
			return { result, committed: [] };
		}
		return { result, committed: frame.events };
	}

	private current(operation: string): JournalFrame {
		if (this.frames.length === 0) {
			throw new LedgerError(
				`Cannot ${operation} outside of a transition`,
				"UNDERFLOW",
				{ operation },
			);
		}
		return this.frames[this.frames.length - 1];
	}
}
