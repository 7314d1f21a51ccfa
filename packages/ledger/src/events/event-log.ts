/**
 * Event Log
 *
 * Append-only record of committed transitions, numbered in commit order.
 * Observers subscribe to be told about new entries; entries are frozen and
 * there is no way to edit or remove one.
 */

import { LedgerError, LedgerEvent, LogEntry } from "../core/types.js";

export type LogListener = (entry: LogEntry) => void;

export interface EventLogOptions {
	/**
	 * Receives errors thrown by listeners. A failing listener never affects
	 * the committed entry or the other listeners. Defaults to console.error.
	 */
	onListenerError?: (error: unknown, entry: LogEntry) => void;
}

export class EventLog {
	private readonly log: LogEntry[] = [];
	private readonly listeners: Set<LogListener> = new Set();
	private readonly onListenerError: (error: unknown, entry: LogEntry) => void;

	constructor(options: EventLogOptions = {}) {
		this.onListenerError =
			options.onListenerError ??
			((error, entry) => {
				console.error(
					`Event log listener failed on #${entry.sequence}:`,
					error,
				);
			});
	}

	get length(): number {
		return this.log.length;
	}

	/**
	 * Append committed events, then notify listeners once all are in place.
	 *
	 * @returns The appended entries
	 */
	append(...events: LedgerEvent[]): LogEntry[] {
		const appended = events.map((event) => {
			const entry: LogEntry = Object.freeze({
				sequence: this.log.length + 1,
				kind: event.kind,
				identity: event.identity,
				amount: event.amount,
			});
			this.log.push(entry);
			return entry;
		});
		for (const entry of appended) {
			this.notify(entry);
		}
		return appended;
	}

	entries(): LogEntry[] {
		return [...this.log];
	}

	/**
	 * Entries with a sequence greater than `afterSequence`.
	 */
	since(afterSequence: number, limit?: number): LogEntry[] {
		const start = Math.max(0, Math.floor(afterSequence));
		const end = limit === undefined ? undefined : start + Math.max(0, limit);
		return this.log.slice(start, end);
	}

	last(): LogEntry | undefined {
		return this.log.length > 0 ? this.log[this.log.length - 1] : undefined;
	}

	/**
	 * Be told about every entry appended from now on.
	 *
	 * @returns Unsubscribe function
	 */
	subscribe(listener: LogListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Fill an empty log from persisted entries. Listeners are not notified.
	 */
	load(entries: Iterable<LogEntry>): void {
		if (this.log.length > 0) {
			throw new LedgerError(
				"Cannot load entries into a non-empty event log",
				"INVALID_SNAPSHOT",
			);
		}
		const loaded: LogEntry[] = [];
		for (const entry of entries) {
			const expected = loaded.length + 1;
			if (entry.sequence !== expected) {
				throw new LedgerError(
					`Event log is not contiguous: expected #${expected}, got #${entry.sequence}`,
					"INVALID_SNAPSHOT",
					{ expected, sequence: entry.sequence },
				);
			}
			loaded.push(Object.freeze({ ...entry }));
		}
		this.log.push(...loaded);
	}

	private notify(entry: LogEntry): void {
		for (const listener of Array.from(this.listeners)) {
			try {
				listener(entry);
			} catch (error) {
				this.onListenerError(error, entry);
			}
		}
	}
}
