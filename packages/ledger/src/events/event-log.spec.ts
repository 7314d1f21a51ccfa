import { LedgerError, LogEntry } from "../core/types.js";
import { EventLog } from "./event-log.js";

describe("EventLog", () => {
	it("numbers entries in append order and freezes them", () => {
		const log = new EventLog();
		const [first, second] = log.append(
			{ kind: "deposited", identity: "alice", amount: 150n },
			{ kind: "borrowed", identity: "alice", amount: 100n },
		);

		expect(first).toEqual({
			sequence: 1,
			kind: "deposited",
			identity: "alice",
			amount: 150n,
		});
		expect(second.sequence).toBe(2);
		expect(Object.isFrozen(first)).toBe(true);
		expect(log.length).toBe(2);
		expect(log.last()).toEqual(second);
	});

	it("hands out copies of the entry list", () => {
		const log = new EventLog();
		log.append({ kind: "deposited", identity: "alice", amount: 1n });
		log.entries().pop();
		expect(log.length).toBe(1);
	});

	it("pages with since()", () => {
		const log = new EventLog();
		for (let i = 1; i <= 5; i++) {
			log.append({ kind: "deposited", identity: "alice", amount: BigInt(i) });
		}
		expect(log.since(0, 2).map((e) => e.sequence)).toEqual([1, 2]);
		expect(log.since(2, 2).map((e) => e.sequence)).toEqual([3, 4]);
		expect(log.since(4).map((e) => e.sequence)).toEqual([5]);
		expect(log.since(5)).toEqual([]);
	});

	it("notifies listeners after the whole batch is appended", () => {
		const log = new EventLog();
		const seen: Array<[number, number]> = [];
		log.subscribe((entry) => seen.push([entry.sequence, log.length]));

		log.append(
			{ kind: "borrowed", identity: "bob", amount: 5n },
			{ kind: "borrowed", identity: "alice", amount: 7n },
		);

		expect(seen).toEqual([
			[1, 2],
			[2, 2],
		]);
	});

	it("stops notifying after unsubscribe", () => {
		const log = new EventLog();
		const listener = jest.fn();
		const unsubscribe = log.subscribe(listener);
		log.append({ kind: "deposited", identity: "alice", amount: 1n });
		unsubscribe();
		log.append({ kind: "deposited", identity: "alice", amount: 2n });
		expect(listener).toHaveBeenCalledTimes(1);
	});

	it("isolates failing listeners", () => {
		const onListenerError = jest.fn();
		const log = new EventLog({ onListenerError });
		const healthy = jest.fn();
		log.subscribe(() => {
			throw new Error("listener down");
		});
		log.subscribe(healthy);

		const [entry] = log.append({
			kind: "repaid",
			identity: "alice",
			amount: 3n,
		});

		expect(healthy).toHaveBeenCalledWith(entry);
		expect(onListenerError).toHaveBeenCalledWith(
			new Error("listener down"),
			entry,
		);
		expect(log.length).toBe(1);
	});

	describe("load", () => {
		const persisted: LogEntry[] = [
			{ sequence: 1, kind: "deposited", identity: "alice", amount: 150n },
			{ sequence: 2, kind: "borrowed", identity: "alice", amount: 100n },
		];

		it("restores contiguous entries and continues numbering", () => {
			const log = new EventLog();
			log.load(persisted);
			const [next] = log.append({
				kind: "repaid",
				identity: "alice",
				amount: 10n,
			});
			expect(next.sequence).toBe(3);
		});

		it("rejects gaps", () => {
			const log = new EventLog();
			expect(() => log.load([persisted[1]])).toThrow(LedgerError);
			expect(log.length).toBe(0);
		});

		it("rejects loading into a used log", () => {
			const log = new EventLog();
			log.append({ kind: "deposited", identity: "alice", amount: 1n });
			expect(() => log.load(persisted)).toThrow(LedgerError);
		});
	});
});
