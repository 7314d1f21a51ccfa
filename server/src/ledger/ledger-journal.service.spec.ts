import { Logger } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { TypeOrmModule } from "@nestjs/typeorm";
import {
	createTransferGate,
	LedgerExecutor,
	MemoryCustody,
} from "@collateral-ledger/ledger";
import { EntityManager } from "typeorm";
import { LedgerAccount } from "./ledger-account.entity";
import { LedgerEntry } from "./ledger-entry.entity";
import {
	type JournalChange,
	LedgerJournalService,
} from "./ledger-journal.service";

describe("LedgerJournalService", () => {
	let moduleRef: TestingModule;
	let journal: LedgerJournalService;

	beforeEach(async () => {
		moduleRef = await Test.createTestingModule({
			imports: [
				TypeOrmModule.forRoot({
					type: "better-sqlite3",
					database: ":memory:",
					synchronize: true,
					entities: [LedgerAccount, LedgerEntry],
				}),
				TypeOrmModule.forFeature([LedgerAccount, LedgerEntry]),
			],
			providers: [LedgerJournalService],
		}).compile();
		journal = moduleRef.get(LedgerJournalService);
	});

	afterEach(async () => {
		jest.restoreAllMocks();
		await moduleRef.close();
	});

	it("reads an empty snapshot from a fresh database", async () => {
		await expect(journal.readSnapshot()).resolves.toEqual({
			accounts: [],
			credits: [],
			entries: [],
		});
	});

	it("writes entries and keeps the latest account state", async () => {
		journal.record({
			entry: { sequence: 1, kind: "deposited", identity: "alice", amount: 150n },
			account: { collateral: 150n, debt: 0n },
			pendingCredit: 0n,
		});
		journal.record({
			entry: { sequence: 2, kind: "borrowed", identity: "alice", amount: 100n },
			account: { collateral: 150n, debt: 100n },
			pendingCredit: 0n,
		});
		journal.record({
			entry: { sequence: 3, kind: "withdrawn", identity: "bob", amount: 40n },
			account: { collateral: 60n, debt: 0n },
			pendingCredit: 40n,
		});
		await journal.flush();

		await expect(journal.readSnapshot()).resolves.toEqual({
			accounts: [
				["alice", { collateral: 150n, debt: 100n }],
				["bob", { collateral: 60n, debt: 0n }],
			],
			credits: [["bob", 40n]],
			entries: [
				{ sequence: 1, kind: "deposited", identity: "alice", amount: 150n },
				{ sequence: 2, kind: "borrowed", identity: "alice", amount: 100n },
				{ sequence: 3, kind: "withdrawn", identity: "bob", amount: 40n },
			],
		});
	});

	describe("when a write fails", () => {
		const deposit = (sequence: number, collateral: bigint): JournalChange => ({
			entry: { sequence, kind: "deposited", identity: "alice", amount: 10n },
			account: { collateral, debt: 0n },
			pendingCredit: 0n,
		});

		beforeEach(async () => {
			jest.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
			jest.spyOn(Logger.prototype, "error").mockImplementation(() => undefined);
			journal.record(deposit(1, 10n));
			await journal.flush();
		});

		it("retries the change before writing later ones", async () => {
			jest
				.spyOn(EntityManager.prototype, "insert")
				.mockRejectedValueOnce(new Error("database is locked"));

			journal.record(deposit(2, 20n));
			journal.record(deposit(3, 30n));
			await journal.flush();

			expect(Logger.prototype.warn).toHaveBeenCalledWith(
				"Retrying ledger event #2 (attempt 2 of 3)",
			);
			expect(journal.haltedAt).toBeUndefined();
			const snapshot = await journal.readSnapshot();
			expect(snapshot.entries.map((entry) => entry.sequence)).toEqual([1, 2, 3]);
			expect(snapshot.accounts).toEqual([
				["alice", { collateral: 30n, debt: 0n }],
			]);
		});

		it("halts instead of leaving a gap in the stored log", async () => {
			const insert = jest
				.spyOn(EntityManager.prototype, "insert")
				.mockRejectedValue(new Error("disk I/O error"));

			journal.record(deposit(2, 20n));
			journal.record(deposit(3, 30n));
			await journal.flush();
			expect(insert).toHaveBeenCalledTimes(3);

			insert.mockRestore();
			journal.record(deposit(4, 40n));
			await journal.flush();

			expect(Logger.prototype.error).toHaveBeenCalledTimes(1);
			expect(Logger.prototype.error).toHaveBeenCalledWith(
				"Failed to persist ledger event #2 after 3 attempts; journal halted",
				expect.any(String),
			);
			expect(journal.haltedAt).toBe(2);

			const snapshot = await journal.readSnapshot();
			expect(snapshot.entries.map((entry) => entry.sequence)).toEqual([1]);
			expect(snapshot.accounts).toEqual([
				["alice", { collateral: 10n, debt: 0n }],
			]);
			const restored = new LedgerExecutor({
				gate: createTransferGate("push", new MemoryCustody()),
			});
			restored.load(snapshot);
			expect(restored.account("alice")).toEqual({ collateral: 10n, debt: 0n });
		});
	});
});
