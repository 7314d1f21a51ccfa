import { BadRequestException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { Test } from "@nestjs/testing";
import { LedgerError, type LedgerSnapshot } from "@collateral-ledger/ledger";
import { LedgerService } from "./ledger.service";
import { LedgerJournalService } from "./ledger-journal.service";
import { LEDGER_TRANSITION_ID } from "../common/ledger.event";
import {
	cursorFromString,
	cursorToString,
	emptyCursor,
} from "../common/dto/envelopes";

const emptySnapshot: LedgerSnapshot = { accounts: [], credits: [], entries: [] };

function codeOf(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (error) {
		if (error instanceof LedgerError) return error.code;
		throw error;
	}
	return undefined;
}

describe("LedgerService", () => {
	const mockJournal = {
		readSnapshot: jest.fn(),
		record: jest.fn(),
	};
	const mockEventEmitter = { emit: jest.fn() };
	let settings: Record<string, string>;

	async function createService(
		snapshot: LedgerSnapshot = emptySnapshot,
	): Promise<LedgerService> {
		mockJournal.readSnapshot.mockResolvedValue(snapshot);
		const moduleRef = await Test.createTestingModule({
			providers: [LedgerService],
		})
			.useMocker((token) => {
				if (token === LedgerJournalService) {
					return mockJournal;
				}
				if (token === ConfigService) {
					return new ConfigService(settings);
				}
				if (token === EventEmitter2) {
					return mockEventEmitter;
				}
			})
			.compile();
		await moduleRef.init();
		return moduleRef.get(LedgerService);
	}

	beforeEach(() => {
		jest.clearAllMocks();
		settings = {};
	});

	describe("operations", () => {
		it("returns a receipt with the account after the call", async () => {
			const service = await createService();

			expect(service.deposit("alice", "150")).toEqual({
				operation: "deposit",
				identity: "alice",
				amount: "150",
				account: {
					identity: "alice",
					collateral: "150",
					debt: "0",
					availableToBorrow: "100",
					pendingCredit: "0",
				},
				entries: [
					{ sequence: 1, kind: "deposited", identity: "alice", amount: "150" },
				],
			});
		});

		it("journals and broadcasts every committed entry", async () => {
			const service = await createService();
			service.deposit("alice", "150");
			service.borrow("alice", "100");

			expect(mockJournal.record).toHaveBeenCalledTimes(2);
			expect(mockJournal.record).toHaveBeenNthCalledWith(2, {
				entry: { sequence: 2, kind: "borrowed", identity: "alice", amount: 100n },
				account: { collateral: 150n, debt: 100n },
				pendingCredit: 0n,
			});
			expect(mockEventEmitter.emit).toHaveBeenCalledWith(
				LEDGER_TRANSITION_ID,
				expect.objectContaining({
					sequence: 1,
					kind: "deposited",
					identity: "alice",
					amount: "150",
				}),
			);
		});

		it("rejects without journaling", async () => {
			const service = await createService();
			service.deposit("alice", "150");
			service.borrow("alice", "100");

			expect(codeOf(() => service.borrow("alice", "1"))).toBe(
				"INSUFFICIENT_COLLATERAL",
			);
			expect(codeOf(() => service.withdraw("alice", "1"))).toBe(
				"DEBT_OUTSTANDING",
			);
			expect(mockJournal.record).toHaveBeenCalledTimes(2);
		});

		it("rejects malformed amounts", async () => {
			const service = await createService();
			expect(codeOf(() => service.deposit("alice", "1.5"))).toBe(
				"INVALID_AMOUNT",
			);
			expect(codeOf(() => service.repay("alice", "0"))).toBe("ZERO_AMOUNT");
		});

		it("has nothing to claim in push mode", async () => {
			const service = await createService();
			expect(service.mode).toBe("push");
			expect(codeOf(() => service.claim("alice"))).toBe("NOTHING_TO_CLAIM");
		});
	});

	describe("hydration", () => {
		const persisted: LedgerSnapshot = {
			accounts: [["alice", { collateral: 300n, debt: 120n }]],
			credits: [["alice", 120n]],
			entries: [
				{ sequence: 1, kind: "deposited", identity: "alice", amount: 300n },
				{ sequence: 2, kind: "borrowed", identity: "alice", amount: 120n },
			],
		};

		it("restores accounts, credits and custody", async () => {
			settings = { LEDGER_TRANSFER_MODE: "pull" };
			const service = await createService(persisted);

			expect(service.getAccount("alice")).toEqual({
				identity: "alice",
				collateral: "300",
				debt: "120",
				availableToBorrow: "80",
				pendingCredit: "120",
			});

			const receipt = service.claim("alice");
			expect(receipt.amount).toBe("120");
			expect(receipt.entries).toEqual([
				{ sequence: 3, kind: "claimed", identity: "alice", amount: "120" },
			]);
		});

		it("refuses an under-collateralized snapshot", async () => {
			await expect(
				createService({
					accounts: [["alice", { collateral: 150n, debt: 101n }]],
					credits: [],
					entries: [],
				}),
			).rejects.toThrow(LedgerError);
		});

		it("refuses pending credit in push mode", async () => {
			await expect(createService(persisted)).rejects.toThrow(LedgerError);
		});
	});

	describe("listEvents", () => {
		it("pages through the log with cursors", async () => {
			const service = await createService();
			service.deposit("alice", "1");
			service.deposit("bob", "2");
			service.deposit("alice", "3");

			const first = service.listEvents(2, emptyCursor);
			expect(first.items.map((item) => item.sequence)).toEqual([1, 2]);
			expect(first.total).toBe(3);
			expect(first.nextCursor).toBe(cursorToString({ afterSequence: 2 }));

			const second = service.listEvents(
				2,
				cursorFromString(first.nextCursor ?? ""),
			);
			expect(second.items).toEqual([
				{ sequence: 3, kind: "deposited", identity: "alice", amount: "3" },
			]);
			expect(second.nextCursor).toBeUndefined();
		});

		it("bounds the page size", async () => {
			const service = await createService();
			expect(() => service.listEvents(0, emptyCursor)).toThrow(
				BadRequestException,
			);
			expect(() => service.listEvents(101, emptyCursor)).toThrow(
				BadRequestException,
			);
		});
	});
});
