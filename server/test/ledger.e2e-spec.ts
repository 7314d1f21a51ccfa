import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { cursorToString } from "../src/common/dto/envelopes";
import { LedgerJournalService } from "../src/ledger/ledger-journal.service";
import { act, createTestApp } from "./utils";

describe("Ledger API (push mode)", () => {
	let app: INestApplication;

	beforeAll(async () => {
		app = await createTestApp();
	});

	afterAll(async () => {
		await app.close();
	});

	it("requires a caller identity for mutations", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/ledger/deposit")
			.send({ amount: "10" })
			.expect(401);
		expect(res.body).toEqual({
			statusCode: 401,
			error: "Unauthorized",
			message: "Missing or malformed X-Caller-Identity header",
		});

		await act(app, "not valid", "deposit", "10").expect(401);
	});

	it("walks through deposit, borrow, repay and withdraw", async () => {
		const deposit = await act(app, "alice", "deposit", "150").expect(201);
		expect(deposit.body.data).toEqual({
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

		const borrow = await act(app, "alice", "borrow", "100").expect(201);
		expect(borrow.body.data.account.debt).toBe("100");
		expect(borrow.body.data.account.availableToBorrow).toBe("0");

		const overBorrow = await act(app, "alice", "borrow", "1").expect(409);
		expect(overBorrow.body).toEqual({
			statusCode: 409,
			error: "INSUFFICIENT_COLLATERAL",
			message: "Borrowing 1 would raise debt to 101, above the limit of 100",
		});

		const earlyWithdraw = await act(app, "alice", "withdraw", "1").expect(409);
		expect(earlyWithdraw.body.error).toBe("DEBT_OUTSTANDING");

		const repay = await act(app, "alice", "repay", "60").expect(201);
		expect(repay.body.data.account.debt).toBe("40");

		const overRepay = await act(app, "alice", "repay", "41").expect(409);
		expect(overRepay.body.error).toBe("OVER_REPAYMENT");

		await act(app, "alice", "repay", "40").expect(201);
		const withdraw = await act(app, "alice", "withdraw", "150").expect(201);
		expect(withdraw.body.data.account).toEqual({
			identity: "alice",
			collateral: "0",
			debt: "0",
			availableToBorrow: "0",
			pendingCredit: "0",
		});
	});

	it("rejects zero and malformed amounts", async () => {
		const zero = await act(app, "bob", "deposit", "0").expect(400);
		expect(zero.body).toEqual({
			statusCode: 400,
			error: "ZERO_AMOUNT",
			message: "Amount must be greater than zero",
		});

		const malformed = await act(app, "bob", "deposit", "-5").expect(400);
		expect(malformed.body.error).toBe("Bad Request");
		expect(malformed.body.message).toEqual([
			"amount must be a non-negative integer in decimal notation",
		]);

		await request(app.getHttpServer())
			.post("/api/v1/ledger/deposit")
			.set("X-Caller-Identity", "bob")
			.send({ amount: "5", identity: "alice" })
			.expect(400);
	});

	it("has nothing to claim in push mode", async () => {
		const res = await act(app, "bob", "claim").expect(409);
		expect(res.body.error).toBe("NOTHING_TO_CLAIM");
	});

	it("reads accounts", async () => {
		await act(app, "carol", "deposit", "300").expect(201);

		const me = await request(app.getHttpServer())
			.get("/api/v1/ledger/me")
			.set("X-Caller-Identity", "carol")
			.expect(200);
		expect(me.body.data.collateral).toBe("300");

		const available = await request(app.getHttpServer())
			.get("/api/v1/ledger/accounts/carol/available")
			.expect(200);
		expect(available.body).toEqual({ data: { availableToBorrow: "200" } });

		const unknown = await request(app.getHttpServer())
			.get("/api/v1/ledger/accounts/nobody")
			.expect(200);
		expect(unknown.body.data).toEqual({
			identity: "nobody",
			collateral: "0",
			debt: "0",
			availableToBorrow: "0",
			pendingCredit: "0",
		});
	});

	it("pages through events and persists them", async () => {
		const first = await request(app.getHttpServer())
			.get("/api/v1/ledger/events?limit=2")
			.expect(200);
		expect(first.body.data.map((e: { sequence: number }) => e.sequence)).toEqual(
			[1, 2],
		);
		const total: number = first.body.meta.total;
		expect(typeof first.body.meta.nextCursor).toBe("string");

		const rest = await request(app.getHttpServer())
			.get("/api/v1/ledger/events")
			.query({ limit: 100, cursor: first.body.meta.nextCursor })
			.expect(200);
		expect(rest.body.data).toHaveLength(total - 2);
		expect(rest.body.meta.nextCursor).toBeUndefined();

		await request(app.getHttpServer())
			.get("/api/v1/ledger/events?cursor=garbage")
			.expect(400);
		await request(app.getHttpServer())
			.get("/api/v1/ledger/events")
			.query({ cursor: cursorToString({ afterSequence: total + 1 }) })
			.expect(400);

		const journal = app.get(LedgerJournalService);
		await journal.flush();
		const snapshot = await journal.readSnapshot();
		expect(snapshot.entries).toHaveLength(total);
	});

	it("answers health checks", async () => {
		await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200, { status: "ok" });
	});
});

describe("Ledger API (pull mode)", () => {
	let app: INestApplication;

	beforeAll(async () => {
		process.env.LEDGER_TRANSFER_MODE = "pull";
		app = await createTestApp();
	});

	afterAll(async () => {
		delete process.env.LEDGER_TRANSFER_MODE;
		await app.close();
	});

	it("credits borrowed value until it is claimed", async () => {
		await act(app, "alice", "deposit", "300").expect(201);
		const borrow = await act(app, "alice", "borrow", "150").expect(201);
		expect(borrow.body.data.account.pendingCredit).toBe("150");

		const claim = await act(app, "alice", "claim").expect(201);
		expect(claim.body.data).toEqual({
			operation: "claim",
			identity: "alice",
			amount: "150",
			account: {
				identity: "alice",
				collateral: "300",
				debt: "150",
				availableToBorrow: "50",
				pendingCredit: "0",
			},
			entries: [
				{ sequence: 3, kind: "claimed", identity: "alice", amount: "150" },
			],
		});

		await act(app, "alice", "claim").expect(409);
	});
});
