import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";

export async function createTestApp(): Promise<INestApplication> {
	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = configureApp(moduleFixture.createNestApplication());
	await app.init();
	return app;
}

/** POST a ledger operation as `caller`. */
export function act(
	app: INestApplication,
	caller: string,
	operation: "deposit" | "borrow" | "repay" | "withdraw" | "claim",
	amount?: string,
) {
	const req = request(app.getHttpServer())
		.post(`/api/v1/ledger/${operation}`)
		.set("X-Caller-Identity", caller);
	return amount === undefined ? req.send() : req.send({ amount });
}
