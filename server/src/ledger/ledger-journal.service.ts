import {
	Injectable,
	Logger,
	type OnApplicationShutdown,
} from "@nestjs/common";
import { InjectDataSource, InjectRepository } from "@nestjs/typeorm";
import type { DataSource, Repository } from "typeorm";
import {
	type Account,
	type Amount,
	type Identity,
	isLedgerEventKind,
	LedgerError,
	type LedgerSnapshot,
	type LogEntry,
	parseAmount,
} from "@collateral-ledger/ledger";

import { LedgerAccount } from "./ledger-account.entity";
import { LedgerEntry } from "./ledger-entry.entity";
import { describeError } from "../common/errors";

const MAX_WRITE_ATTEMPTS = 3;
const RETRY_DELAY_MS = 20;

/**
 * A committed log entry together with the state it left its account in.
 */
export type JournalChange = {
	entry: LogEntry;
	account: Account;
	pendingCredit: Amount;
};

/**
 * Write-behind persistence for the in-memory ledger. Changes are written in
 * commit order, one transaction per entry.
 */
@Injectable()
export class LedgerJournalService implements OnApplicationShutdown {
	private readonly logger = new Logger(LedgerJournalService.name);
	private queue: Promise<void> = Promise.resolve();
	private failedSequence: number | undefined;

	constructor(
		@InjectRepository(LedgerAccount)
		private readonly accounts: Repository<LedgerAccount>,
		@InjectRepository(LedgerEntry)
		private readonly entries: Repository<LedgerEntry>,
		@InjectDataSource()
		private readonly dataSource: DataSource,
	) {}

	async readSnapshot(): Promise<LedgerSnapshot> {
		const [accountRows, entryRows] = await Promise.all([
			this.accounts.find({ order: { identity: "ASC" } }),
			this.entries.find({ order: { sequence: "ASC" } }),
		]);

		return {
			accounts: accountRows.map((row): [Identity, Account] => [
				row.identity,
				{
					collateral: parseAmount(row.collateral),
					debt: parseAmount(row.debt),
				},
			]),
			credits: accountRows
				.filter((row) => row.pendingCredit !== "0")
				.map((row): [Identity, Amount] => [
					row.identity,
					parseAmount(row.pendingCredit),
				]),
			entries: entryRows.map((row): LogEntry => {
				if (!isLedgerEventKind(row.kind)) {
					throw new LedgerError(
						`Stored event #${row.sequence} has unknown kind ${row.kind}`,
						"INVALID_SNAPSHOT",
						{ sequence: row.sequence },
					);
				}
				return {
					sequence: row.sequence,
					kind: row.kind,
					identity: row.identity,
					amount: parseAmount(row.amount),
				};
			}),
		};
	}

	/**
	 * Queue a change for persistence. A write that keeps failing halts the
	 * journal: later changes are dropped so the stored log stays a gap-free
	 * prefix of the in-memory one. The in-memory ledger stays authoritative.
	 */
	record(change: JournalChange): void {
		this.queue = this.queue.then(() => this.write(change));
	}

	/** Sequence of the first change that could not be written, if any. */
	get haltedAt(): number | undefined {
		return this.failedSequence;
	}

	/** Resolves once every queued change has been written. */
	flush(): Promise<void> {
		return this.queue;
	}

	async onApplicationShutdown(): Promise<void> {
		await this.flush();
	}

	private async write(change: JournalChange): Promise<void> {
		const { sequence } = change.entry;
		if (this.failedSequence !== undefined) {
			return;
		}
		for (let attempt = 1; ; attempt++) {
			try {
				await this.persist(change);
				return;
			} catch (error) {
				if (attempt >= MAX_WRITE_ATTEMPTS) {
					this.failedSequence = sequence;
					this.logger.error(
						`Failed to persist ledger event #${sequence} after ${attempt} attempts; journal halted`,
						describeError(error),
					);
					return;
				}
				this.logger.warn(
					`Retrying ledger event #${sequence} (attempt ${attempt + 1} of ${MAX_WRITE_ATTEMPTS})`,
				);
				await new Promise<void>((resolve) => {
					setTimeout(resolve, RETRY_DELAY_MS * attempt);
				});
			}
		}
	}

	private async persist({
		entry,
		account,
		pendingCredit,
	}: JournalChange): Promise<void> {
		await this.dataSource.transaction(async (manager) => {
			await manager.upsert(
				LedgerAccount,
				{
					identity: entry.identity,
					collateral: account.collateral.toString(),
					debt: account.debt.toString(),
					pendingCredit: pendingCredit.toString(),
				},
				["identity"],
			);
			await manager.insert(LedgerEntry, {
				sequence: entry.sequence,
				kind: entry.kind,
				identity: entry.identity,
				amount: entry.amount.toString(),
			});
		});
	}
}
