import {
	BadRequestException,
	Injectable,
	Logger,
	type OnModuleInit,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { randomUUID } from "node:crypto";
import {
	createTransferGate,
	EventLog,
	type Identity,
	isLedgerError,
	LedgerExecutor,
	type LedgerOperation,
	type LedgerReceipt,
	type LedgerSnapshot,
	type LogEntry,
	MemoryCustody,
	parseAmount,
	type TransferMode,
} from "@collateral-ledger/ledger";

import { LedgerJournalService } from "./ledger-journal.service";
import { readLedgerSettings } from "./ledger.config";
import type { AccountOutDto } from "./dto/account-out.dto";
import type { EventOutDto } from "./dto/event-out.dto";
import type { ReceiptOutDto } from "./dto/receipt-out.dto";
import { type Cursor, cursorToString } from "../common/dto/envelopes";
import {
	LEDGER_TRANSITION_ID,
	type LedgerTransition,
} from "../common/ledger.event";
import { describeError } from "../common/errors";

export const MAX_PAGE_SIZE = 100;

@Injectable()
export class LedgerService implements OnModuleInit {
	private readonly logger = new Logger(LedgerService.name);
	private readonly custody: MemoryCustody;
	private readonly executor: LedgerExecutor;

	constructor(
		config: ConfigService,
		private readonly journal: LedgerJournalService,
		private readonly events: EventEmitter2,
	) {
		const settings = readLedgerSettings(config);
		this.custody = new MemoryCustody({
			reserves: settings.custodyReserves,
			maxDepth: settings.custodyMaxDepth,
		});
		this.executor = new LedgerExecutor({
			gate: createTransferGate(settings.transferMode, this.custody),
			log: new EventLog({
				onListenerError: (error, entry) => {
					this.logger.error(
						`Listener failed on ledger event #${entry.sequence}`,
						describeError(error),
					);
				},
			}),
		});
	}

	async onModuleInit(): Promise<void> {
		const snapshot = await this.journal.readSnapshot();
		this.hydrate(snapshot);
		this.executor.events.subscribe((entry) => this.onCommitted(entry));
		this.logger.log(
			`Ledger ready in ${this.mode} mode with ${snapshot.accounts.length} accounts and ${snapshot.entries.length} events`,
		);
	}

	get mode(): TransferMode {
		return this.executor.mode;
	}

	deposit(identity: Identity, amount: string): ReceiptOutDto {
		return this.execute({ kind: "deposit", identity, amount: parseAmount(amount) });
	}

	borrow(identity: Identity, amount: string): ReceiptOutDto {
		return this.execute({ kind: "borrow", identity, amount: parseAmount(amount) });
	}

	repay(identity: Identity, amount: string): ReceiptOutDto {
		return this.execute({ kind: "repay", identity, amount: parseAmount(amount) });
	}

	withdraw(identity: Identity, amount: string): ReceiptOutDto {
		return this.execute({
			kind: "withdraw",
			identity,
			amount: parseAmount(amount),
		});
	}

	claim(identity: Identity): ReceiptOutDto {
		return this.execute({ kind: "claim", identity });
	}

	getAccount(identity: Identity): AccountOutDto {
		const account = this.executor.account(identity);
		return {
			identity,
			collateral: account.collateral.toString(),
			debt: account.debt.toString(),
			availableToBorrow: this.executor.availableToBorrow(identity).toString(),
			pendingCredit: this.executor.pendingCredit(identity).toString(),
		};
	}

	availableToBorrow(identity: Identity): string {
		return this.executor.availableToBorrow(identity).toString();
	}

	/** Sequence of the newest committed event, 0 while the log is empty. */
	get headSequence(): number {
		return this.executor.events.length;
	}

	listEvents(
		limit: number,
		cursor: Cursor,
	): { items: EventOutDto[]; total: number; nextCursor?: string } {
		if (limit < 1 || limit > MAX_PAGE_SIZE) {
			throw new BadRequestException(
				`limit must be between 1 and ${MAX_PAGE_SIZE}`,
			);
		}
		const page = this.executor.events.since(cursor.afterSequence, limit);
		const total = this.headSequence;
		const last = page.at(-1);
		const nextCursor =
			last && last.sequence < total
				? cursorToString({ afterSequence: last.sequence })
				: undefined;
		return { items: page.map(toEventDto), total, nextCursor };
	}

	private execute(operation: LedgerOperation): ReceiptOutDto {
		let receipt: LedgerReceipt;
		try {
			receipt = this.executor.apply(operation);
		} catch (e) {
			if (isLedgerError(e)) {
				this.logger.warn(
					`${operation.kind} rejected for ${operation.identity}: ${e.code} ${e.message}`,
				);
			}
			throw e;
		}
		this.logger.log(
			`${operation.kind} of ${receipt.amount} committed for ${operation.identity}`,
		);
		return {
			operation: receipt.kind,
			identity: receipt.identity,
			amount: receipt.amount.toString(),
			account: this.getAccount(receipt.identity),
			entries: receipt.entries.map(toEventDto),
		};
	}

	private hydrate(snapshot: LedgerSnapshot): void {
		this.executor.load(snapshot);
		// custody holds what the restored accounts and credits account for
		for (const [identity, account] of snapshot.accounts) {
			const held =
				account.collateral -
				account.debt +
				this.executor.pendingCredit(identity);
			if (held > 0n) {
				this.custody.receive(identity, held);
			}
		}
	}

	private onCommitted(entry: LogEntry): void {
		this.journal.record({
			entry,
			account: this.executor.account(entry.identity),
			pendingCredit: this.executor.pendingCredit(entry.identity),
		});
		this.events.emit(LEDGER_TRANSITION_ID, {
			eventId: randomUUID(),
			sequence: entry.sequence,
			kind: entry.kind,
			identity: entry.identity,
			amount: entry.amount.toString(),
			createdAt: new Date().toISOString(),
		} satisfies LedgerTransition);
	}
}

function toEventDto(entry: LogEntry): EventOutDto {
	return {
		sequence: entry.sequence,
		kind: entry.kind,
		identity: entry.identity,
		amount: entry.amount.toString(),
	};
}
