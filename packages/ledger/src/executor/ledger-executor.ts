/**
 * Ledger Executor
 *
 * The only component that mutates account balances. Every transition:
 *
 * 1. validates all preconditions against the current state,
 * 2. applies its bookkeeping to the store,
 * 3. only then interacts with the transfer gate,
 * 4. appends its events once the outermost transition has committed.
 *
 * Any failure, including a failed outbound transfer, reverts every effect
 * of the transition through the journal and appends nothing.
 *
 * @example
 * ```typescript
 * const custody = new MemoryCustody();
 * const ledger = new LedgerExecutor({
 *   gate: createTransferGate("push", custody),
 * });
 *
 * ledger.deposit("alice", 150n);
 * ledger.borrow("alice", 100n);
 * ledger.availableToBorrow("alice"); // 0n
 * ```
 */

import { addAmounts, assertAmount } from "../core/amount.js";
import { Journal } from "../core/journal.js";
import {
	Account,
	Amount,
	Identity,
	LedgerError,
	LedgerOperation,
	LedgerOperationKind,
	LedgerReceipt,
	LedgerSnapshot,
	isValidIdentity,
} from "../core/types.js";
import { EventLog } from "../events/event-log.js";
import {
	availableToBorrow,
	isCollateralized,
	maxBorrow,
} from "../policy/collateral-policy.js";
import { AccountReader, AccountStore } from "../store/account-store.js";
import { TransferMode, ValueTransferGate } from "../transfer/types.js";

export interface LedgerExecutorOptions {
	/** Gate used for inbound and outbound value */
	gate: ValueTransferGate;
	/** Event log to append to (a fresh one by default) */
	log?: EventLog;
}

export class LedgerExecutor {
	readonly events: EventLog;
	private readonly store: AccountStore = new AccountStore();
	private readonly journal: Journal = new Journal();
	private readonly gate: ValueTransferGate;

	constructor(options: LedgerExecutorOptions) {
		this.gate = options.gate;
		this.events = options.log ?? new EventLog();
	}

	// ==================== Queries ====================

	/**
	 * Read-only view of all accounts.
	 */
	get accounts(): AccountReader {
		return this.store;
	}

	get mode(): TransferMode {
		return this.gate.mode;
	}

	/**
	 * Whether a transition is currently executing (i.e. this is a reentrant call).
	 */
	get inTransition(): boolean {
		return this.journal.depth > 0;
	}

	account(identity: Identity): Account {
		return this.store.get(identity);
	}

	availableToBorrow(identity: Identity): Amount {
		const account = this.store.get(identity);
		return availableToBorrow(account.collateral, account.debt);
	}

	pendingCredit(identity: Identity): Amount {
		return this.gate.pendingOf(identity);
	}

	snapshot(): LedgerSnapshot {
		return {
			accounts: this.store.entries(),
			credits: this.gate.credits(),
			entries: this.events.entries(),
		};
	}

	// ==================== Transitions ====================

	/**
	 * Dispatch a tagged operation.
	 */
	apply(operation: LedgerOperation): LedgerReceipt {
		switch (operation.kind) {
			case "deposit":
				return this.deposit(operation.identity, operation.amount);
			case "borrow":
				return this.borrow(operation.identity, operation.amount);
			case "repay":
				return this.repay(operation.identity, operation.amount);
			case "withdraw":
				return this.withdraw(operation.identity, operation.amount);
			case "claim":
				return this.claim(operation.identity);
			default: {
				const unknown: never = operation;
				throw new Error(`Unknown operation: ${JSON.stringify(unknown)}`);
			}
		}
	}

	/**
	 * Add collateral. The caller has already handed `amount` to the ledger.
	 */
	deposit(identity: Identity, amount: Amount): LedgerReceipt {
		return this.transition("deposit", identity, () => {
			requirePositive(amount);
			const account = this.store.get(identity);
			const collateral = addAmounts(account.collateral, amount);

			this.write(identity, { ...account, collateral });
			this.gate.accept(identity, amount, this.journal);
			this.journal.emit({ kind: "deposited", identity, amount });
			return amount;
		});
	}

	/**
	 * Take on debt against collateral and receive the borrowed value.
	 */
	borrow(identity: Identity, amount: Amount): LedgerReceipt {
		return this.transition("borrow", identity, () => {
			requirePositive(amount);
			const account = this.store.get(identity);
			const debt = account.debt + amount;
			const limit = maxBorrow(account.collateral);
			if (debt > limit) {
				throw new LedgerError(
					`Borrowing ${amount} would raise debt to ${debt}, above the limit of ${limit}`,
					"INSUFFICIENT_COLLATERAL",
					{
						identity,
						amount: amount.toString(),
						debt: account.debt.toString(),
						limit: limit.toString(),
					},
				);
			}

			// debt is recorded before any value leaves
			this.write(identity, { ...account, debt });
			this.gate.release(identity, amount, this.journal);
			this.journal.emit({ kind: "borrowed", identity, amount });
			return amount;
		});
	}

	/**
	 * Pay back part or all of the outstanding debt.
	 */
	repay(identity: Identity, amount: Amount): LedgerReceipt {
		return this.transition("repay", identity, () => {
			requirePositive(amount);
			const account = this.store.get(identity);
			if (account.debt === 0n) {
				throw new LedgerError(
					`${identity} has no outstanding debt`,
					"NO_OUTSTANDING_DEBT",
					{ identity },
				);
			}
			if (amount > account.debt) {
				throw new LedgerError(
					`Repayment of ${amount} exceeds the outstanding debt of ${account.debt}`,
					"OVER_REPAYMENT",
					{
						identity,
						amount: amount.toString(),
						debt: account.debt.toString(),
					},
				);
			}

			this.write(identity, { ...account, debt: account.debt - amount });
			this.gate.accept(identity, amount, this.journal);
			this.journal.emit({ kind: "repaid", identity, amount });
			return amount;
		});
	}

	/**
	 * Take collateral back. Only allowed once all debt is repaid.
	 */
	withdraw(identity: Identity, amount: Amount): LedgerReceipt {
		return this.transition("withdraw", identity, () => {
			requirePositive(amount);
			const account = this.store.get(identity);
			if (account.debt !== 0n) {
				throw new LedgerError(
					`${identity} still owes ${account.debt}`,
					"DEBT_OUTSTANDING",
					{ identity, debt: account.debt.toString() },
				);
			}
			if (amount > account.collateral) {
				throw new LedgerError(
					`Withdrawal of ${amount} exceeds the collateral of ${account.collateral}`,
					"INSUFFICIENT_BALANCE",
					{
						identity,
						amount: amount.toString(),
						collateral: account.collateral.toString(),
					},
				);
			}

			// collateral is reduced before any value leaves
			this.write(identity, {
				...account,
				collateral: account.collateral - amount,
			});
			this.gate.release(identity, amount, this.journal);
			this.journal.emit({ kind: "withdrawn", identity, amount });
			return amount;
		});
	}

	/**
	 * Pull all pending credit (pull-credit mode).
	 */
	claim(identity: Identity): LedgerReceipt {
		return this.transition("claim", identity, () => {
			const amount = this.gate.claim(identity, this.journal);
			this.journal.emit({ kind: "claimed", identity, amount });
			return amount;
		});
	}

	// ==================== Hydration ====================

	/**
	 * Fill an unused executor from a snapshot taken earlier.
	 *
	 * @throws LedgerError INVALID_SNAPSHOT if the executor already holds
	 * state, or if any account breaks the collateralization invariant
	 */
	load(snapshot: LedgerSnapshot): void {
		if (
			this.inTransition ||
			this.store.size > 0 ||
			this.events.length > 0 ||
			this.gate.credits().length > 0
		) {
			throw new LedgerError(
				"Cannot load a snapshot into a ledger that holds state",
				"INVALID_SNAPSHOT",
			);
		}
		for (const [identity, account] of snapshot.accounts) {
			assertAmount(account.collateral, "collateral");
			assertAmount(account.debt, "debt");
			if (!isCollateralized(account)) {
				throw new LedgerError(
					`Snapshot account ${identity} is under-collateralized`,
					"INVALID_SNAPSHOT",
					{
						identity,
						collateral: account.collateral.toString(),
						debt: account.debt.toString(),
					},
				);
			}
		}
		for (const [identity, amount] of snapshot.credits) {
			assertAmount(amount, "credit");
			if (this.gate.mode === "push" && amount > 0n) {
				throw new LedgerError(
					`Pending credit for ${identity} cannot be held in push mode`,
					"INVALID_SNAPSHOT",
					{ identity, amount: amount.toString() },
				);
			}
		}

		this.events.load(snapshot.entries);
		this.gate.loadCredits(snapshot.credits);
		this.store.load(snapshot.accounts);
	}

	// ==================== Internals ====================

	private transition(
		kind: LedgerOperationKind,
		identity: Identity,
		body: () => Amount,
	): LedgerReceipt {
		if (!isValidIdentity(identity)) {
			throw new LedgerError(
				"Identity must be a non-empty string",
				"INVALID_IDENTITY",
				{ identity: String(identity) },
			);
		}
		const { result, committed } = this.journal.run(body);
		const entries =
			committed.length > 0 ? this.events.append(...committed) : [];
		return {
			kind,
			identity,
			amount: result,
			account: this.store.get(identity),
			entries,
		};
	}

	private write(identity: Identity, next: Account): void {
		const previous = this.store.write(identity, next);
		this.journal.record(() => this.store.revert(identity, previous));
	}
}

function requirePositive(amount: Amount): void {
	assertAmount(amount);
	if (amount === 0n) {
		throw new LedgerError("Amount must be greater than zero", "ZERO_AMOUNT");
	}
}
