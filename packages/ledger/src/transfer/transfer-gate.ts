/**
 * Value Transfer Gates
 *
 * Two strategies for moving value out of the ledger without exposing stale
 * state to the recipient:
 *
 * - {@link PushTransferGate}: sends in the same transition, after the
 *   executor has applied its bookkeeping.
 * - {@link PullCreditGate}: credits the recipient; no external call happens
 *   inside a mutating transition until the recipient claims.
 */

import { addAmounts } from "../core/amount.js";
import { Journal } from "../core/journal.js";
import { Amount, Identity, LedgerError } from "../core/types.js";
import { TransferMode, ValueCustody, ValueTransferGate } from "./types.js";

abstract class CustodyGate implements ValueTransferGate {
	abstract readonly mode: TransferMode;

	constructor(protected readonly custody: ValueCustody) {}

	accept(from: Identity, amount: Amount, journal: Journal): void {
		const movement = this.custody.receive(from, amount);
		journal.record(() => this.custody.reverse(movement));
	}

	abstract release(to: Identity, amount: Amount, journal: Journal): void;
	abstract pendingOf(identity: Identity): Amount;
	abstract claim(to: Identity, journal: Journal): Amount;
	abstract credits(): Array<[Identity, Amount]>;
	abstract loadCredits(entries: Iterable<[Identity, Amount]>): void;

	/**
	 * Send through custody, journaling the delivery so that a failing outer
	 * transition reverses it.
	 */
	protected deliver(to: Identity, amount: Amount, journal: Journal): void {
		const result = this.custody.send(to, amount);
		if (!result.ok) {
			throw new LedgerError(
				`Transfer of ${amount} to ${to} failed: ${result.reason}`,
				"TRANSFER_FAILED",
				{ identity: to, amount: amount.toString(), reason: result.reason },
				{ cause: result.cause },
			);
		}
		const { movement } = result;
		journal.record(() => this.custody.reverse(movement));
	}
}

export class PushTransferGate extends CustodyGate {
	readonly mode = "push";

	release(to: Identity, amount: Amount, journal: Journal): void {
		this.deliver(to, amount, journal);
	}

	pendingOf(_identity: Identity): Amount {
		return 0n;
	}

	claim(to: Identity, _journal: Journal): Amount {
		throw new LedgerError(
			"Nothing to claim: value is delivered when it is released",
			"NOTHING_TO_CLAIM",
			{ identity: to, mode: this.mode },
		);
	}

	credits(): Array<[Identity, Amount]> {
		return [];
	}

	loadCredits(entries: Iterable<[Identity, Amount]>): void {
		for (const [identity, amount] of entries) {
			if (amount > 0n) {
				throw new LedgerError(
					`Pending credit for ${identity} cannot be held in push mode`,
					"INVALID_SNAPSHOT",
					{ identity, amount: amount.toString() },
				);
			}
		}
	}
}

export class PullCreditGate extends CustodyGate {
	readonly mode = "pull";
	private readonly pending: Map<Identity, Amount> = new Map();

	release(to: Identity, amount: Amount, journal: Journal): void {
		this.setPending(to, addAmounts(this.pendingOf(to), amount), journal);
	}

	pendingOf(identity: Identity): Amount {
		return this.pending.get(identity) ?? 0n;
	}

	claim(to: Identity, journal: Journal): Amount {
		const amount = this.pendingOf(to);
		if (amount === 0n) {
			throw new LedgerError(
				`Nothing to claim for ${to}`,
				"NOTHING_TO_CLAIM",
				{ identity: to, mode: this.mode },
			);
		}
		// credit is cleared before the external call
		this.setPending(to, 0n, journal);
		this.deliver(to, amount, journal);
		return amount;
	}

	credits(): Array<[Identity, Amount]> {
		return Array.from(this.pending.entries());
	}

	loadCredits(entries: Iterable<[Identity, Amount]>): void {
		if (this.pending.size > 0) {
			throw new LedgerError(
				"Cannot load credits into a gate that already holds some",
				"INVALID_SNAPSHOT",
			);
		}
		for (const [identity, amount] of entries) {
			if (amount > 0n) {
				this.pending.set(identity, amount);
			}
		}
	}

	private setPending(identity: Identity, next: Amount, journal: Journal): void {
		const previous = this.pending.get(identity);
		this.write(identity, next);
		journal.record(() => this.write(identity, previous ?? 0n));
	}

	private write(identity: Identity, amount: Amount): void {
		if (amount === 0n) {
			this.pending.delete(identity);
		} else {
			this.pending.set(identity, amount);
		}
	}
}

/**
 * Build the gate for a transfer mode.
 */
export function createTransferGate(
	mode: TransferMode,
	custody: ValueCustody,
): ValueTransferGate {
	switch (mode) {
		case "push":
			return new PushTransferGate(custody);
		case "pull":
			return new PullCreditGate(custody);
		default: {
			const unknownMode: never = mode;
			throw new Error(`Unknown transfer mode: ${String(unknownMode)}`);
		}
	}
}
