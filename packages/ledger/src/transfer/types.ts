/**
 * Value transfer types
 *
 * Contracts between the ledger, its transfer gate and the custody layer that
 * actually holds the underlying asset.
 */

import { Journal } from "../core/journal.js";
import { Amount, Identity } from "../core/types.js";

/**
 * How outbound value leaves the ledger.
 *
 * - push: bookkeeping is applied, then value is sent in the same transition
 * - pull: bookkeeping is applied and the amount is credited; the recipient
 *   claims it in a separate transition
 */
export type TransferMode = "push" | "pull";

export const TRANSFER_MODES: readonly TransferMode[] = ["push", "pull"];

/**
 * A completed movement of value in or out of custody.
 */
export interface CustodyMovement {
	direction: "in" | "out";
	identity: Identity;
	amount: Amount;
}

export type TransferResult =
	| { ok: true; movement: CustodyMovement }
	| { ok: false; reason: string; cause?: unknown };

/**
 * Called when a recipient is sent value. It may call back into the ledger.
 * Returning `false` or throwing rejects the transfer.
 */
export type RecipientHook = (amount: Amount) => boolean | void;

/**
 * Custody layer that holds and moves the underlying asset.
 */
export interface ValueCustody {
	/** Reserves currently held */
	balance(): Amount;

	/** Record value handed to the ledger by `from` */
	receive(from: Identity, amount: Amount): CustodyMovement;

	/**
	 * Deliver value to a recipient. A failed send leaves custody unchanged.
	 */
	send(to: Identity, amount: Amount): TransferResult;

	/**
	 * Undo a movement that belongs to a reverted transition.
	 */
	reverse(movement: CustodyMovement): void;
}

/**
 * Moves value across the ledger boundary on behalf of the executor.
 *
 * The executor always applies its bookkeeping before calling `release` or
 * `claim`; mutations made here are recorded in the journal so that a failed
 * transition undoes them.
 */
export interface ValueTransferGate {
	readonly mode: TransferMode;

	/** Take custody of inbound value (deposit, repay) */
	accept(from: Identity, amount: Amount, journal: Journal): void;

	/**
	 * Move value out to `to` (borrow, withdraw).
	 *
	 * @throws LedgerError TRANSFER_FAILED when value cannot be delivered
	 */
	release(to: Identity, amount: Amount, journal: Journal): void;

	/** Credit waiting to be claimed by `identity` */
	pendingOf(identity: Identity): Amount;

	/**
	 * Deliver all pending credit of `to`.
	 *
	 * @returns The amount delivered
	 * @throws LedgerError NOTHING_TO_CLAIM or TRANSFER_FAILED
	 */
	claim(to: Identity, journal: Journal): Amount;

	/** All non-zero pending credits */
	credits(): Array<[Identity, Amount]>;

	/** Fill pending credits of an unused gate from persisted values */
	loadCredits(entries: Iterable<[Identity, Amount]>): void;
}
