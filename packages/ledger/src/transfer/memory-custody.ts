/**
 * In-Memory Custody
 *
 * Reference custody layer that keeps reserves in memory and lets tests and
 * hosts attach recipient hooks. A hook runs while the send is in flight, so
 * it can reenter the ledger exactly like a recipient contract would.
 *
 * @example
 * ```typescript
 * const custody = new MemoryCustody({ reserves: 1_000n });
 * custody.onReceive("alice", (amount) => {
 *   // runs inside the outbound transfer
 *   return amount < 500n;
 * });
 * ```
 */

import { Amount, Identity, LedgerError } from "../core/types.js";
import {
	CustodyMovement,
	RecipientHook,
	TransferResult,
	ValueCustody,
} from "./types.js";

export interface MemoryCustodyOptions {
	/** Initial reserves (default 0) */
	reserves?: Amount;
	/** Maximum number of sends in flight at once (default 8) */
	maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 8;

export class MemoryCustody implements ValueCustody {
	private reserves: Amount;
	private depth = 0;
	private readonly maxDepth: number;
	private readonly delivered: Map<Identity, Amount> = new Map();
	private readonly hooks: Map<Identity, RecipientHook> = new Map();

	constructor(options: MemoryCustodyOptions = {}) {
		this.reserves = options.reserves ?? 0n;
		this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
		if (this.reserves < 0n) {
			throw new LedgerError(
				"Custody reserves cannot be negative",
				"INVALID_AMOUNT",
				{ reserves: this.reserves.toString() },
			);
		}
		if (!Number.isInteger(this.maxDepth) || this.maxDepth < 1) {
			throw new Error(
				`maxDepth must be a positive integer, got ${this.maxDepth}`,
			);
		}
	}

	balance(): Amount {
		return this.reserves;
	}

	/**
	 * Total value delivered to a recipient so far.
	 */
	deliveredTo(identity: Identity): Amount {
		return this.delivered.get(identity) ?? 0n;
	}

	/**
	 * Attach a hook for value sent to `identity`.
	 *
	 * @returns Function that detaches the hook
	 */
	onReceive(identity: Identity, hook: RecipientHook): () => void {
		this.hooks.set(identity, hook);
		return () => {
			if (this.hooks.get(identity) === hook) {
				this.hooks.delete(identity);
			}
		};
	}

	receive(from: Identity, amount: Amount): CustodyMovement {
		this.reserves += amount;
		return { direction: "in", identity: from, amount };
	}

	send(to: Identity, amount: Amount): TransferResult {
		if (this.depth >= this.maxDepth) {
			return { ok: false, reason: "call depth exceeded" };
		}
		if (amount > this.reserves) {
			return { ok: false, reason: "insufficient custody" };
		}

		const movement: CustodyMovement = {
			direction: "out",
			identity: to,
			amount,
		};
		this.applyOut(movement);

		const hook = this.hooks.get(to);
		if (!hook) {
			return { ok: true, movement };
		}

		this.depth++;
		let accepted: boolean | void;
		try {
			accepted = hook(amount);
		} catch (cause) {
			this.reverse(movement);
			return { ok: false, reason: "recipient threw", cause };
		} finally {
			this.depth--;
		}

		if (accepted === false) {
			this.reverse(movement);
			return { ok: false, reason: "recipient rejected" };
		}
		return { ok: true, movement };
	}

	reverse(movement: CustodyMovement): void {
		if (movement.direction === "in") {
			if (movement.amount > this.reserves) {
				throw new LedgerError(
					"Cannot reverse an inbound movement larger than the reserves",
					"UNDERFLOW",
					{ identity: movement.identity, amount: movement.amount.toString() },
				);
			}
			this.reserves -= movement.amount;
			return;
		}
		this.reserves += movement.amount;
		const delivered = this.deliveredTo(movement.identity) - movement.amount;
		if (delivered > 0n) {
			this.delivered.set(movement.identity, delivered);
		} else {
			this.delivered.delete(movement.identity);
		}
	}

	private applyOut(movement: CustodyMovement): void {
		this.reserves -= movement.amount;
		this.delivered.set(
			movement.identity,
			this.deliveredTo(movement.identity) + movement.amount,
		);
	}
}
