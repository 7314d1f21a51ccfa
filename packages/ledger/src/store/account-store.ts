/**
 * In-Memory Account Store
 *
 * Sparse mapping from identity to account. Unknown identities read as a
 * zero account; an entry is created by the first committed write and is
 * never deleted afterwards.
 *
 * Reads hand out copies so no caller can hold a mutable alias to a stored
 * account. Only the transition executor writes.
 */

import { Account, Identity, emptyAccount } from "../core/types.js";

/**
 * Read-only view of the store.
 */
export interface AccountReader {
	/** Number of accounts ever written */
	readonly size: number;
	/** Copy of the account, or a zero account when none exists */
	get(identity: Identity): Account;
	/** Whether the identity has an account entry */
	has(identity: Identity): boolean;
	/** All identities with an entry, in insertion order */
	identities(): Identity[];
	/** Copies of all entries, in insertion order */
	entries(): Array<[Identity, Account]>;
}

export class AccountStore implements AccountReader {
	private readonly accounts: Map<Identity, Account> = new Map();

	get size(): number {
		return this.accounts.size;
	}

	get(identity: Identity): Account {
		const account = this.accounts.get(identity);
		return account ? { ...account } : emptyAccount();
	}

	has(identity: Identity): boolean {
		return this.accounts.has(identity);
	}

	identities(): Identity[] {
		return Array.from(this.accounts.keys());
	}

	entries(): Array<[Identity, Account]> {
		return Array.from(this.accounts, ([identity, account]) => [
			identity,
			{ ...account },
		]);
	}

	/**
	 * Replace an account.
	 *
	 * @returns The previous value, or undefined when the entry is new
	 */
	write(identity: Identity, next: Account): Account | undefined {
		const previous = this.accounts.get(identity);
		this.accounts.set(identity, {
			collateral: next.collateral,
			debt: next.debt,
		});
		return previous ? { ...previous } : undefined;
	}

	/**
	 * Put back a value returned by {@link write}. Passing undefined removes
	 * an entry the reverted write had created.
	 */
	revert(identity: Identity, previous: Account | undefined): void {
		if (previous) {
			this.accounts.set(identity, { ...previous });
		} else {
			this.accounts.delete(identity);
		}
	}

	/**
	 * Fill an empty store from persisted entries.
	 */
	load(entries: Iterable<[Identity, Account]>): void {
		if (this.accounts.size > 0) {
			throw new Error("Cannot load into a non-empty account store");
		}
		for (const [identity, account] of entries) {
			this.accounts.set(identity, { ...account });
		}
	}
}
