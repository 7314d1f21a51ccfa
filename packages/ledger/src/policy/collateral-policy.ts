/**
 * Collateral Policy
 *
 * Pure functions relating collateral to the debt it can secure at a fixed
 * collateralization ratio of 150%.
 */

import { assertAmount } from "../core/amount.js";
import { Account, Amount, LedgerError } from "../core/types.js";

/** Collateralization ratio, in percent. */
export const COLLATERAL_RATIO = 150n;

/** Denominator the ratio is expressed against. */
export const RATIO_DENOMINATOR = 100n;

/**
 * Maximum debt a collateral amount can secure: floor(collateral * 100 / 150).
 *
 * @example
 * ```typescript
 * maxBorrow(150n); // 100n
 * maxBorrow(1n);   // 0n
 * ```
 */
export function maxBorrow(collateral: Amount): Amount {
	assertAmount(collateral, "collateral");
	return (collateral * RATIO_DENOMINATOR) / COLLATERAL_RATIO;
}

/**
 * Remaining borrowing capacity.
 *
 * @throws LedgerError UNDERFLOW when `debt` already exceeds the cap, which
 * means the ledger invariant was broken upstream.
 */
export function availableToBorrow(collateral: Amount, debt: Amount): Amount {
	assertAmount(debt, "debt");
	const cap = maxBorrow(collateral);
	if (debt > cap) {
		throw new LedgerError(
			`Debt ${debt} exceeds the borrowing cap ${cap}`,
			"UNDERFLOW",
			{ collateral: collateral.toString(), debt: debt.toString() },
		);
	}
	return cap - debt;
}

/**
 * Smallest collateral that secures `debt`: ceil(debt * 150 / 100).
 */
export function requiredCollateral(debt: Amount): Amount {
	assertAmount(debt, "debt");
	const scaled = debt * COLLATERAL_RATIO;
	return (scaled + RATIO_DENOMINATOR - 1n) / RATIO_DENOMINATOR;
}

/**
 * Whether an account satisfies the collateralization invariant.
 */
export function isCollateralized(account: Account): boolean {
	return (
		account.collateral >= 0n &&
		account.debt >= 0n &&
		account.debt <= maxBorrow(account.collateral)
	);
}
