/**
 * Amount helpers
 *
 * Checked arithmetic over the unsigned 256-bit amount domain. Results that
 * leave the domain are rejected, never wrapped.
 */

import { Amount, LedgerError, UINT256_MAX } from "./types.js";

const DECIMAL = /^(0|[1-9][0-9]*)$/;

export function isAmount(value: unknown): value is Amount {
	return typeof value === "bigint" && value >= 0n && value <= UINT256_MAX;
}

/**
 * Throws INVALID_AMOUNT unless `value` lies in [0, UINT256_MAX].
 */
export function assertAmount(
	value: unknown,
	field = "amount",
): asserts value is Amount {
	if (!isAmount(value)) {
		throw new LedgerError(
			`Invalid ${field}: expected an integer between 0 and 2^256-1`,
			"INVALID_AMOUNT",
			{ field, value: String(value) },
		);
	}
}

/**
 * Parse a decimal string (or safe integer) into an amount.
 */
export function parseAmount(value: string | number | bigint): Amount {
	let parsed: bigint;
	if (typeof value === "bigint") {
		parsed = value;
	} else if (typeof value === "number") {
		if (!Number.isSafeInteger(value)) {
			throw new LedgerError(
				`Invalid amount: ${value} is not a safe integer`,
				"INVALID_AMOUNT",
				{ value: String(value) },
			);
		}
		parsed = BigInt(value);
	} else {
		if (!DECIMAL.test(value)) {
			throw new LedgerError(
				`Invalid amount: "${value}" is not a decimal integer`,
				"INVALID_AMOUNT",
				{ value },
			);
		}
		parsed = BigInt(value);
	}
	assertAmount(parsed);
	return parsed;
}

export function addAmounts(a: Amount, b: Amount): Amount {
	const sum = a + b;
	if (sum > UINT256_MAX) {
		throw new LedgerError(
			"Amount overflow: result exceeds 2^256-1",
			"OVERFLOW",
			{ a: a.toString(), b: b.toString() },
		);
	}
	return sum;
}

export function subAmounts(a: Amount, b: Amount): Amount {
	if (b > a) {
		throw new LedgerError(
			`Amount underflow: ${a} - ${b}`,
			"UNDERFLOW",
			{ a: a.toString(), b: b.toString() },
		);
	}
	return a - b;
}
