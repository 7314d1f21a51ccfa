/**
 * Core types for the collateral ledger
 *
 * Accounts, events and operations shared by every layer of the ledger.
 * Amounts are unsigned 256-bit integers carried as `bigint`.
 */

/**
 * Opaque, externally supplied account key (an address-equivalent).
 */
export type Identity = string;

/**
 * Unsigned integer amount in the smallest unit of the collateral asset.
 */
export type Amount = bigint;

/** Largest representable amount (2^256 - 1). */
export const UINT256_MAX: Amount = (1n << 256n) - 1n;

/**
 * Per-identity balances.
 *
 * Invariant after every committed transition:
 * `debt <= collateral * 100 / COLLATERAL_RATIO` (floor division).
 */
export interface Account {
	/** Deposited collateral */
	collateral: Amount;
	/** Borrowed and not yet repaid */
	debt: Amount;
}

/**
 * Kinds of committed transitions recorded in the event log.
 */
export type LedgerEventKind =
	| "deposited"
	| "borrowed"
	| "repaid"
	| "withdrawn"
	| "claimed"; // pull-credit mode only

export const LEDGER_EVENT_KINDS: readonly LedgerEventKind[] = [
	"deposited",
	"borrowed",
	"repaid",
	"withdrawn",
	"claimed",
];

export function isLedgerEventKind(value: unknown): value is LedgerEventKind {
	return LEDGER_EVENT_KINDS.some((kind) => kind === value);
}

/**
 * Immutable record of a committed transition.
 */
export interface LedgerEvent {
	kind: LedgerEventKind;
	identity: Identity;
	amount: Amount;
}

/**
 * A ledger event once appended, numbered in commit order starting at 1.
 */
export interface LogEntry extends LedgerEvent {
	sequence: number;
}

/**
 * Closed set of state transitions the executor accepts.
 */
export type LedgerOperation =
	| { kind: "deposit"; identity: Identity; amount: Amount }
	| { kind: "borrow"; identity: Identity; amount: Amount }
	| { kind: "repay"; identity: Identity; amount: Amount }
	| { kind: "withdraw"; identity: Identity; amount: Amount }
	| { kind: "claim"; identity: Identity };

export type LedgerOperationKind = LedgerOperation["kind"];

/**
 * Outcome of a successful transition.
 */
export interface LedgerReceipt {
	kind: LedgerOperationKind;
	identity: Identity;
	/** Amount moved by the transition (the claimed amount for `claim`) */
	amount: Amount;
	/** The caller's account after the transition */
	account: Account;
	/**
	 * Entries appended to the log by this call. Empty for a transition
	 * nested inside another one: its events are appended when the
	 * outermost transition commits.
	 */
	entries: readonly LogEntry[];
}

/**
 * Complete ledger state, used to persist and hydrate an executor.
 */
export interface LedgerSnapshot {
	accounts: Array<[Identity, Account]>;
	credits: Array<[Identity, Amount]>;
	entries: LogEntry[];
}

export type LedgerErrorCode =
	| "ZERO_AMOUNT"
	| "INVALID_AMOUNT"
	| "INVALID_IDENTITY"
	| "INSUFFICIENT_COLLATERAL"
	| "NO_OUTSTANDING_DEBT"
	| "OVER_REPAYMENT"
	| "DEBT_OUTSTANDING"
	| "INSUFFICIENT_BALANCE"
	| "TRANSFER_FAILED"
	| "NOTHING_TO_CLAIM"
	| "OVERFLOW"
	| "UNDERFLOW" // internal consistency, unreachable on a consistent ledger
	| "INVALID_SNAPSHOT";

/**
 * Error thrown by ledger operations.
 *
 * Every precondition failure is raised before any state changes.
 */
export class LedgerError extends Error {
	constructor(
		message: string,
		public readonly code: LedgerErrorCode,
		public readonly details?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "LedgerError";
	}
}

export function isLedgerError(
	error: unknown,
	code?: LedgerErrorCode,
): error is LedgerError {
	return (
		error instanceof LedgerError && (code === undefined || error.code === code)
	);
}

export function emptyAccount(): Account {
	return { collateral: 0n, debt: 0n };
}

export function isValidIdentity(identity: unknown): identity is Identity {
	return typeof identity === "string" && identity.trim().length > 0;
}
