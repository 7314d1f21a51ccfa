/**
 * Core module - Ledger primitives
 *
 * Account and event types, the error taxonomy, checked amount arithmetic
 * and the transition journal.
 */

// Types
export type {
	Identity,
	Amount,
	Account,
	LedgerEventKind,
	LedgerEvent,
	LogEntry,
	LedgerOperation,
	LedgerOperationKind,
	LedgerReceipt,
	LedgerSnapshot,
	LedgerErrorCode,
} from "./types.js";

export {
	UINT256_MAX,
	LEDGER_EVENT_KINDS,
	LedgerError,
	isLedgerError,
	isLedgerEventKind,
	emptyAccount,
	isValidIdentity,
} from "./types.js";

// Amounts
export {
	isAmount,
	assertAmount,
	parseAmount,
	addAmounts,
	subAmounts,
} from "./amount.js";

// Journal
export { Journal, type JournalRun } from "./journal.js";
