/**
 * Collateral Ledger
 *
 * Deterministic collateralized-lending ledger: deposit collateral, borrow
 * against it at a 150% collateralization ratio, repay, withdraw.
 *
 * @example
 * ```typescript
 * import {
 *   LedgerExecutor,
 *   MemoryCustody,
 *   createTransferGate,
 * } from "@collateral-ledger/ledger";
 *
 * const custody = new MemoryCustody();
 * const ledger = new LedgerExecutor({
 *   gate: createTransferGate("pull", custody),
 * });
 *
 * ledger.deposit("alice", 300n);
 * ledger.borrow("alice", 150n); // credited, not sent
 * ledger.claim("alice"); // value leaves custody here
 * ```
 */

// Core - Types, errors, amounts, journal
export {
	// Types
	type Identity,
	type Amount,
	type Account,
	type LedgerEventKind,
	type LedgerEvent,
	type LogEntry,
	type LedgerOperation,
	type LedgerOperationKind,
	type LedgerReceipt,
	type LedgerSnapshot,
	type LedgerErrorCode,
	type JournalRun,
	// Classes
	LedgerError,
	Journal,
	// Utilities
	UINT256_MAX,
	LEDGER_EVENT_KINDS,
	isLedgerError,
	isLedgerEventKind,
	emptyAccount,
	isValidIdentity,
	isAmount,
	assertAmount,
	parseAmount,
	addAmounts,
	subAmounts,
} from "./core/index.js";

// Policy - Collateralization math
export {
	COLLATERAL_RATIO,
	RATIO_DENOMINATOR,
	maxBorrow,
	availableToBorrow,
	requiredCollateral,
	isCollateralized,
} from "./policy/index.js";

// Store - Account balances
export { AccountStore, type AccountReader } from "./store/index.js";

// Events - Append-only log
export {
	EventLog,
	type EventLogOptions,
	type LogListener,
} from "./events/index.js";

// Transfer - Custody and gates
export {
	type TransferMode,
	type CustodyMovement,
	type TransferResult,
	type RecipientHook,
	type ValueCustody,
	type ValueTransferGate,
	type MemoryCustodyOptions,
	TRANSFER_MODES,
	DEFAULT_MAX_DEPTH,
	MemoryCustody,
	PushTransferGate,
	PullCreditGate,
	createTransferGate,
} from "./transfer/index.js";

// Executor - State transitions
export {
	LedgerExecutor,
	type LedgerExecutorOptions,
} from "./executor/index.js";
