/**
 * Executor module - State transitions
 */

export {
	LedgerExecutor,
	type LedgerExecutorOptions,
} from "./ledger-executor.js";
