/**
 * Transfer module - Moving value across the ledger boundary
 *
 * Defines the custody contract, the push and pull-credit gates, and an
 * in-memory custody reference implementation.
 */

// Types
export type {
	TransferMode,
	CustodyMovement,
	TransferResult,
	RecipientHook,
	ValueCustody,
	ValueTransferGate,
} from "./types.js";

export { TRANSFER_MODES } from "./types.js";

// Gates
export {
	PushTransferGate,
	PullCreditGate,
	createTransferGate,
} from "./transfer-gate.js";

// Reference implementations
export {
	MemoryCustody,
	DEFAULT_MAX_DEPTH,
	type MemoryCustodyOptions,
} from "./memory-custody.js";
