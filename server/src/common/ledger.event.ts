import type { LedgerEventKind } from "@collateral-ledger/ledger";

export const LEDGER_TRANSITION_ID = "ledger.transition";
export type LedgerTransition = {
	eventId: string;
	sequence: number;
	kind: LedgerEventKind;
	identity: string;
	amount: string; // decimal
	createdAt: string; // ISO timestamp
};
