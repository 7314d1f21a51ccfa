import type { ConfigService } from "@nestjs/config";
import {
	type Amount,
	DEFAULT_MAX_DEPTH,
	parseAmount,
	TRANSFER_MODES,
	type TransferMode,
} from "@collateral-ledger/ledger";

export type LedgerSettings = {
	transferMode: TransferMode;
	custodyReserves: Amount;
	custodyMaxDepth: number;
};

/**
 * Reads the ledger settings from the environment. Throws on values that
 * cannot be used so the app fails at startup instead of on first request.
 */
export function readLedgerSettings(config: ConfigService): LedgerSettings {
	const rawMode = config.get<string>("LEDGER_TRANSFER_MODE") ?? "push";
	const transferMode = TRANSFER_MODES.find((mode) => mode === rawMode);
	if (!transferMode) {
		throw new Error(
			`LEDGER_TRANSFER_MODE must be one of ${TRANSFER_MODES.join(", ")}, got "${rawMode}"`,
		);
	}

	const rawReserves = config.get<string>("LEDGER_CUSTODY_RESERVES") ?? "0";
	let custodyReserves: Amount;
	try {
		custodyReserves = parseAmount(rawReserves);
	} catch (cause) {
		throw new Error(
			`LEDGER_CUSTODY_RESERVES must be a non-negative integer, got "${rawReserves}"`,
			{ cause },
		);
	}

	const rawDepth =
		config.get<string>("LEDGER_CUSTODY_MAX_DEPTH") ?? `${DEFAULT_MAX_DEPTH}`;
	const custodyMaxDepth = Number(rawDepth);
	if (!/^[1-9][0-9]*$/.test(rawDepth) || !Number.isSafeInteger(custodyMaxDepth)) {
		throw new Error(
			`LEDGER_CUSTODY_MAX_DEPTH must be a positive integer, got "${rawDepth}"`,
		);
	}

	return { transferMode, custodyReserves, custodyMaxDepth };
}
