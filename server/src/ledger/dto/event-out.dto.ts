import { ApiProperty } from "@nestjs/swagger";
import {
	LEDGER_EVENT_KINDS,
	type LedgerEventKind,
} from "@collateral-ledger/ledger";

export class EventOutDto {
	@ApiProperty({ example: 1, description: "Position in the event log" })
	sequence!: number;

	@ApiProperty({ enum: [...LEDGER_EVENT_KINDS] })
	kind!: LedgerEventKind;

	@ApiProperty({ example: "alice" })
	identity!: string;

	@ApiProperty({ example: "150" })
	amount!: string;
}
