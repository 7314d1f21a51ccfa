import { ApiProperty } from "@nestjs/swagger";
import type { LedgerOperationKind } from "@collateral-ledger/ledger";
import { AccountOutDto } from "./account-out.dto";
import { EventOutDto } from "./event-out.dto";

export class ReceiptOutDto {
	@ApiProperty({ enum: ["deposit", "borrow", "repay", "withdraw", "claim"] })
	operation!: LedgerOperationKind;

	@ApiProperty({ example: "alice" })
	identity!: string;

	@ApiProperty({ example: "150", description: "Amount moved" })
	amount!: string;

	@ApiProperty({ type: AccountOutDto, description: "Account after the call" })
	account!: AccountOutDto;

	@ApiProperty({
		type: [EventOutDto],
		description: "Events appended by the call, in commit order",
	})
	entries!: EventOutDto[];
}
