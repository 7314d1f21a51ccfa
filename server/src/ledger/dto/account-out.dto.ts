import { ApiProperty } from "@nestjs/swagger";

export class AccountOutDto {
	@ApiProperty({ example: "alice" })
	identity!: string;

	@ApiProperty({ example: "150", description: "Deposited collateral" })
	collateral!: string;

	@ApiProperty({ example: "100", description: "Outstanding debt" })
	debt!: string;

	@ApiProperty({
		example: "0",
		description: "How much more can be borrowed right now",
	})
	availableToBorrow!: string;

	@ApiProperty({
		example: "0",
		description: "Value credited and not yet claimed (pull mode)",
	})
	pendingCredit!: string;
}
