import { ApiProperty } from "@nestjs/swagger";
import { IsString, Matches, MaxLength } from "class-validator";

export class AmountInDto {
	@ApiProperty({
		example: "150",
		description: "Amount in the smallest unit, as a decimal string",
	})
	@IsString()
	@MaxLength(78)
	@Matches(/^(0|[1-9][0-9]*)$/, {
		message: "amount must be a non-negative integer in decimal notation",
	})
	amount!: string;
}
