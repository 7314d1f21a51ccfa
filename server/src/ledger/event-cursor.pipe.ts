import {
	BadRequestException,
	Injectable,
	type PipeTransform,
} from "@nestjs/common";

import { LedgerService } from "./ledger.service";
import {
	type Cursor,
	cursorFromString,
	emptyCursor,
} from "../common/dto/envelopes";

/**
 * Decodes an event-log cursor and checks it against the live log, so a page
 * can never start after the newest committed event.
 */
@Injectable()
export class ParseEventCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	constructor(private readonly ledger: LedgerService) {}

	transform(value: string | undefined): Cursor {
		if (!value) {
			return emptyCursor;
		}
		let cursor: Cursor;
		try {
			cursor = cursorFromString(value);
		} catch (error) {
			throw new BadRequestException("Invalid cursor", { cause: error });
		}
		const head = this.ledger.headSequence;
		if (cursor.afterSequence > head) {
			throw new BadRequestException(
				`Cursor #${cursor.afterSequence} is past the last event #${head}`,
			);
		}
		return cursor;
	}
}
