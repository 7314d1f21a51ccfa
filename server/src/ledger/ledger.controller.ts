import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadGatewayResponse,
	ApiBadRequestResponse,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { map, type Observable } from "rxjs";

import { CallerGuard } from "../caller/caller.guard";
import { Caller } from "../caller/caller.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	type Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import type { LedgerTransition } from "../common/ledger.event";
import {
	ServerSentEventsService,
	type SseEvent,
} from "../common/server-sent-events.service";
import { AccountOutDto } from "./dto/account-out.dto";
import { AmountInDto } from "./dto/amount-in.dto";
import { EventOutDto } from "./dto/event-out.dto";
import { ReceiptOutDto } from "./dto/receipt-out.dto";
import { LedgerService } from "./ledger.service";
import { ParseEventCursorPipe } from "./event-cursor.pipe";

const callerHeader = ApiHeader({
	name: "X-Caller-Identity",
	required: true,
	description: "Identity of the account owner making the call",
});

@ApiTags("Ledger")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	AccountOutDto,
	EventOutDto,
	ReceiptOutDto,
)
@Controller("api/v1/ledger")
export class LedgerController {
	constructor(
		private readonly ledger: LedgerService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("deposit")
	@callerHeader
	@UseGuards(CallerGuard)
	@ApiOperation({ summary: "Deposit collateral" })
	@ApiBody({ type: AmountInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(ReceiptOutDto) })
	@ApiBadRequestResponse({ description: "Zero or malformed amount" })
	@ApiUnauthorizedResponse({ description: "Missing caller identity" })
	@ApiConflictResponse({ description: "Collateral would overflow" })
	deposit(
		@Caller() caller: string,
		@Body() dto: AmountInDto,
	): ApiEnvelope<ReceiptOutDto> {
		return envelope(this.ledger.deposit(caller, dto.amount));
	}

	@Post("borrow")
	@callerHeader
	@UseGuards(CallerGuard)
	@ApiOperation({ summary: "Borrow against deposited collateral" })
	@ApiBody({ type: AmountInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(ReceiptOutDto) })
	@ApiBadRequestResponse({ description: "Zero or malformed amount" })
	@ApiUnauthorizedResponse({ description: "Missing caller identity" })
	@ApiConflictResponse({ description: "Not enough collateral" })
	@ApiBadGatewayResponse({ description: "Outbound transfer failed" })
	borrow(
		@Caller() caller: string,
		@Body() dto: AmountInDto,
	): ApiEnvelope<ReceiptOutDto> {
		return envelope(this.ledger.borrow(caller, dto.amount));
	}

	@Post("repay")
	@callerHeader
	@UseGuards(CallerGuard)
	@ApiOperation({ summary: "Repay outstanding debt" })
	@ApiBody({ type: AmountInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(ReceiptOutDto) })
	@ApiBadRequestResponse({ description: "Zero or malformed amount" })
	@ApiUnauthorizedResponse({ description: "Missing caller identity" })
	@ApiConflictResponse({ description: "No debt, or more than the debt" })
	repay(
		@Caller() caller: string,
		@Body() dto: AmountInDto,
	): ApiEnvelope<ReceiptOutDto> {
		return envelope(this.ledger.repay(caller, dto.amount));
	}

	@Post("withdraw")
	@callerHeader
	@UseGuards(CallerGuard)
	@ApiOperation({ summary: "Withdraw collateral once all debt is repaid" })
	@ApiBody({ type: AmountInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(ReceiptOutDto) })
	@ApiBadRequestResponse({ description: "Zero or malformed amount" })
	@ApiUnauthorizedResponse({ description: "Missing caller identity" })
	@ApiConflictResponse({ description: "Debt outstanding or not enough collateral" })
	@ApiBadGatewayResponse({ description: "Outbound transfer failed" })
	withdraw(
		@Caller() caller: string,
		@Body() dto: AmountInDto,
	): ApiEnvelope<ReceiptOutDto> {
		return envelope(this.ledger.withdraw(caller, dto.amount));
	}

	@Post("claim")
	@callerHeader
	@UseGuards(CallerGuard)
	@ApiOperation({ summary: "Claim pending credit (pull mode)" })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(ReceiptOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing caller identity" })
	@ApiConflictResponse({ description: "Nothing to claim" })
	@ApiBadGatewayResponse({ description: "Outbound transfer failed" })
	claim(@Caller() caller: string): ApiEnvelope<ReceiptOutDto> {
		return envelope(this.ledger.claim(caller));
	}

	@Get("me")
	@callerHeader
	@UseGuards(CallerGuard)
	@ApiOperation({ summary: "The caller's account" })
	@ApiOkResponse({ schema: getSchemaPathForDto(AccountOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing caller identity" })
	me(@Caller() caller: string): ApiEnvelope<AccountOutDto> {
		return envelope(this.ledger.getAccount(caller));
	}

	@Get("accounts/:identity")
	@ApiOperation({ summary: "Any account; unknown identities read as zero" })
	@ApiParam({ name: "identity" })
	@ApiOkResponse({ schema: getSchemaPathForDto(AccountOutDto) })
	account(@Param("identity") identity: string): ApiEnvelope<AccountOutDto> {
		return envelope(this.ledger.getAccount(identity));
	}

	@Get("accounts/:identity/available")
	@ApiOperation({ summary: "How much the identity can still borrow" })
	@ApiParam({ name: "identity" })
	@ApiOkResponse({
		schema: {
			properties: {
				data: {
					properties: { availableToBorrow: { type: "string", example: "100" } },
				},
			},
		},
	})
	available(
		@Param("identity") identity: string,
	): ApiEnvelope<{ availableToBorrow: string }> {
		return envelope({
			availableToBorrow: this.ledger.availableToBorrow(identity),
		});
	}

	@Get("events")
	@ApiOperation({ summary: "Committed events in log order" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1–100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(EventOutDto) })
	events(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseEventCursorPipe) cursor: Cursor,
	): ApiEnvelope<EventOutDto[]> {
		const { items, total, nextCursor } = this.ledger.listEvents(limit, cursor);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Sse("events/sse")
	@ApiOperation({ summary: "Live stream of committed events" })
	@ApiQuery({ name: "identity", required: false })
	sse(
		@Query("identity") identity?: string,
	): Observable<SseEvent<LedgerTransition>> {
		return this.sseService.ledgerEvents(identity).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}
}
