import { type Type } from "@nestjs/common";
import {
	ApiProperty,
	ApiPropertyOptional,
	getSchemaPath,
} from "@nestjs/swagger";

export type ApiPaginatedMeta = {
	total: number;
	nextCursor?: string;
};

export type ApiEnvelope<T> = {
	data: T;
	meta?: ApiPaginatedMeta;
};

export class ApiPaginatedMetaDto {
	@ApiProperty({ description: "Total number of items" })
	total!: number;

	@ApiPropertyOptional({
		description: "Pass as `cursor` to fetch the next page",
	})
	nextCursor?: string;
}

export class ApiEnvelopeShellDto<T> {
	data!: T;

	@ApiPropertyOptional({ type: ApiPaginatedMetaDto })
	meta?: ApiPaginatedMetaDto;
}

export function envelope<T>(data: T): ApiEnvelope<T> {
	return { data };
}

export function paginatedEnvelope<T>(
	items: T[],
	meta: ApiPaginatedMeta,
): ApiEnvelope<T[]> {
	return { data: items, meta };
}

export function getSchemaPathForDto(dto: Type<unknown>) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{ properties: { data: { $ref: getSchemaPath(dto) } } },
		],
	};
}

export function getSchemaPathForPaginatedDto(dto: Type<unknown>) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				properties: {
					data: { type: "array", items: { $ref: getSchemaPath(dto) } },
					meta: { $ref: getSchemaPath(ApiPaginatedMetaDto) },
				},
			},
		],
	};
}

/**
 * Position in the event log: everything after `afterSequence`.
 */
export type Cursor = {
	afterSequence: number;
};

export const emptyCursor: Cursor = { afterSequence: 0 };

export function cursorToString(cursor: Cursor): string {
	return Buffer.from(JSON.stringify({ s: cursor.afterSequence })).toString(
		"base64url",
	);
}

export function cursorFromString(value: string): Cursor {
	const decoded: unknown = JSON.parse(
		Buffer.from(value, "base64url").toString("utf8"),
	);
	if (
		typeof decoded !== "object" ||
		decoded === null ||
		!("s" in decoded) ||
		typeof decoded.s !== "number" ||
		!Number.isSafeInteger(decoded.s) ||
		decoded.s < 0
	) {
		throw new Error(`Malformed cursor: ${value}`);
	}
	return { afterSequence: decoded.s };
}
