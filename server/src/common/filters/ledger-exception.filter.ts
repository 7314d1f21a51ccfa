import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { LedgerError, type LedgerErrorCode } from "@collateral-ledger/ledger";
import { describeError } from "../errors";

export type ErrorBody = {
	statusCode: number;
	error: string;
	message: string | string[];
};

const STATUS_BY_CODE: Record<LedgerErrorCode, HttpStatus> = {
	ZERO_AMOUNT: HttpStatus.BAD_REQUEST,
	INVALID_AMOUNT: HttpStatus.BAD_REQUEST,
	INVALID_IDENTITY: HttpStatus.BAD_REQUEST,
	INSUFFICIENT_COLLATERAL: HttpStatus.CONFLICT,
	NO_OUTSTANDING_DEBT: HttpStatus.CONFLICT,
	OVER_REPAYMENT: HttpStatus.CONFLICT,
	DEBT_OUTSTANDING: HttpStatus.CONFLICT,
	INSUFFICIENT_BALANCE: HttpStatus.CONFLICT,
	NOTHING_TO_CLAIM: HttpStatus.CONFLICT,
	OVERFLOW: HttpStatus.CONFLICT,
	TRANSFER_FAILED: HttpStatus.BAD_GATEWAY,
	UNDERFLOW: HttpStatus.INTERNAL_SERVER_ERROR,
	INVALID_SNAPSHOT: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function statusForLedgerError(code: LedgerErrorCode): HttpStatus {
	return STATUS_BY_CODE[code];
}

/**
 * Turns ledger rejections into `{ statusCode, error, message }` bodies.
 * Nest HTTP exceptions pass through; anything else is a 500.
 */
@Catch()
export class LedgerExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(LedgerExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const response = host.switchToHttp().getResponse<Response>();
		const body = this.toBody(exception);
		response.status(body.statusCode).json(body);
	}

	private toBody(exception: unknown): ErrorBody {
		if (exception instanceof LedgerError) {
			const statusCode = statusForLedgerError(exception.code);
			if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
				this.logger.error(
					`Ledger fault ${exception.code}`,
					describeError(exception),
				);
			}
			return { statusCode, error: exception.code, message: exception.message };
		}

		if (exception instanceof HttpException) {
			const statusCode = exception.getStatus();
			const payload = exception.getResponse();
			if (typeof payload === "string") {
				return { statusCode, error: exception.name, message: payload };
			}
			return {
				statusCode,
				error: readString(payload, "error") ?? exception.name,
				message: readMessage(payload) ?? exception.message,
			};
		}

		this.logger.error("Unhandled exception", describeError(exception));
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			error: "Internal Server Error",
			message: "Internal server error",
		};
	}
}

function readString(payload: object, key: string): string | undefined {
	const value: unknown = Reflect.get(payload, key);
	return typeof value === "string" ? value : undefined;
}

function readMessage(payload: object): string | string[] | undefined {
	const value: unknown = Reflect.get(payload, "message");
	if (typeof value === "string") return value;
	if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
		return value;
	}
	return undefined;
}
