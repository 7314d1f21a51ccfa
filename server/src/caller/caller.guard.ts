import {
	type CanActivate,
	type ExecutionContext,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";

export const CALLER_HEADER = "x-caller-identity";

const CALLER_PATTERN = /^[A-Za-z0-9._:@-]{1,128}$/;

export type CallerRequest = Request & { caller?: string };

/**
 * Reads the caller identity supplied by the hosting environment.
 */
@Injectable()
export class CallerGuard implements CanActivate {
	canActivate(context: ExecutionContext): boolean {
		const request = context.switchToHttp().getRequest<CallerRequest>();
		const header = request.headers[CALLER_HEADER];
		if (typeof header !== "string" || !CALLER_PATTERN.test(header)) {
			throw new UnauthorizedException(
				"Missing or malformed X-Caller-Identity header",
			);
		}
		request.caller = header;
		return true;
	}
}
