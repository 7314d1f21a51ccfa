import {
	createParamDecorator,
	type ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { CallerRequest } from "./caller.guard";

export const Caller = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const request = ctx.switchToHttp().getRequest<CallerRequest>();
		if (!request.caller) {
			throw new UnauthorizedException("No caller identity on request");
		}
		return request.caller;
	},
);
