export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export function describeError(err: unknown): string {
	const error = toError(err);
	return error.stack ?? `${error.name}: ${error.message}`;
}
