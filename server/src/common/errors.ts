import { isContractError } from "@fundchain/ledger";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

/**
 * One-line description for logs, with the contract error code when there is one.
 */
export function describeError(err: unknown): string {
	const error = toError(err);
	return isContractError(error) ? `${error.code}: ${error.message}` : error.message;
}
