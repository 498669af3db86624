import type { Address } from "../core/types.js";
import type { LedgerHost } from "./host.js";
import type { InvocationEnv } from "./invocation.js";
import type { CallOptions } from "./types.js";

/**
 * Base class for contracts deployed on a LedgerHost.
 *
 * Entry points wrap their logic in `invoke` (state-changing) or `query`
 * (read-only); the host supplies an InvocationEnv scoped to this contract.
 */
export abstract class Contract {
	constructor(
		protected readonly host: LedgerHost,
		readonly address: Address,
	) {}

	protected invoke<T>(
		fn: string,
		options: CallOptions | undefined,
		body: (env: InvocationEnv) => Promise<T>,
	): Promise<T> {
		return this.host.invoke(this.address, fn, options, body);
	}

	protected query<T>(
		fn: string,
		body: (env: InvocationEnv) => Promise<T>,
	): Promise<T> {
		return this.host.query(this.address, fn, body);
	}
}
