/**
 * Token Module Types
 */

import type { Address } from "../../core/types.js";

export interface TokenInfo {
	admin: Address;
	decimals: number;
	symbol: string;
}

/**
 * Token operations available to another contract inside its invocation.
 */
export interface TokenOperations {
	transfer(from: Address, to: Address, amount: bigint): Promise<void>;
	balance(address: Address): Promise<bigint>;
}

/** Most decimals a token may declare */
export const MAX_DECIMALS = 18;
