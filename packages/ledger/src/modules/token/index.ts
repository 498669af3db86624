/**
 * Token Module
 *
 * Custodial fungible token that the escrow moves funds through.
 */

export type { TokenInfo, TokenOperations } from "./types.js";
export { MAX_DECIMALS } from "./types.js";
export { FungibleToken } from "./token-contract.js";
