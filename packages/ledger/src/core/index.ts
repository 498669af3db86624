/**
 * Core module - Identifiers, principals and amounts
 */

export type { Address, Bytes32, XOnlyPubKey, Stroops } from "./types.js";

export {
	STROOPS_PER_UNIT,
	MAX_AMOUNT,
	ID_LENGTH,
	assertBytes32,
	assertAddress,
	assertPositiveAmount,
	idToHex,
} from "./types.js";
