/**
 * Utility functions for the ledger
 */

export {
	bytesToHex,
	hexToBytes,
	stringToBytes,
	bytesToString,
	concatBytes,
	u64ToBytes,
	bytesToU64,
	i128ToBytes,
	lengthPrefixed,
} from "./encoding.js";
