/**
 * Core types for the Fundchain ledger
 *
 * Identifiers, principals and amounts shared by every contract.
 */

import { ContractError } from "../contracts/types.js";
import { bytesToHex } from "../utils/encoding.js";

/**
 * An authorization principal or a contract address.
 */
export type Address = string;

/**
 * 32-byte opaque handle (project ids, milestone ids).
 */
export type Bytes32 = Uint8Array;

/**
 * X-only public key (32 bytes) - standard for BIP-340 Schnorr
 */
export type XOnlyPubKey = Uint8Array;

/**
 * Smallest indivisible unit of the custodied asset.
 */
export type Stroops = bigint;

/** 1 unit = 10,000,000 stroops */
export const STROOPS_PER_UNIT = 10_000_000n;

export const ID_LENGTH = 32;

/**
 * Throw unless `value` is a 32-byte identifier.
 */
export function assertBytes32(value: Uint8Array, field: string): void {
	if (!(value instanceof Uint8Array) || value.length !== ID_LENGTH) {
		throw new ContractError(
			`${field} must be ${ID_LENGTH} bytes`,
			"INVALID_ARGUMENT",
			{ field, length: value?.length },
		);
	}
}

/**
 * Throw unless `value` is a non-empty address.
 */
export function assertAddress(value: Address, field: string): void {
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new ContractError(`${field} must be a non-empty address`, "INVALID_ARGUMENT", {
			field,
		});
	}
}

/** Largest amount an i128 field holds */
export const MAX_AMOUNT: Stroops = (1n << 127n) - 1n;

/**
 * Reject amounts outside 1..MAX_AMOUNT.
 */
export function assertPositiveAmount(amount: Stroops): void {
	if (amount <= 0n || amount > MAX_AMOUNT) {
		throw new ContractError(
			"Amount must be positive and fit in an i128",
			"INVALID_AMOUNT",
			{ amount: amount.toString() },
		);
	}
}

/**
 * Hex rendering used for storage keys, events and logs.
 */
export function idToHex(id: Bytes32): string {
	return bytesToHex(id);
}
