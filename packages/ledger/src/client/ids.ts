/**
 * Identifier and amount conversions between the application and the ledger.
 */

import { Bytes32, ID_LENGTH, STROOPS_PER_UNIT, assertBytes32 } from "../core/types.js";
import { ContractError } from "../contracts/types.js";
import { bytesToHex, bytesToString, hexToBytes, stringToBytes } from "../utils/encoding.js";
import type { MilestoneRef } from "./types.js";

const UUID_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const UNITS_PATTERN = /^(-)?(\d+)(?:\.(\d{1,7}))?$/;
const FRACTION_DIGITS = 7;

/**
 * The 16 UUID bytes, zero-padded to 32.
 */
export function projectIdFromUuid(uuid: string): Bytes32 {
	if (!UUID_PATTERN.test(uuid)) {
		throw new ContractError(`Not a UUID: ${uuid}`, "INVALID_ARGUMENT");
	}
	const id = new Uint8Array(ID_LENGTH);
	id.set(hexToBytes(uuid.replace(/-/g, "")));
	return id;
}

export function uuidFromProjectId(projectId: Bytes32): string {
	assertBytes32(projectId, "projectId");
	const hex = bytesToHex(projectId.slice(0, 16));
	return [
		hex.slice(0, 8),
		hex.slice(8, 12),
		hex.slice(12, 16),
		hex.slice(16, 20),
		hex.slice(20),
	].join("-");
}

/**
 * UTF-8 bytes of `text`, zero-padded to 32. Longer strings are rejected so
 * that distinct ids never share a ledger key.
 */
export function milestoneIdFromString(text: string): Bytes32 {
	const bytes = stringToBytes(text);
	if (bytes.length > ID_LENGTH) {
		throw new ContractError(
			`Milestone id exceeds ${ID_LENGTH} bytes: ${text}`,
			"INVALID_ARGUMENT",
			{ length: bytes.length },
		);
	}
	const id = new Uint8Array(ID_LENGTH);
	id.set(bytes);
	return id;
}

export function milestoneIdToString(milestoneId: Bytes32): string {
	let end = milestoneId.length;
	while (end > 0 && milestoneId[end - 1] === 0) end--;
	return bytesToString(milestoneId.slice(0, end));
}

export function toMilestoneId(ref: MilestoneRef): Bytes32 {
	if (typeof ref === "string") return milestoneIdFromString(ref);
	assertBytes32(ref, "milestoneId");
	return ref;
}

/**
 * Parse a decimal amount ("12.5") into stroops.
 */
export function toStroops(units: string): bigint {
	const match = UNITS_PATTERN.exec(units.trim());
	if (!match) {
		throw new ContractError(`Invalid amount: ${units}`, "INVALID_ARGUMENT");
	}
	const [, sign, whole, fraction = ""] = match;
	const stroops =
		BigInt(whole) * STROOPS_PER_UNIT + BigInt(fraction.padEnd(FRACTION_DIGITS, "0"));
	return sign ? -stroops : stroops;
}

/**
 * Render stroops as a decimal amount without trailing zeros.
 */
export function fromStroops(stroops: bigint): string {
	const negative = stroops < 0n;
	const magnitude = negative ? -stroops : stroops;
	const whole = magnitude / STROOPS_PER_UNIT;
	const fraction = (magnitude % STROOPS_PER_UNIT)
		.toString()
		.padStart(FRACTION_DIGITS, "0")
		.replace(/0+$/, "");
	const text = fraction ? `${whole}.${fraction}` : whole.toString();
	return negative ? `-${text}` : text;
}
