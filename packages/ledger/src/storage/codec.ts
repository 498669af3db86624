/**
 * Storage value codec
 *
 * Contract records are plain objects of strings, numbers, booleans, bigints
 * and byte arrays. JSON cannot carry the last two, so they are written as
 * single-key tagged objects: `{"$bigint":"123"}` and `{"$bytes":"00ff"}`.
 */

import { bytesToHex, hexToBytes } from "../utils/encoding.js";
import { StorageError } from "./types.js";

export type StorageValue =
	| null
	| boolean
	| number
	| string
	| bigint
	| Uint8Array
	| StorageValue[]
	| { [key: string]: StorageValue };

export type StorageRecord = { [key: string]: StorageValue };

type JsonValue =
	| null
	| boolean
	| number
	| string
	| JsonValue[]
	| { [key: string]: JsonValue };

const BIGINT_TAG = "$bigint";
const BYTES_TAG = "$bytes";

function toJson(value: StorageValue): JsonValue {
	if (typeof value === "bigint") {
		return { [BIGINT_TAG]: value.toString() };
	}
	if (value instanceof Uint8Array) {
		return { [BYTES_TAG]: bytesToHex(value) };
	}
	if (Array.isArray(value)) {
		return value.map(toJson);
	}
	if (value !== null && typeof value === "object") {
		const out: { [key: string]: JsonValue } = {};
		for (const [k, v] of Object.entries(value)) {
			out[k] = toJson(v);
		}
		return out;
	}
	return value;
}

function fromJson(value: unknown): StorageValue {
	if (
		value === null ||
		typeof value === "boolean" ||
		typeof value === "number" ||
		typeof value === "string"
	) {
		return value;
	}
	if (Array.isArray(value)) {
		return value.map(fromJson);
	}
	if (typeof value === "object") {
		const entries: [string, unknown][] = Object.entries(value);
		if (entries.length === 1) {
			const [tag, inner] = entries[0];
			if (tag === BIGINT_TAG && typeof inner === "string") {
				return BigInt(inner);
			}
			if (tag === BYTES_TAG && typeof inner === "string") {
				return hexToBytes(inner);
			}
		}
		const out: StorageRecord = {};
		for (const [k, v] of entries) {
			out[k] = fromJson(v);
		}
		return out;
	}
	throw new StorageError("Unsupported stored value", "DECODE_ERROR", {
		type: typeof value,
	});
}

export function encodeValue(value: StorageValue): string {
	return JSON.stringify(toJson(value));
}

export function decodeValue(text: string): StorageValue {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (cause) {
		throw new StorageError("Stored value is not valid JSON", "DECODE_ERROR", {
			cause,
		});
	}
	return fromJson(parsed);
}

// ==================== Record readers ====================

function corrupted(field: string, expected: string): StorageError {
	return new StorageError(
		`Stored field "${field}" is not ${expected}`,
		"DECODE_ERROR",
		{ field },
	);
}

export function asRecord(value: StorageValue, what: string): StorageRecord {
	if (
		value === null ||
		typeof value !== "object" ||
		Array.isArray(value) ||
		value instanceof Uint8Array
	) {
		throw corrupted(what, "a record");
	}
	return value;
}

export function readString(record: StorageRecord, field: string): string {
	const value = record[field];
	if (typeof value !== "string") throw corrupted(field, "a string");
	return value;
}

export function readNumber(record: StorageRecord, field: string): number {
	const value = record[field];
	if (typeof value !== "number") throw corrupted(field, "a number");
	return value;
}

export function readBoolean(record: StorageRecord, field: string): boolean {
	const value = record[field];
	if (typeof value !== "boolean") throw corrupted(field, "a boolean");
	return value;
}

export function readBigInt(record: StorageRecord, field: string): bigint {
	const value = record[field];
	if (typeof value !== "bigint") throw corrupted(field, "a bigint");
	return value;
}

export function readBytes(record: StorageRecord, field: string): Uint8Array {
	const value = record[field];
	if (!(value instanceof Uint8Array)) throw corrupted(field, "bytes");
	return value;
}

export function readOptionalString(
	record: StorageRecord,
	field: string,
): string | null {
	const value = record[field];
	if (value === undefined || value === null) return null;
	if (typeof value !== "string") throw corrupted(field, "a string");
	return value;
}
