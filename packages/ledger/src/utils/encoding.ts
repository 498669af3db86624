/**
 * Encoding utilities for the ledger
 */

import { hex } from "@scure/base";

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
	return hex.encode(bytes);
}

/**
 * Convert hex string to bytes
 */
export function hexToBytes(hexString: string): Uint8Array {
	return hex.decode(hexString.toLowerCase());
}

/**
 * Convert a string to bytes using UTF-8 encoding
 */
export function stringToBytes(str: string): Uint8Array {
	return new TextEncoder().encode(str);
}

/**
 * Convert bytes to string using UTF-8 encoding
 */
export function bytesToString(bytes: Uint8Array): string {
	return new TextDecoder().decode(bytes);
}

/**
 * Concatenate multiple byte arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const arr of arrays) {
		result.set(arr, offset);
		offset += arr.length;
	}
	return result;
}

/**
 * Big-endian encoding of an unsigned 64-bit integer.
 */
export function u64ToBytes(value: bigint): Uint8Array {
	if (value < 0n || value > 0xffff_ffff_ffff_ffffn) {
		throw new RangeError(`Value ${value} does not fit in u64`);
	}
	const out = new Uint8Array(8);
	new DataView(out.buffer).setBigUint64(0, value, false);
	return out;
}

/**
 * Decode a big-endian unsigned 64-bit integer.
 */
export function bytesToU64(bytes: Uint8Array): bigint {
	if (bytes.length !== 8) {
		throw new RangeError(`Expected 8 bytes, got ${bytes.length}`);
	}
	return new DataView(bytes.buffer, bytes.byteOffset, 8).getBigUint64(0, false);
}

/**
 * Big-endian two's complement encoding of a signed 128-bit integer.
 */
export function i128ToBytes(value: bigint): Uint8Array {
	if (BigInt.asIntN(128, value) !== value) {
		throw new RangeError(`${value} does not fit in 128 signed bits`);
	}
	const out = new Uint8Array(16);
	let v = BigInt.asUintN(128, value);
	for (let i = 15; i >= 0; i--) {
		out[i] = Number(v & 0xffn);
		v >>= 8n;
	}
	return out;
}

/**
 * Prefix a field with its length as a big-endian u32.
 */
export function lengthPrefixed(bytes: Uint8Array): Uint8Array {
	const prefix = new Uint8Array(4);
	new DataView(prefix.buffer).setUint32(0, bytes.length, false);
	return concatBytes(prefix, bytes);
}
