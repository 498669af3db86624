/**
 * Storage module - Pluggable persistence adapters
 *
 * This module defines storage interfaces and provides a reference implementation.
 * Bring your own persistence layer by implementing StorageAdapter.
 */

// Types
export type {
	StorageTier,
	StoredEntry,
	QueryOptions,
	QueryResult,
	StorageAdapter,
} from "./types.js";
export type { StorageValue, StorageRecord } from "./codec.js";

export { StorageError } from "./types.js";

// Codec
export {
	encodeValue,
	decodeValue,
	asRecord,
	readString,
	readNumber,
	readBoolean,
	readBigInt,
	readBytes,
	readOptionalString,
} from "./codec.js";

// Reference implementations
export { MemoryStorageAdapter } from "./memory-adapter.js";
