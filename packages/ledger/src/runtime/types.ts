/**
 * Runtime types
 *
 * The contract host stands in for a blockchain runtime: it serializes
 * invocations, stamps them with a ledger clock, checks signer authorization
 * and commits each invocation's writes and events all at once.
 */

import type { Address } from "../core/types.js";
import type { StorageRecord } from "../storage/codec.js";

/**
 * Minimal logger contract, shape-compatible with NestJS `LoggerService`.
 */
export interface LoggerLike {
	log(message: string, ...optionalParams: unknown[]): void;
	warn(message: string, ...optionalParams: unknown[]): void;
	error(message: string, ...optionalParams: unknown[]): void;
	debug?(message: string, ...optionalParams: unknown[]): void;
}

/**
 * Source of ledger close times.
 */
export interface LedgerClock {
	/** Current ledger timestamp in unix seconds */
	now(): number;
}

/**
 * Per-call options supplied by the external caller.
 */
export interface CallOptions {
	/** Principals that signed this invocation */
	signers?: Address[];
}

/**
 * Ledger state visible to a running invocation.
 */
export interface LedgerInfo {
	/** Ledger close time, unix seconds */
	timestamp: number;
	/** Sequence number this invocation will commit under */
	sequence: number;
}

/**
 * Event published by a contract during an invocation.
 */
export interface ContractEvent {
	/** Emitting contract */
	contract: Address;
	/** Event name, e.g. "deposit" */
	topic: string;
	/** Structured payload */
	data: StorageRecord;
	/** Ledger sequence of the committing invocation */
	sequence: number;
	/** Ledger timestamp of the committing invocation */
	timestamp: number;
}

/**
 * Subscriber for committed events.
 */
export type EventListener = (event: ContractEvent) => void;
