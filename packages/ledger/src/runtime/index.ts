/**
 * Runtime module - Contract host, invocations and ledger clock
 */

export type {
	LoggerLike,
	LedgerClock,
	CallOptions,
	LedgerInfo,
	ContractEvent,
	EventListener,
} from "./types.js";
export type { LedgerHostOptions } from "./host.js";

export { LedgerHost, HOST_NAMESPACE } from "./host.js";
export { Contract } from "./contract.js";
export { InvocationEnv, StorageView } from "./invocation.js";
export { SystemClock, ManualClock } from "./clock.js";
export { SerialQueue } from "./serial-queue.js";
