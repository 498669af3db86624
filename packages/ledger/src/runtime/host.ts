/**
 * Ledger Host
 *
 * In-process stand-in for the contract runtime. Invocations run one at a time
 * against staged storage and are committed only when they return normally,
 * reproducing the runtime's rollback-on-failure guarantee.
 */

import { customAlphabet } from "nanoid";
import type { Address } from "../core/types.js";
import { ContractError } from "../contracts/types.js";
import { MemoryStorageAdapter } from "../storage/memory-adapter.js";
import type { StorageAdapter } from "../storage/types.js";
import { decodeValue, encodeValue } from "../storage/codec.js";
import { SystemClock } from "./clock.js";
import type { Contract } from "./contract.js";
import { Invocation, InvocationEnv } from "./invocation.js";
import { SerialQueue } from "./serial-queue.js";
import {
	CallOptions,
	ContractEvent,
	EventListener,
	LedgerClock,
	LoggerLike,
} from "./types.js";

/** Namespace holding host bookkeeping (not a contract) */
export const HOST_NAMESPACE = "ledger";
const SEQUENCE_KEY = "Sequence";

// Stellar contract strkeys: "C" followed by 55 base32 characters
const contractSuffix = customAlphabet("ABCDEFGHIJKLMNOPQRSTUVWXYZ234567", 55);

export interface LedgerHostOptions {
	/** Persistence backend (default: in-memory) */
	storage?: StorageAdapter;
	/** Ledger clock (default: wall clock) */
	clock?: LedgerClock;
	/** Skip signer checks, for tests */
	mockAllAuths?: boolean;
	logger?: LoggerLike;
}

/**
 * Contract host.
 *
 * @example
 * ```typescript
 * const host = new LedgerHost({ storage: new MemoryStorageAdapter() });
 * const registry = host.deploy((h, address) => new ProjectRegistry(h, address));
 *
 * await registry.register(owner, projectId, "ipfs://meta", { signers: [owner] });
 * ```
 */
export class LedgerHost {
	private readonly storage: StorageAdapter;
	private readonly clock: LedgerClock;
	private readonly mockAllAuths: boolean;
	private readonly logger?: LoggerLike;
	private readonly queue = new SerialQueue();
	private readonly contracts = new Map<Address, Contract>();
	private readonly listeners = new Set<EventListener>();
	private sequence: number | null = null;

	constructor(options: LedgerHostOptions = {}) {
		this.storage = options.storage ?? new MemoryStorageAdapter();
		this.clock = options.clock ?? new SystemClock();
		this.mockAllAuths = options.mockAllAuths ?? false;
		this.logger = options.logger;
	}

	// ==================== Contracts ====================

	/**
	 * Register a contract instance under an address (generated if omitted).
	 */
	deploy<T extends Contract>(
		factory: (host: LedgerHost, address: Address) => T,
		address?: Address,
	): T {
		const target = address ?? `C${contractSuffix()}`;
		if (this.contracts.has(target) || target === HOST_NAMESPACE) {
			throw new ContractError(
				`Address ${target} is already in use`,
				"ALREADY_EXISTS",
				{ address: target },
			);
		}
		const contract = factory(this, target);
		this.contracts.set(target, contract);
		this.logger?.debug?.(`Deployed ${contract.constructor.name} at ${target}`);
		return contract;
	}

	/**
	 * Look up a deployed contract of the expected type.
	 */
	getContract<T extends Contract>(
		address: Address,
		type: abstract new (...args: never[]) => T,
	): T {
		const contract = this.contracts.get(address);
		if (!(contract instanceof type)) {
			throw new ContractError(
				`No ${type.name} deployed at ${address}`,
				"CONTRACT_NOT_FOUND",
				{ address },
			);
		}
		return contract;
	}

	// ==================== Invocation ====================

	/**
	 * Run a state-changing entry point as one all-or-nothing invocation.
	 */
	invoke<T>(
		contract: Address,
		fn: string,
		options: CallOptions | undefined,
		body: (env: InvocationEnv) => Promise<T>,
	): Promise<T> {
		return this.queue.run(() => this.execute(contract, fn, options, body, false));
	}

	/**
	 * Run a pure read. Nothing it does is committed.
	 */
	query<T>(
		contract: Address,
		fn: string,
		body: (env: InvocationEnv) => Promise<T>,
	): Promise<T> {
		return this.queue.run(() => this.execute(contract, fn, undefined, body, true));
	}

	/**
	 * Sequence of the last committed invocation (0 before the first).
	 */
	async getSequence(): Promise<number> {
		return this.queue.run(() => this.loadSequence());
	}

	// ==================== Events ====================

	/**
	 * Subscribe to committed contract events.
	 *
	 * @returns Unsubscribe function
	 */
	subscribe(listener: EventListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	// ==================== Internals ====================

	private async execute<T>(
		contract: Address,
		fn: string,
		options: CallOptions | undefined,
		body: (env: InvocationEnv) => Promise<T>,
		readOnly: boolean,
	): Promise<T> {
		const signers = new Set(options?.signers ?? []);
		this.assertExternalSigners(contract, fn, signers);

		const current = await this.loadSequence();
		const invocation = new Invocation({
			storage: this.storage,
			signers,
			mockAllAuths: this.mockAllAuths,
			ledger: { timestamp: this.clock.now(), sequence: current + 1 },
			readOnly,
		});

		let result: T;
		try {
			result = await body(new InvocationEnv(invocation, contract));
		} catch (err) {
			if (!readOnly) {
				const reason = err instanceof Error ? err.message : String(err);
				this.logger?.warn(`${fn} on ${contract} aborted: ${reason}`);
			}
			throw err;
		}

		if (readOnly || !invocation.hasEffects()) {
			return result;
		}

		const sequence = invocation.ledger.sequence;
		await this.storage.commit([
			...invocation.stagedEntries(),
			{
				contract: HOST_NAMESPACE,
				tier: "instance",
				key: SEQUENCE_KEY,
				value: encodeValue(sequence),
				updatedAt: invocation.ledger.timestamp,
			},
		]);
		this.sequence = sequence;

		const events = invocation.publishedEvents();
		this.logger?.debug?.(
			`${fn} on ${contract} committed at sequence ${sequence} (${events.length} events)`,
		);
		this.dispatch(events);
		return result;
	}

	/**
	 * Contracts authorize only as invokers of a nested call. A top-level
	 * caller naming one as a signer is refused.
	 */
	private assertExternalSigners(
		contract: Address,
		fn: string,
		signers: ReadonlySet<Address>,
	): void {
		for (const signer of signers) {
			if (signer === HOST_NAMESPACE || this.contracts.has(signer)) {
				throw new ContractError(
					`${signer} cannot sign ${fn} on ${contract}: contracts authorize only through nested calls`,
					"UNAUTHORIZED",
					{ signer, contract },
				);
			}
		}
	}

	private async loadSequence(): Promise<number> {
		if (this.sequence === null) {
			const entry = await this.storage.load(HOST_NAMESPACE, SEQUENCE_KEY);
			const stored = entry ? decodeValue(entry.value) : 0;
			this.sequence = typeof stored === "number" ? stored : 0;
		}
		return this.sequence;
	}

	private dispatch(events: ContractEvent[]): void {
		for (const event of events) {
			for (const listener of this.listeners) {
				try {
					listener(event);
				} catch (err) {
					// A subscriber failure must not undo a committed invocation.
					this.logger?.error(
						`Event listener failed for ${event.topic} from ${event.contract}`,
						err,
					);
				}
			}
		}
	}
}
