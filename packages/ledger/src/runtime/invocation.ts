/**
 * Invocation staging
 *
 * Every top-level call gets one Invocation: a write buffer layered over the
 * storage adapter plus the events published so far. Nested calls into other
 * contracts share the same Invocation, so the host can commit or drop the
 * whole call tree at once.
 */

import type { Address } from "../core/types.js";
import { ContractError } from "../contracts/types.js";
import {
	StorageValue,
	StorageRecord,
	encodeValue,
	decodeValue,
} from "../storage/codec.js";
import type { StorageAdapter, StorageTier, StoredEntry } from "../storage/types.js";
import type { ContractEvent, LedgerInfo } from "./types.js";

interface StagedWrite {
	contract: Address;
	tier: StorageTier;
	key: string;
	value: StorageValue;
}

export interface InvocationInit {
	storage: StorageAdapter;
	signers: ReadonlySet<Address>;
	mockAllAuths: boolean;
	ledger: LedgerInfo;
	readOnly: boolean;
}

export class Invocation {
	private readonly writes = new Map<string, StagedWrite>();
	private readonly events: ContractEvent[] = [];

	constructor(private readonly init: InvocationInit) {}

	get ledger(): LedgerInfo {
		return this.init.ledger;
	}

	get signers(): ReadonlySet<Address> {
		return this.init.signers;
	}

	get mockAllAuths(): boolean {
		return this.init.mockAllAuths;
	}

	async read(contract: Address, key: string): Promise<StorageValue | null> {
		const staged = this.writes.get(stagedId(contract, key));
		if (staged) return staged.value;
		const entry = await this.init.storage.load(contract, key);
		return entry ? decodeValue(entry.value) : null;
	}

	async has(contract: Address, key: string): Promise<boolean> {
		if (this.writes.has(stagedId(contract, key))) return true;
		return this.init.storage.exists(contract, key);
	}

	write(contract: Address, tier: StorageTier, key: string, value: StorageValue): void {
		this.assertWritable();
		this.writes.set(stagedId(contract, key), { contract, tier, key, value });
	}

	publish(contract: Address, topic: string, data: StorageRecord): void {
		this.assertWritable();
		this.events.push({
			contract,
			topic,
			data,
			sequence: this.init.ledger.sequence,
			timestamp: this.init.ledger.timestamp,
		});
	}

	/**
	 * Encoded entries ready for `StorageAdapter.commit`.
	 */
	stagedEntries(): StoredEntry[] {
		return Array.from(this.writes.values()).map((w) => ({
			contract: w.contract,
			tier: w.tier,
			key: w.key,
			value: encodeValue(w.value),
			updatedAt: this.init.ledger.timestamp,
		}));
	}

	publishedEvents(): ContractEvent[] {
		return [...this.events];
	}

	hasEffects(): boolean {
		return this.writes.size > 0 || this.events.length > 0;
	}

	private assertWritable(): void {
		if (this.init.readOnly) {
			throw new ContractError(
				"Read-only calls cannot modify contract state",
				"ACTION_NOT_ALLOWED",
			);
		}
	}
}

function stagedId(contract: Address, key: string): string {
	return `${contract}\u0000${key}`;
}

/**
 * Key-value view over one tier of one contract's storage.
 */
export class StorageView {
	constructor(
		private readonly invocation: Invocation,
		private readonly contract: Address,
		private readonly tier: StorageTier,
	) {}

	get(key: string): Promise<StorageValue | null> {
		return this.invocation.read(this.contract, key);
	}

	has(key: string): Promise<boolean> {
		return this.invocation.has(this.contract, key);
	}

	set(key: string, value: StorageValue): void {
		this.invocation.write(this.contract, this.tier, key, value);
	}
}

/**
 * What a contract sees while one of its entry points runs.
 */
export class InvocationEnv {
	constructor(
		private readonly invocation: Invocation,
		/** The contract whose code is executing */
		readonly currentContract: Address,
		/** Contracts that called into this one, outermost first */
		readonly invokers: readonly Address[] = [],
	) {}

	get ledger(): LedgerInfo {
		return this.invocation.ledger;
	}

	instance(): StorageView {
		return new StorageView(this.invocation, this.currentContract, "instance");
	}

	persistent(): StorageView {
		return new StorageView(this.invocation, this.currentContract, "persistent");
	}

	/**
	 * Fail with UNAUTHORIZED unless `address` signed the invocation or is a
	 * contract further up the call chain.
	 */
	requireAuth(address: Address): void {
		if (this.invocation.mockAllAuths) return;
		if (this.invocation.signers.has(address)) return;
		if (this.invokers.includes(address)) return;
		throw new ContractError(
			`Missing authorization from ${address}`,
			"UNAUTHORIZED",
			{ address, contract: this.currentContract },
		);
	}

	publish(topic: string, data: StorageRecord): void {
		this.invocation.publish(this.currentContract, topic, data);
	}

	/**
	 * Environment for a nested call into another contract. The callee shares
	 * this invocation's staging buffer and counts the caller as authorized.
	 */
	enter(contract: Address): InvocationEnv {
		return new InvocationEnv(this.invocation, contract, [
			...this.invokers,
			this.currentContract,
		]);
	}
}
