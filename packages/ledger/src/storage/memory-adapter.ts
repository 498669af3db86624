/**
 * In-Memory Storage Adapter
 *
 * A simple in-memory storage adapter for testing and development.
 * Data is lost when the process exits.
 */

import type { Address } from "../core/types.js";
import {
	StorageAdapter,
	StoredEntry,
	QueryOptions,
	QueryResult,
} from "./types.js";

function entryId(contract: Address, key: string): string {
	return `${contract}\u0000${key}`;
}

/**
 * In-memory storage adapter.
 *
 * Useful for:
 * - Unit testing
 * - Development and prototyping
 * - Short-lived hosts
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorageAdapter();
 * const host = new LedgerHost({ storage });
 * ```
 */
export class MemoryStorageAdapter implements StorageAdapter {
	private entries: Map<string, StoredEntry> = new Map();

	async load(contract: Address, key: string): Promise<StoredEntry | null> {
		const entry = this.entries.get(entryId(contract, key));
		// Return a copy to prevent external mutations
		return entry ? { ...entry } : null;
	}

	async exists(contract: Address, key: string): Promise<boolean> {
		return this.entries.has(entryId(contract, key));
	}

	async list(options?: QueryOptions): Promise<StoredEntry[]> {
		const result = await this.query(options);
		return result.items;
	}

	async query(options?: QueryOptions): Promise<QueryResult<StoredEntry>> {
		let entries = Array.from(this.entries.values());

		if (options?.contract !== undefined) {
			const contract = options.contract;
			entries = entries.filter((e) => e.contract === contract);
		}

		if (options?.tier !== undefined) {
			const tier = options.tier;
			entries = entries.filter((e) => e.tier === tier);
		}

		if (options?.keyPrefix !== undefined) {
			const prefix = options.keyPrefix;
			entries = entries.filter((e) => e.key.startsWith(prefix));
		}

		// Get total before pagination
		const total = entries.length;

		const direction = options?.sortOrder === "desc" ? -1 : 1;
		entries.sort((a, b) => {
			const aVal = entryId(a.contract, a.key);
			const bVal = entryId(b.contract, b.key);
			return aVal < bVal ? -direction : aVal > bVal ? direction : 0;
		});

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? entries.length;
		const items = entries.slice(offset, offset + limit).map((e) => ({ ...e }));
		const hasMore = offset + items.length < total;

		return { items, total, hasMore };
	}

	async count(options?: QueryOptions): Promise<number> {
		const result = await this.query({ ...options, limit: 0 });
		return result.total;
	}

	async commit(entries: StoredEntry[]): Promise<void> {
		for (const entry of entries) {
			this.entries.set(entryId(entry.contract, entry.key), { ...entry });
		}
	}

	/**
	 * Get the number of entries stored.
	 */
	size(): number {
		return this.entries.size;
	}
}
