/**
 * Storage Adapter Types
 *
 * Defines interfaces for pluggable storage backends. Every contract owns a
 * namespace (its address) of string keys; values are stored as encoded text
 * (see codec.ts). Bring your own persistence layer (SQLite, Postgres,
 * in-memory, etc.) by implementing these interfaces.
 */

import type { Address } from "../core/types.js";

/**
 * Soroban-style storage tiers: singletons live in the instance tier,
 * per-entity records in the persistent tier.
 */
export type StorageTier = "instance" | "persistent";

/**
 * One key-value entry in a contract's namespace.
 */
export interface StoredEntry {
	/** Owning contract address */
	contract: Address;
	/** Storage tier */
	tier: StorageTier;
	/** Key within the contract namespace */
	key: string;
	/** Encoded value */
	value: string;
	/** Ledger timestamp (unix seconds) of the invocation that wrote it */
	updatedAt: number;
}

/**
 * Query options for listing entries.
 */
export interface QueryOptions {
	/** Restrict to one contract namespace */
	contract?: Address;
	/** Restrict to one tier */
	tier?: StorageTier;
	/** Only keys starting with this prefix */
	keyPrefix?: string;
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
	/** Sort direction on (contract, key) */
	sortOrder?: "asc" | "desc";
}

/**
 * Query result with pagination info.
 */
export interface QueryResult<T> {
	/** The items matching the query */
	items: T[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

/**
 * Storage adapter interface.
 *
 * The ledger host reads through `load`/`exists` while an invocation runs and
 * hands every write of a successful invocation to `commit` in one call.
 * `commit` must be atomic: either all entries are written or none.
 *
 * @example
 * ```typescript
 * class PostgresStorageAdapter implements StorageAdapter {
 *   constructor(private pool: Pool) {}
 *
 *   async commit(entries: StoredEntry[]): Promise<void> {
 *     const client = await this.pool.connect();
 *     try {
 *       await client.query("BEGIN");
 *       for (const e of entries) {
 *         await client.query(
 *           "INSERT INTO contract_state (contract, key, tier, value) VALUES ($1, $2, $3, $4) " +
 *             "ON CONFLICT (contract, key) DO UPDATE SET value = $4",
 *           [e.contract, e.key, e.tier, e.value],
 *         );
 *       }
 *       await client.query("COMMIT");
 *     } catch (err) {
 *       await client.query("ROLLBACK");
 *       throw err;
 *     } finally {
 *       client.release();
 *     }
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface StorageAdapter {
	/**
	 * Load one entry.
	 *
	 * @returns The entry if found, null otherwise
	 */
	load(contract: Address, key: string): Promise<StoredEntry | null>;

	/**
	 * Check if an entry exists.
	 */
	exists(contract: Address, key: string): Promise<boolean>;

	/**
	 * List entries matching query options.
	 */
	list(options?: QueryOptions): Promise<StoredEntry[]>;

	/**
	 * List entries with pagination info.
	 */
	query(options?: QueryOptions): Promise<QueryResult<StoredEntry>>;

	/**
	 * Count entries matching query options.
	 */
	count(options?: QueryOptions): Promise<number>;

	/**
	 * Atomically create or replace every entry in the batch.
	 */
	commit(entries: StoredEntry[]): Promise<void>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
