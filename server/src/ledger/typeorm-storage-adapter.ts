/**
 * TypeORM Storage Adapter
 *
 * Implements the ledger's StorageAdapter interface over the contract_state
 * table, so contract storage survives restarts of the host.
 */

import type { Repository } from "typeorm";
import {
	QueryOptions,
	QueryResult,
	StorageAdapter,
	StorageError,
	StoredEntry,
} from "@fundchain/ledger";
import { ContractStateEntry } from "./contract-state.entity";

/**
 * TypeORM-based storage adapter.
 *
 * @example
 * ```typescript
 * const adapter = new TypeOrmStorageAdapter(dataSource.getRepository(ContractStateEntry));
 * const host = new LedgerHost({ storage: adapter });
 * ```
 */
export class TypeOrmStorageAdapter implements StorageAdapter {
	constructor(private readonly repository: Repository<ContractStateEntry>) {}

	private toStoredEntry(entity: ContractStateEntry): StoredEntry {
		return {
			contract: entity.contract,
			tier: entity.tier,
			key: entity.key,
			value: entity.value,
			updatedAt: entity.ledgerTimestamp,
		};
	}

	async load(contract: string, key: string): Promise<StoredEntry | null> {
		try {
			const entity = await this.repository.findOne({ where: { contract, key } });
			return entity ? this.toStoredEntry(entity) : null;
		} catch (error) {
			throw new StorageError(`Failed to load ${contract}/${key}`, "LOAD_ERROR", {
				error,
			});
		}
	}

	async exists(contract: string, key: string): Promise<boolean> {
		try {
			const count = await this.repository.count({ where: { contract, key } });
			return count > 0;
		} catch (error) {
			throw new StorageError(
				`Failed to check existence of ${contract}/${key}`,
				"EXISTS_ERROR",
				{ error },
			);
		}
	}

	async list(options?: QueryOptions): Promise<StoredEntry[]> {
		const result = await this.query(options);
		return result.items;
	}

	async query(options?: QueryOptions): Promise<QueryResult<StoredEntry>> {
		try {
			const qb = this.repository.createQueryBuilder("e");

			if (options?.contract !== undefined) {
				qb.andWhere("e.contract = :contract", { contract: options.contract });
			}
			if (options?.tier !== undefined) {
				qb.andWhere("e.tier = :tier", { tier: options.tier });
			}
			// substr rather than LIKE: keys may hold "_" and "%"
			if (options?.keyPrefix !== undefined) {
				qb.andWhere("SUBSTR(e.key, 1, :prefixLength) = :prefix", {
					prefix: options.keyPrefix,
					prefixLength: options.keyPrefix.length,
				});
			}

			const total = await qb.getCount();

			const sortOrder = options?.sortOrder === "desc" ? "DESC" : "ASC";
			qb.orderBy("e.contract", sortOrder).addOrderBy("e.key", sortOrder);

			if (options?.offset) {
				qb.skip(options.offset);
			}
			if (options?.limit !== undefined) {
				if (options.limit === 0) {
					return { items: [], total, hasMore: total > (options.offset ?? 0) };
				}
				qb.take(options.limit);
			}

			const entities = await qb.getMany();
			const items = entities.map((e) => this.toStoredEntry(e));
			const hasMore = (options?.offset ?? 0) + items.length < total;

			return { items, total, hasMore };
		} catch (error) {
			throw new StorageError("Failed to query contract state", "QUERY_ERROR", {
				error,
			});
		}
	}

	async count(options?: QueryOptions): Promise<number> {
		const result = await this.query({ ...options, limit: 0 });
		return result.total;
	}

	/**
	 * Write a committed invocation in one database transaction.
	 */
	async commit(entries: StoredEntry[]): Promise<void> {
		if (entries.length === 0) return;
		try {
			await this.repository.manager.transaction(async (manager) => {
				const repository = manager.getRepository(ContractStateEntry);
				for (const entry of entries) {
					const existing = await repository.findOne({
						where: { contract: entry.contract, key: entry.key },
					});
					const entity = existing ?? repository.create({
						contract: entry.contract,
						key: entry.key,
					});
					entity.tier = entry.tier;
					entity.value = entry.value;
					entity.ledgerTimestamp = entry.updatedAt;
					await repository.save(entity);
				}
			});
		} catch (error) {
			throw new StorageError(
				`Failed to commit ${entries.length} entries`,
				"COMMIT_ERROR",
				{ error },
			);
		}
	}
}
