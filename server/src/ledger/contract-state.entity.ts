import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import type { StorageTier } from "@fundchain/ledger";

export const STORAGE_TIERS = ["instance", "persistent"] as const;

/**
 * One key of one contract's storage. The host namespace ("ledger") keeps its
 * sequence counter here as well.
 */
@Entity("contract_state")
@Index(["contract", "key"], { unique: true })
export class ContractStateEntry {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index()
	@Column({ type: "text" })
	contract!: string;

	@Column({ type: "text", enum: STORAGE_TIERS })
	tier!: StorageTier;

	@Column({ type: "text" })
	key!: string;

	// codec-encoded JSON
	@Column({ type: "text" })
	value!: string;

	// ledger timestamp (unix seconds) of the writing invocation
	@Column({ type: "integer" })
	ledgerTimestamp!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
