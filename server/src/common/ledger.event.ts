import type { StorageRecord } from "@fundchain/ledger";

export const LEDGER_EVENT_PREFIX = "ledger.";

export function ledgerEventName(topic: string): string {
	return `${LEDGER_EVENT_PREFIX}${topic}`;
}

/**
 * A committed contract event, as re-emitted on the application event bus
 * under `ledger.<topic>`.
 */
export type LedgerEvent = {
	eventId: string;
	contract: string;
	topic: string;
	data: StorageRecord;
	sequence: number;
	committedAt: string; // ISO timestamp of the ledger close
};

export const DEPOSIT_RECEIVED_ID = "ledger.deposit";
export const MILESTONE_RELEASED_ID = "ledger.milestone_released";

// Raised by the orchestrator, not by a contract
export const MILESTONE_DISBURSED_ID = "milestone.disbursed";
export type MilestoneDisbursed = {
	eventId: string;
	milestoneId: string;
	approval: "performed" | "skipped";
	payout: "performed" | "skipped";
	disbursedAt: string;
};
