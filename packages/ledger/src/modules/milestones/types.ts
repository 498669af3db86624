/**
 * Milestone Module Types
 */

import type { Address, Bytes32 } from "../../core/types.js";
import {
	StorageRecord,
	StorageValue,
	asRecord,
	readBigInt,
	readBoolean,
	readBytes,
	readNumber,
	readOptionalString,
	readString,
} from "../../storage/codec.js";
import type { AttestationVerifier } from "../../attestation/types.js";
import type { LoggerLike } from "../../runtime/types.js";

/**
 * Milestone lifecycle.
 *
 * - registered: created by the admin
 * - proof-submitted: recipient supplied the proof a proof-required milestone asks for
 * - released: approved for payout (terminal)
 */
export type MilestoneState = "registered" | "proof-submitted" | "released";

export type MilestoneAction = "submit-proof" | "release";

/**
 * A funding tranche of a project. `released` never reverts and
 * `releasedAt > 0` exactly when it is set.
 */
export interface Milestone {
	projectId: Bytes32;
	milestoneId: Bytes32;
	amount: bigint;
	proofRequired: boolean;
	proofSubmitted: boolean;
	proofUri: string | null;
	released: boolean;
	/** Ledger unix seconds, 0 until released */
	releasedAt: number;
	recipient: Address;
}

/**
 * Per-project aggregate, maintained incrementally on register and release.
 */
export interface ProjectMilestonesSummary {
	totalMilestones: number;
	releasedMilestones: number;
	totalAmount: bigint;
	releasedAmount: bigint;
}

export interface MilestoneManagerOptions {
	/** Attestation scheme (default: Schnorr) */
	verifier?: AttestationVerifier;
	logger?: LoggerLike;
}

export function emptySummary(): ProjectMilestonesSummary {
	return {
		totalMilestones: 0,
		releasedMilestones: 0,
		totalAmount: 0n,
		releasedAmount: 0n,
	};
}

export function milestoneToRecord(milestone: Milestone): StorageRecord {
	return {
		projectId: milestone.projectId,
		milestoneId: milestone.milestoneId,
		amount: milestone.amount,
		proofRequired: milestone.proofRequired,
		proofSubmitted: milestone.proofSubmitted,
		proofUri: milestone.proofUri,
		released: milestone.released,
		releasedAt: milestone.releasedAt,
		recipient: milestone.recipient,
	};
}

export function milestoneFromRecord(value: StorageValue): Milestone {
	const record = asRecord(value, "milestone");
	return {
		projectId: readBytes(record, "projectId"),
		milestoneId: readBytes(record, "milestoneId"),
		amount: readBigInt(record, "amount"),
		proofRequired: readBoolean(record, "proofRequired"),
		proofSubmitted: readBoolean(record, "proofSubmitted"),
		proofUri: readOptionalString(record, "proofUri"),
		released: readBoolean(record, "released"),
		releasedAt: readNumber(record, "releasedAt"),
		recipient: readString(record, "recipient"),
	};
}

export function summaryToRecord(summary: ProjectMilestonesSummary): StorageRecord {
	return {
		totalMilestones: summary.totalMilestones,
		releasedMilestones: summary.releasedMilestones,
		totalAmount: summary.totalAmount,
		releasedAmount: summary.releasedAmount,
	};
}

export function summaryFromRecord(value: StorageValue): ProjectMilestonesSummary {
	const record = asRecord(value, "milestone summary");
	return {
		totalMilestones: readNumber(record, "totalMilestones"),
		releasedMilestones: readNumber(record, "releasedMilestones"),
		totalAmount: readBigInt(record, "totalAmount"),
		releasedAmount: readBigInt(record, "releasedAmount"),
	};
}
