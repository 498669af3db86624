/**
 * Escrow Module Types
 */

import type { Bytes32, XOnlyPubKey } from "../../core/types.js";
import {
	StorageRecord,
	StorageValue,
	asRecord,
	readBigInt,
	readBytes,
} from "../../storage/codec.js";
import type { AttestationVerifier } from "../../attestation/types.js";
import type { LoggerLike } from "../../runtime/types.js";

/**
 * Funding state of one project's escrow.
 *
 * - uninitialized: nothing ever deposited
 * - funded: available > 0
 * - depleted: everything deposited has been claimed or released; new
 *   deposits move it back to funded
 */
export type FundingState = "uninitialized" | "funded" | "depleted";

/**
 * Per-project ledger of custodied funds.
 *
 * Invariant: 0 <= totalClaimed <= totalDeposited.
 */
export interface EscrowAccount {
	projectId: Bytes32;
	totalDeposited: bigint;
	totalClaimed: bigint;
	/** Key that authorizes claims and releases for this project */
	attestationPubkey: XOnlyPubKey;
}

export interface FundingEscrowOptions {
	/** Attestation scheme (default: Schnorr) */
	verifier?: AttestationVerifier;
	logger?: LoggerLike;
}

export function availableOf(account: EscrowAccount): bigint {
	return account.totalDeposited - account.totalClaimed;
}

export function fundingStateOf(account: EscrowAccount | null): FundingState {
	if (account === null) return "uninitialized";
	return availableOf(account) > 0n ? "funded" : "depleted";
}

export function escrowToRecord(account: EscrowAccount): StorageRecord {
	return {
		projectId: account.projectId,
		totalDeposited: account.totalDeposited,
		totalClaimed: account.totalClaimed,
		attestationPubkey: account.attestationPubkey,
	};
}

export function escrowFromRecord(value: StorageValue): EscrowAccount {
	const record = asRecord(value, "escrow account");
	return {
		projectId: readBytes(record, "projectId"),
		totalDeposited: readBigInt(record, "totalDeposited"),
		totalClaimed: readBigInt(record, "totalClaimed"),
		attestationPubkey: readBytes(record, "attestationPubkey"),
	};
}
