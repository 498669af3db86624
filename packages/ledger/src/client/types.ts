/**
 * Client Types
 *
 * Shapes exchanged between off-chain services and the ContractClient.
 * Projects are addressed by UUID and milestones by a short string, the
 * identifiers the surrounding application already uses.
 */

import type { Address, Bytes32, XOnlyPubKey } from "../core/types.js";
import type { AttestationPayload, AttestationVerifier } from "../attestation/types.js";
import type { LoggerLike } from "../runtime/types.js";
import type { ProjectRegistry } from "../modules/registry/registry-contract.js";
import type { FundingEscrow } from "../modules/escrow/escrow-contract.js";
import type { MilestoneManager } from "../modules/milestones/milestone-contract.js";
import type { FungibleToken } from "../modules/token/token-contract.js";

export const CONTRACT_NAMES = [
	"project_registry",
	"funding_escrow",
	"milestone_manager",
	"token",
] as const;
export type ContractName = (typeof CONTRACT_NAMES)[number];

export type ContractAddressBook = Record<ContractName, Address>;

/**
 * Signs attestations for release-type actions.
 */
export interface Attestor {
	publicKey(): XOnlyPubKey;
	attest(payload: AttestationPayload): Promise<Uint8Array>;
}

export interface DeployOptions {
	/** Milestone manager admin */
	admin: Address;
	/** Key the escrow and milestone manager verify attestations with */
	attestationKey: XOnlyPubKey;
	/** Token issuer (default: admin) */
	tokenAdmin?: Address;
	/** Token symbol (default: XLM) */
	tokenSymbol?: string;
	/** Token decimals (default: 7) */
	tokenDecimals?: number;
	/** Fixed addresses, for reattaching to contracts in persistent storage */
	addresses?: Partial<ContractAddressBook>;
	verifier?: AttestationVerifier;
	logger?: LoggerLike;
}

export interface DeployedContracts {
	registry: ProjectRegistry;
	escrow: FundingEscrow;
	milestones: MilestoneManager;
	token: FungibleToken;
	addresses: ContractAddressBook;
}

export interface ContractClientOptions {
	attestor: Attestor;
	/** Principal that signs milestone registrations */
	admin: Address;
	logger?: LoggerLike;
}

export interface MilestoneInfo {
	/** Project UUID */
	projectId: string;
	milestoneId: string;
	amountStroops: bigint;
	proofRequired: boolean;
	released: boolean;
	recipientAddress: Address;
}

export interface DepositInfo {
	/** Project UUID */
	projectId: string;
	donorAddress: Address;
	amountStroops: bigint;
	memo?: string;
}

/**
 * Milestone reference: the application's string id or the raw 32 bytes.
 */
export type MilestoneRef = string | Bytes32;

export type StepOutcome = "performed" | "skipped";

export interface DisbursementResult {
	milestoneId: Bytes32;
	/** Approval on the milestone manager */
	approval: StepOutcome;
	/** Payout through the escrow */
	payout: StepOutcome;
	/** Nonce the payout attestation carries */
	payoutNonce: bigint;
}

export interface ReconciliationReport {
	/** Project UUID */
	projectId: string;
	/** Escrow balance still available */
	available: bigint;
	/** Released on the milestone manager, payout not recorded by the escrow */
	awaitingPayout: MilestoneInfo[];
	/** Payout recorded by the escrow, milestone not released */
	paidWithoutApproval: MilestoneInfo[];
}
