/**
 * Contract Client
 *
 * Off-chain coordinator for the registry, escrow and milestone manager.
 * Calls across contracts are separate invocations, so every multi-step
 * operation here is written to be retried: each step checks the ledger
 * before acting and treats "already done" as success.
 */

import type { Address, Bytes32 } from "../core/types.js";
import { ContractError, isContractError } from "../contracts/types.js";
import { milestonePayoutNonce, randomNonce } from "../attestation/attestor.js";
import type { LoggerLike } from "../runtime/types.js";
import { stringToBytes } from "../utils/encoding.js";
import type { EscrowAccount } from "../modules/escrow/types.js";
import type { Milestone } from "../modules/milestones/types.js";
import type { Project } from "../modules/registry/types.js";
import {
	milestoneIdToString,
	projectIdFromUuid,
	toMilestoneId,
	uuidFromProjectId,
} from "./ids.js";
import type {
	Attestor,
	ContractAddressBook,
	ContractClientOptions,
	ContractName,
	DeployedContracts,
	DepositInfo,
	DisbursementResult,
	MilestoneInfo,
	MilestoneRef,
	ReconciliationReport,
	StepOutcome,
} from "./types.js";

export type MilestoneRegistration = "registered" | "already-registered";

export class ContractClient {
	private readonly attestor: Attestor;
	private readonly admin: Address;
	private readonly logger?: LoggerLike;

	constructor(
		private readonly contracts: DeployedContracts,
		options: ContractClientOptions,
	) {
		this.attestor = options.attestor;
		this.admin = options.admin;
		this.logger = options.logger;
	}

	getContractAddress(name: ContractName): Address {
		return this.contracts.addresses[name];
	}

	getContracts(): ContractAddressBook {
		return { ...this.contracts.addresses };
	}

	// ==================== Projects & deposits ====================

	registerProject(
		owner: Address,
		projectUuid: string,
		metadataUri: string,
	): Promise<Project> {
		return this.contracts.registry.register(
			owner,
			projectIdFromUuid(projectUuid),
			metadataUri,
			{ signers: [owner] },
		);
	}

	/**
	 * Deposit on behalf of a donor who signed the transfer.
	 */
	recordDeposit(deposit: DepositInfo): Promise<EscrowAccount> {
		return this.contracts.escrow.deposit(
			deposit.donorAddress,
			projectIdFromUuid(deposit.projectId),
			deposit.amountStroops,
			deposit.memo ?? "",
			{ signers: [deposit.donorAddress] },
		);
	}

	getProjectBalance(projectUuid: string): Promise<bigint> {
		return this.contracts.escrow.getBalance(projectIdFromUuid(projectUuid));
	}

	async getProjectMilestones(projectUuid: string): Promise<MilestoneInfo[]> {
		const milestones = await this.contracts.milestones.listProjectMilestones(
			projectIdFromUuid(projectUuid),
		);
		return milestones.map(toMilestoneInfo);
	}

	// ==================== Milestones ====================

	/**
	 * Register a milestone. Retrying after an interrupted call is safe: an
	 * existing milestone with the same terms counts as registered, one with
	 * different terms is a conflict and the error is rethrown.
	 */
	async registerMilestone(info: MilestoneInfo): Promise<MilestoneRegistration> {
		const projectId = projectIdFromUuid(info.projectId);
		const milestoneId = toMilestoneId(info.milestoneId);
		try {
			await this.contracts.milestones.registerMilestone(
				projectId,
				milestoneId,
				info.amountStroops,
				info.proofRequired,
				info.recipientAddress,
				{ signers: [this.admin] },
			);
			return "registered";
		} catch (err) {
			if (!isContractError(err, "ALREADY_EXISTS")) throw err;
			const stored = await this.contracts.milestones.getMilestone(milestoneId);
			if (!stored || !sameTerms(stored, info)) throw err;
			this.logger?.debug?.(`Milestone ${info.milestoneId} already registered`);
			return "already-registered";
		}
	}

	/**
	 * Approve a milestone on the milestone manager. Does not pay it out.
	 */
	async releaseMilestone(ref: MilestoneRef): Promise<Milestone> {
		const milestone = await this.requireMilestone(toMilestoneId(ref));
		return this.approve(milestone);
	}

	/**
	 * Approve a milestone and pay its recipient from the project's escrow.
	 *
	 * Both steps are skipped when the ledger shows them done, so a
	 * disbursement interrupted between steps resumes where it stopped. The
	 * payout attestation carries a nonce derived from the milestone id; once
	 * the escrow has consumed it, the payout cannot run again.
	 */
	async disburseMilestone(ref: MilestoneRef): Promise<DisbursementResult> {
		const milestoneId = toMilestoneId(ref);
		const milestone = await this.requireMilestone(milestoneId);
		const { escrow } = this.contracts;

		let approval: StepOutcome = "skipped";
		if (!milestone.released) {
			try {
				await this.approve(milestone);
				approval = "performed";
			} catch (err) {
				if (!isContractError(err, "ALREADY_RELEASED")) throw err;
			}
		}

		const payoutNonce = milestonePayoutNonce(milestoneId);
		let payout: StepOutcome = "skipped";
		if (!(await escrow.isNonceUsed(payoutNonce))) {
			const attestation = await this.attestor.attest({
				contract: escrow.address,
				action: "release",
				projectId: milestone.projectId,
				subject: stringToBytes(milestone.recipient),
				amount: milestone.amount,
				nonce: payoutNonce,
			});
			try {
				await escrow.releaseToRecipient(
					milestone.projectId,
					milestone.recipient,
					milestone.amount,
					attestation,
				);
				payout = "performed";
			} catch (err) {
				// A concurrent disbursement consumed the nonce first.
				const raced =
					isContractError(err, "INVALID_ATTESTATION") &&
					(await escrow.isNonceUsed(payoutNonce));
				if (!raced) throw err;
			}
		}

		this.logger?.log(
			`Disbursed milestone ${milestoneIdToString(milestoneId)}: approval ${approval}, payout ${payout}`,
		);
		return { milestoneId, approval, payout, payoutNonce };
	}

	/**
	 * True when the milestone is released but the escrow has not consumed its
	 * payout nonce yet.
	 */
	async isAwaitingPayout(ref: MilestoneRef): Promise<boolean> {
		const milestoneId = toMilestoneId(ref);
		const milestone = await this.contracts.milestones.getMilestone(milestoneId);
		if (!milestone?.released) return false;
		return !(await this.contracts.escrow.isNonceUsed(milestonePayoutNonce(milestoneId)));
	}

	/**
	 * Compare milestone approvals with escrow payouts for one project.
	 */
	async reconcileProject(projectUuid: string): Promise<ReconciliationReport> {
		const projectId = projectIdFromUuid(projectUuid);
		const { escrow, milestones } = this.contracts;
		const list = await milestones.listProjectMilestones(projectId);

		const awaitingPayout: MilestoneInfo[] = [];
		const paidWithoutApproval: MilestoneInfo[] = [];
		for (const milestone of list) {
			const paid = await escrow.isNonceUsed(milestonePayoutNonce(milestone.milestoneId));
			if (milestone.released && !paid) {
				awaitingPayout.push(toMilestoneInfo(milestone));
			} else if (!milestone.released && paid) {
				paidWithoutApproval.push(toMilestoneInfo(milestone));
			}
		}

		return {
			projectId: uuidFromProjectId(projectId),
			available: await escrow.getBalance(projectId),
			awaitingPayout,
			paidWithoutApproval,
		};
	}

	// ==================== Internals ====================

	private async requireMilestone(milestoneId: Bytes32): Promise<Milestone> {
		const milestone = await this.contracts.milestones.getMilestone(milestoneId);
		if (!milestone) {
			throw new ContractError("Milestone not found", "NOT_FOUND", {
				milestoneId: milestoneIdToString(milestoneId),
			});
		}
		return milestone;
	}

	private async approve(milestone: Milestone): Promise<Milestone> {
		const { milestones } = this.contracts;
		const attestation = await this.attestor.attest({
			contract: milestones.address,
			action: "release-milestone",
			projectId: milestone.projectId,
			milestoneId: milestone.milestoneId,
			subject: stringToBytes(milestone.recipient),
			amount: milestone.amount,
			nonce: randomNonce(),
		});
		return milestones.releaseMilestone(milestone.milestoneId, attestation);
	}
}

function toMilestoneInfo(milestone: Milestone): MilestoneInfo {
	return {
		projectId: uuidFromProjectId(milestone.projectId),
		milestoneId: milestoneIdToString(milestone.milestoneId),
		amountStroops: milestone.amount,
		proofRequired: milestone.proofRequired,
		released: milestone.released,
		recipientAddress: milestone.recipient,
	};
}

function sameTerms(stored: Milestone, info: MilestoneInfo): boolean {
	return (
		uuidFromProjectId(stored.projectId) === info.projectId.toLowerCase() &&
		stored.amount === info.amountStroops &&
		stored.proofRequired === info.proofRequired &&
		stored.recipient === info.recipientAddress
	);
}
