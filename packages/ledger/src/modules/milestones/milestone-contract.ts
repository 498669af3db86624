/**
 * Milestone Manager Contract
 *
 * Tracks funding milestones per project and their approval state. Releasing
 * a milestone approves it; the funds themselves move through FundingEscrow
 * in a separate invocation.
 */

import {
	Address,
	Bytes32,
	XOnlyPubKey,
	assertAddress,
	assertBytes32,
	assertPositiveAmount,
	idToHex,
} from "../../core/types.js";
import { ContractError } from "../../contracts/types.js";
import { Contract } from "../../runtime/contract.js";
import type { LedgerHost } from "../../runtime/host.js";
import type { InvocationEnv } from "../../runtime/invocation.js";
import type { CallOptions } from "../../runtime/types.js";
import { StorageError } from "../../storage/types.js";
import type { StorageValue } from "../../storage/codec.js";
import { consumeAttestation } from "../../attestation/guard.js";
import type { AttestationVerifier } from "../../attestation/types.js";
import { SchnorrAttestationVerifier } from "../../attestation/verifier.js";
import { stringToBytes } from "../../utils/encoding.js";
import { isReleasable, milestoneMachine } from "./milestone-state-machine.js";
import {
	Milestone,
	MilestoneManagerOptions,
	ProjectMilestonesSummary,
	emptySummary,
	milestoneFromRecord,
	milestoneToRecord,
	summaryFromRecord,
	summaryToRecord,
} from "./types.js";

const ADMIN_KEY = "Admin";
const ATTESTATION_KEY = "AttestationKey";

function milestoneKey(milestoneId: Bytes32): string {
	return `Milestone:${idToHex(milestoneId)}`;
}

function summaryKey(projectId: Bytes32): string {
	return `Summary:${idToHex(projectId)}`;
}

function indexKey(projectId: Bytes32): string {
	return `ProjectMilestones:${idToHex(projectId)}`;
}

/**
 * @example
 * ```typescript
 * const manager = host.deploy((h, address) => new MilestoneManager(h, address));
 * await manager.initialize(admin, attestor.publicKey());
 *
 * await manager.registerMilestone(projectId, milestoneId, 300n, false, recipient, {
 *   signers: [admin],
 * });
 * const attestation = await attestor.attest({
 *   contract: manager.address,
 *   action: "release-milestone",
 *   projectId,
 *   milestoneId,
 *   subject: stringToBytes(recipient),
 *   amount: 300n,
 *   nonce: randomNonce(),
 * });
 * await manager.releaseMilestone(milestoneId, attestation);
 * ```
 */
export class MilestoneManager extends Contract {
	private readonly verifier: AttestationVerifier;

	constructor(
		host: LedgerHost,
		address: Address,
		options: MilestoneManagerOptions = {},
	) {
		super(host, address);
		this.verifier = options.verifier ?? new SchnorrAttestationVerifier();
		if (this.verifier.scheme === "length-only") {
			options.logger?.warn(
				`MilestoneManager ${address} accepts unverified attestations (length-only scheme)`,
			);
		}
	}

	async initialize(
		admin: Address,
		attestationKey: XOnlyPubKey,
		options?: CallOptions,
	): Promise<void> {
		await this.invoke("initialize", options, async (env) => {
			if (await env.instance().has(ADMIN_KEY)) {
				throw new ContractError(
					"Milestone manager already initialized",
					"ALREADY_INITIALIZED",
				);
			}
			assertAddress(admin, "admin");
			assertBytes32(attestationKey, "attestationKey");
			env.instance().set(ADMIN_KEY, admin);
			env.instance().set(ATTESTATION_KEY, attestationKey);
		});
	}

	// ==================== Lifecycle ====================

	async registerMilestone(
		projectId: Bytes32,
		milestoneId: Bytes32,
		amount: bigint,
		proofRequired: boolean,
		recipient: Address,
		options?: CallOptions,
	): Promise<Milestone> {
		return this.invoke("register_milestone", options, async (env) => {
			const admin = await env.instance().get(ADMIN_KEY);
			if (typeof admin !== "string") {
				throw new ContractError("Milestone manager not initialized", "NOT_INITIALIZED");
			}
			env.requireAuth(admin);
			assertBytes32(projectId, "projectId");
			assertBytes32(milestoneId, "milestoneId");
			assertPositiveAmount(amount);
			assertAddress(recipient, "recipient");

			if (await env.persistent().has(milestoneKey(milestoneId))) {
				throw new ContractError("Milestone already exists", "ALREADY_EXISTS", {
					milestoneId: idToHex(milestoneId),
				});
			}

			const milestone: Milestone = {
				projectId,
				milestoneId,
				amount,
				proofRequired,
				proofSubmitted: false,
				proofUri: null,
				released: false,
				releasedAt: 0,
				recipient,
			};
			env.persistent().set(milestoneKey(milestoneId), milestoneToRecord(milestone));

			const ids = await loadIndex(env, projectId);
			env.persistent().set(indexKey(projectId), [...ids, milestoneId]);

			const summary = (await loadSummary(env, projectId)) ?? emptySummary();
			saveSummary(env, projectId, {
				...summary,
				totalMilestones: summary.totalMilestones + 1,
				totalAmount: summary.totalAmount + amount,
			});

			env.publish("milestone_registered", {
				projectId: idToHex(projectId),
				milestoneId: idToHex(milestoneId),
				amount,
				proofRequired,
				recipient,
			});
			return milestone;
		});
	}

	/**
	 * Record the recipient's proof for a milestone that asks for one.
	 */
	async submitProof(
		milestoneId: Bytes32,
		proofUri: string,
		options?: CallOptions,
	): Promise<Milestone> {
		return this.invoke("submit_proof", options, async (env) => {
			const milestone = await requireMilestone(env, milestoneId);
			const machine = milestoneMachine(milestone);
			if (machine.isFinal()) {
				throw alreadyReleased(milestoneId);
			}
			env.requireAuth(milestone.recipient);
			if (!milestone.proofRequired) {
				throw new ContractError(
					"Milestone does not require proof",
					"PROOF_NOT_REQUIRED",
					{ milestoneId: idToHex(milestoneId) },
				);
			}
			if (!machine.canPerform("submit-proof")) {
				throw new ContractError(
					"Proof already submitted",
					"PROOF_ALREADY_SUBMITTED",
					{ milestoneId: idToHex(milestoneId) },
				);
			}
			if (proofUri.trim().length === 0) {
				throw new ContractError("proofUri must not be empty", "INVALID_ARGUMENT");
			}
			machine.perform("submit-proof", milestone);

			const updated: Milestone = { ...milestone, proofSubmitted: true, proofUri };
			env.persistent().set(milestoneKey(milestoneId), milestoneToRecord(updated));
			env.publish("proof_submitted", {
				projectId: idToHex(milestone.projectId),
				milestoneId: idToHex(milestoneId),
				proofUri,
			});
			return updated;
		});
	}

	/**
	 * Approve a milestone for payout. Does not move funds.
	 */
	async releaseMilestone(
		milestoneId: Bytes32,
		attestationSignature: Uint8Array,
		options?: CallOptions,
	): Promise<Milestone> {
		return this.invoke("release_milestone", options, async (env) => {
			const milestone = await requireMilestone(env, milestoneId);
			const machine = milestoneMachine(milestone);
			if (machine.isFinal()) {
				throw alreadyReleased(milestoneId);
			}
			const key = await env.instance().get(ATTESTATION_KEY);
			if (!(key instanceof Uint8Array)) {
				throw new ContractError("Milestone manager not initialized", "NOT_INITIALIZED");
			}
			await consumeAttestation(
				env,
				this.verifier,
				attestationSignature,
				{
					contract: this.address,
					action: "release-milestone",
					projectId: milestone.projectId,
					milestoneId,
					subject: stringToBytes(milestone.recipient),
					amount: milestone.amount,
				},
				key,
			);
			machine.perform("release", milestone);

			const updated: Milestone = {
				...milestone,
				released: true,
				releasedAt: env.ledger.timestamp,
			};
			env.persistent().set(milestoneKey(milestoneId), milestoneToRecord(updated));

			const summary = (await loadSummary(env, milestone.projectId)) ?? emptySummary();
			saveSummary(env, milestone.projectId, {
				...summary,
				releasedMilestones: summary.releasedMilestones + 1,
				releasedAmount: summary.releasedAmount + milestone.amount,
			});

			env.publish("milestone_released", {
				projectId: idToHex(milestone.projectId),
				milestoneId: idToHex(milestoneId),
				amount: milestone.amount,
				recipient: milestone.recipient,
				releasedAt: updated.releasedAt,
			});
			return updated;
		});
	}

	// ==================== Reads ====================

	getMilestone(milestoneId: Bytes32): Promise<Milestone | null> {
		return this.query("get_milestone", (env) => loadMilestone(env, milestoneId));
	}

	getProjectMilestones(projectId: Bytes32): Promise<ProjectMilestonesSummary | null> {
		return this.query("get_project_milestones", (env) => loadSummary(env, projectId));
	}

	getProjectReleasedAmount(projectId: Bytes32): Promise<bigint> {
		return this.query("get_project_released_amount", async (env) => {
			const summary = await loadSummary(env, projectId);
			return summary?.releasedAmount ?? 0n;
		});
	}

	/**
	 * A project's milestones in registration order.
	 */
	listProjectMilestones(projectId: Bytes32): Promise<Milestone[]> {
		return this.query("list_project_milestones", async (env) => {
			const ids = await loadIndex(env, projectId);
			const milestones: Milestone[] = [];
			for (const id of ids) {
				milestones.push(await requireMilestone(env, id));
			}
			return milestones;
		});
	}

	/**
	 * Advisory read for reconciliation: not yet released and carrying its
	 * proof when one is required. `releaseMilestone` does not consult it.
	 */
	canReleaseMilestone(milestoneId: Bytes32): Promise<boolean> {
		return this.query("can_release_milestone", async (env) => {
			const milestone = await loadMilestone(env, milestoneId);
			return milestone !== null && isReleasable(milestone);
		});
	}

	getAdmin(): Promise<Address | null> {
		return this.query("get_admin", async (env) => {
			const admin = await env.instance().get(ADMIN_KEY);
			return typeof admin === "string" ? admin : null;
		});
	}
}

// ==================== Storage helpers ====================

async function loadMilestone(
	env: InvocationEnv,
	milestoneId: Bytes32,
): Promise<Milestone | null> {
	assertBytes32(milestoneId, "milestoneId");
	const stored = await env.persistent().get(milestoneKey(milestoneId));
	return stored === null ? null : milestoneFromRecord(stored);
}

async function requireMilestone(
	env: InvocationEnv,
	milestoneId: Bytes32,
): Promise<Milestone> {
	const milestone = await loadMilestone(env, milestoneId);
	if (!milestone) {
		throw new ContractError("Milestone not found", "NOT_FOUND", {
			milestoneId: idToHex(milestoneId),
		});
	}
	return milestone;
}

async function loadSummary(
	env: InvocationEnv,
	projectId: Bytes32,
): Promise<ProjectMilestonesSummary | null> {
	assertBytes32(projectId, "projectId");
	const stored = await env.persistent().get(summaryKey(projectId));
	return stored === null ? null : summaryFromRecord(stored);
}

function saveSummary(
	env: InvocationEnv,
	projectId: Bytes32,
	summary: ProjectMilestonesSummary,
): void {
	env.persistent().set(summaryKey(projectId), summaryToRecord(summary));
}

async function loadIndex(env: InvocationEnv, projectId: Bytes32): Promise<Bytes32[]> {
	assertBytes32(projectId, "projectId");
	return idsFromValue(await env.persistent().get(indexKey(projectId)));
}

function idsFromValue(value: StorageValue): Bytes32[] {
	if (value === null) return [];
	if (!Array.isArray(value)) {
		throw new StorageError("Stored milestone index is not a list", "DECODE_ERROR");
	}
	return value.map((id) => {
		if (!(id instanceof Uint8Array)) {
			throw new StorageError("Stored milestone id is not bytes", "DECODE_ERROR");
		}
		return id;
	});
}

function alreadyReleased(milestoneId: Bytes32): ContractError {
	return new ContractError("Milestone already released", "ALREADY_RELEASED", {
		milestoneId: idToHex(milestoneId),
	});
}
