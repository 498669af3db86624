import { randomNonce } from "../../attestation/attestor.js";
import type { ContractEvent } from "../../runtime/types.js";
import { stringToBytes } from "../../utils/encoding.js";
import {
	ADMIN,
	LedgerFixture,
	RECIPIENT,
	START_TIME,
	bytes32,
	createLedgerFixture,
} from "../../testing/fixtures.js";
import { MilestoneManager } from "./milestone-contract.js";

describe("MilestoneManager", () => {
	const projectId = bytes32(1);
	const first = bytes32(0x11);
	const second = bytes32(0x12);
	let fx: LedgerFixture;
	let manager: MilestoneManager;

	const register = (milestoneId: Uint8Array, amount: bigint, proofRequired = false) =>
		manager.registerMilestone(projectId, milestoneId, amount, proofRequired, RECIPIENT, {
			signers: [ADMIN],
		});

	const approval = (milestoneId: Uint8Array, amount: bigint) =>
		fx.attestor.attest({
			contract: manager.address,
			action: "release-milestone",
			projectId,
			milestoneId,
			subject: stringToBytes(RECIPIENT),
			amount,
			nonce: randomNonce(),
		});

	const release = async (milestoneId: Uint8Array, amount: bigint) =>
		manager.releaseMilestone(milestoneId, await approval(milestoneId, amount));

	beforeEach(async () => {
		fx = await createLedgerFixture();
		manager = fx.contracts.milestones;
	});

	describe("summary", () => {
		it("should aggregate registrations and releases", async () => {
			await register(first, 300n);
			await register(second, 700n);

			expect(await manager.getProjectMilestones(projectId)).toEqual({
				totalMilestones: 2,
				releasedMilestones: 0,
				totalAmount: 1_000n,
				releasedAmount: 0n,
			});

			await release(first, 300n);
			await release(second, 700n);

			expect(await manager.getProjectMilestones(projectId)).toEqual({
				totalMilestones: 2,
				releasedMilestones: 2,
				totalAmount: 1_000n,
				releasedAmount: 1_000n,
			});
			expect(await manager.getProjectReleasedAmount(projectId)).toBe(1_000n);
		});

		it("should return empty reads for unknown projects", async () => {
			expect(await manager.getProjectMilestones(bytes32(2))).toBeNull();
			expect(await manager.getProjectReleasedAmount(bytes32(2))).toBe(0n);
			expect(await manager.listProjectMilestones(bytes32(2))).toEqual([]);
		});

		it("should list milestones in registration order", async () => {
			await register(second, 700n);
			await register(first, 300n);

			const list = await manager.listProjectMilestones(projectId);
			expect(list.map((m) => m.milestoneId)).toEqual([second, first]);
		});
	});

	describe("registerMilestone", () => {
		it("should persist the milestone unreleased", async () => {
			await register(first, 300n, true);
			expect(await manager.getMilestone(first)).toEqual({
				projectId,
				milestoneId: first,
				amount: 300n,
				proofRequired: true,
				proofSubmitted: false,
				proofUri: null,
				released: false,
				releasedAt: 0,
				recipient: RECIPIENT,
			});
		});

		it("should reject a duplicate id without touching the summary", async () => {
			await register(first, 300n);
			await expect(register(first, 500n)).rejects.toMatchObject({
				code: "ALREADY_EXISTS",
			});
			expect(await manager.getProjectMilestones(projectId)).toEqual({
				totalMilestones: 1,
				releasedMilestones: 0,
				totalAmount: 300n,
				releasedAmount: 0n,
			});
		});

		it("should require the admin's signature", async () => {
			await expect(
				manager.registerMilestone(projectId, first, 300n, false, RECIPIENT, {
					signers: [RECIPIENT],
				}),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("should reject non-positive amounts", async () => {
			await expect(register(first, 0n)).rejects.toMatchObject({
				code: "INVALID_AMOUNT",
			});
			expect(await manager.getMilestone(first)).toBeNull();
		});

		it("should fail before initialize", async () => {
			const fresh = fx.host.deploy((h, a) => new MilestoneManager(h, a));
			await expect(
				fresh.registerMilestone(projectId, first, 300n, false, RECIPIENT, {
					signers: [ADMIN],
				}),
			).rejects.toMatchObject({ code: "NOT_INITIALIZED" });
		});

		it("should initialize only once", async () => {
			await expect(
				manager.initialize(ADMIN, fx.attestor.publicKey()),
			).rejects.toMatchObject({ code: "ALREADY_INITIALIZED" });
		});
	});

	describe("releaseMilestone", () => {
		it("should release once and keep the first release time", async () => {
			await register(first, 300n);

			const released = await release(first, 300n);
			expect(released.released).toBe(true);
			expect(released.releasedAt).toBe(START_TIME);

			fx.clock.advance(60);
			await expect(release(first, 300n)).rejects.toMatchObject({
				code: "ALREADY_RELEASED",
			});
			expect((await manager.getMilestone(first))?.releasedAt).toBe(START_TIME);
		});

		it("should publish the release", async () => {
			const events: ContractEvent[] = [];
			fx.host.subscribe((event) => events.push(event));
			await register(first, 300n);
			await release(first, 300n);

			expect(events[1]).toMatchObject({
				contract: manager.address,
				topic: "milestone_released",
				timestamp: START_TIME,
				data: {
					projectId: "01".repeat(32),
					milestoneId: "11".repeat(32),
					amount: 300n,
					recipient: RECIPIENT,
					releasedAt: START_TIME,
				},
			});
		});

		it("should report NOT_FOUND for unknown milestones", async () => {
			await expect(release(first, 300n)).rejects.toMatchObject({ code: "NOT_FOUND" });
		});

		it("should reject an attestation for another amount", async () => {
			await register(first, 300n);
			await expect(
				manager.releaseMilestone(first, await approval(first, 301n)),
			).rejects.toMatchObject({ code: "INVALID_ATTESTATION" });
			expect((await manager.getMilestone(first))?.released).toBe(false);
		});

		it("should not require proof to release", async () => {
			await register(first, 300n, true);
			const released = await release(first, 300n);
			expect(released.released).toBe(true);
			expect(released.proofSubmitted).toBe(false);
		});
	});

	describe("proof and canReleaseMilestone", () => {
		it("should be false for unknown milestones", async () => {
			expect(await manager.canReleaseMilestone(first)).toBe(false);
		});

		it("should allow release of milestones without proof requirement", async () => {
			await register(first, 300n);
			expect(await manager.canReleaseMilestone(first)).toBe(true);
			await release(first, 300n);
			expect(await manager.canReleaseMilestone(first)).toBe(false);
		});

		it("should wait for proof when one is required", async () => {
			await register(first, 300n, true);
			expect(await manager.canReleaseMilestone(first)).toBe(false);

			const updated = await manager.submitProof(first, "ipfs://proof", {
				signers: [RECIPIENT],
			});
			expect(updated.proofSubmitted).toBe(true);
			expect(updated.proofUri).toBe("ipfs://proof");
			expect(await manager.canReleaseMilestone(first)).toBe(true);
		});

		it("should accept proof from the recipient only", async () => {
			await register(first, 300n, true);
			await expect(
				manager.submitProof(first, "ipfs://proof", { signers: [ADMIN] }),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("should reject proof that is not required or already submitted", async () => {
			await register(first, 300n, false);
			await register(second, 700n, true);
			const options = { signers: [RECIPIENT] };

			await expect(manager.submitProof(first, "ipfs://a", options)).rejects.toMatchObject({
				code: "PROOF_NOT_REQUIRED",
			});
			await manager.submitProof(second, "ipfs://b", options);
			await expect(manager.submitProof(second, "ipfs://c", options)).rejects.toMatchObject({
				code: "PROOF_ALREADY_SUBMITTED",
			});
			expect((await manager.getMilestone(second))?.proofUri).toBe("ipfs://b");
		});

		it("should reject proof after release", async () => {
			await register(first, 300n, true);
			await release(first, 300n);
			await expect(
				manager.submitProof(first, "ipfs://late", { signers: [RECIPIENT] }),
			).rejects.toMatchObject({ code: "ALREADY_RELEASED" });
		});
	});
});
