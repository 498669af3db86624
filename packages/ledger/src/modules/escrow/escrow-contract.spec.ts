import { SchnorrAttestor, randomNonce } from "../../attestation/attestor.js";
import { LengthOnlyAttestationVerifier } from "../../attestation/verifier.js";
import type { ContractEvent } from "../../runtime/types.js";
import { stringToBytes } from "../../utils/encoding.js";
import {
	DONOR,
	LedgerFixture,
	OTHER_SECRET_KEY,
	RECIPIENT,
	bytes32,
	createLedgerFixture,
	mintTo,
} from "../../testing/fixtures.js";
import { FundingEscrow } from "./escrow-contract.js";

describe("FundingEscrow", () => {
	const projectId = bytes32(1);
	let fx: LedgerFixture;
	let escrow: FundingEscrow;

	const claimAttestation = (
		amount: bigint,
		nonce: bigint = randomNonce(),
		attestor: SchnorrAttestor = fx.attestor,
	) =>
		attestor.attest({
			contract: escrow.address,
			action: "claim",
			projectId,
			amount,
			nonce,
		});

	const releaseAttestation = (recipient: string, amount: bigint) =>
		fx.attestor.attest({
			contract: escrow.address,
			action: "release",
			projectId,
			subject: stringToBytes(recipient),
			amount,
			nonce: randomNonce(),
		});

	const deposit = (amount: bigint, from = DONOR) =>
		escrow.deposit(from, projectId, amount, "donation", { signers: [from] });

	beforeEach(async () => {
		fx = await createLedgerFixture();
		escrow = fx.contracts.escrow;
		await mintTo(fx, DONOR, 10_000n);
	});

	describe("deposit and claim", () => {
		it("should reduce the balance by the claimed amount", async () => {
			await deposit(500n);
			expect(await escrow.getBalance(projectId)).toBe(500n);

			await escrow.claim(projectId, 200n, await claimAttestation(200n));
			expect(await escrow.getBalance(projectId)).toBe(300n);
		});

		it("should reject a claim above the available balance without changing it", async () => {
			await deposit(500n);
			await escrow.claim(projectId, 200n, await claimAttestation(200n));

			await expect(
				escrow.claim(projectId, 600n, await claimAttestation(600n)),
			).rejects.toMatchObject({ code: "INSUFFICIENT_BALANCE" });

			expect(await escrow.getBalance(projectId)).toBe(300n);
			const info = await escrow.getEscrowInfo(projectId);
			expect(info?.totalDeposited).toBe(500n);
			expect(info?.totalClaimed).toBe(200n);
		});

		it("should move deposits into custody and leave them there on claim", async () => {
			await deposit(500n);
			await escrow.claim(projectId, 200n, await claimAttestation(200n));

			expect(await fx.contracts.token.balance(DONOR)).toBe(9_500n);
			expect(await fx.contracts.token.balance(escrow.address)).toBe(500n);
		});

		it("should create the account with the contract-wide attestation key", async () => {
			await deposit(1n);
			const info = await escrow.getEscrowInfo(projectId);
			expect(info?.attestationPubkey).toEqual(fx.attestor.publicKey());
			expect(info?.projectId).toEqual(projectId);
		});

		it("should keep totalClaimed at or below totalDeposited", async () => {
			const steps: Array<["deposit" | "claim", bigint]> = [
				["deposit", 100n],
				["claim", 60n],
				["claim", 60n],
				["deposit", 20n],
				["claim", 60n],
				["claim", 1n],
			];
			for (const [op, amount] of steps) {
				if (op === "deposit") {
					await deposit(amount);
				} else {
					await escrow
						.claim(projectId, amount, await claimAttestation(amount))
						.catch((err: unknown) => {
							expect(err).toMatchObject({ code: "INSUFFICIENT_BALANCE" });
						});
				}
				const info = await escrow.getEscrowInfo(projectId);
				expect(info).not.toBeNull();
				if (info) {
					expect(info.totalClaimed <= info.totalDeposited).toBe(true);
				}
			}
			const info = await escrow.getEscrowInfo(projectId);
			expect(info?.totalDeposited).toBe(120n);
			expect(info?.totalClaimed).toBe(120n);
		});
	});

	describe("validation", () => {
		it("should reject non-positive amounts before touching storage", async () => {
			const entriesBefore = fx.storage.size();
			const sequenceBefore = await fx.host.getSequence();

			await expect(deposit(0n)).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
			await expect(deposit(-5n)).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
			await expect(
				escrow.claim(projectId, 0n, await claimAttestation(0n)),
			).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
			await expect(
				escrow.releaseToRecipient(
					projectId,
					RECIPIENT,
					-1n,
					await releaseAttestation(RECIPIENT, -1n),
				),
			).rejects.toMatchObject({ code: "INVALID_AMOUNT" });

			expect(fx.storage.size()).toBe(entriesBefore);
			expect(await fx.host.getSequence()).toBe(sequenceBefore);
		});

		it("should reject amounts that do not fit in an i128", async () => {
			await expect(deposit(1n << 127n)).rejects.toMatchObject({ code: "INVALID_AMOUNT" });

			await deposit(500n);
			const overflowed = (1n << 128n) + 200n;
			await expect(
				escrow.claim(projectId, overflowed, await claimAttestation(200n)),
			).rejects.toMatchObject({ code: "INVALID_AMOUNT" });
			expect(await escrow.getBalance(projectId)).toBe(500n);
		});

		it("should require the depositor's signature", async () => {
			await expect(
				escrow.deposit(DONOR, projectId, 10n, "", { signers: ["GSOMEONE"] }),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		});

		it("should keep custody out of reach of callers posing as the escrow", async () => {
			await deposit(500n);
			await expect(
				fx.contracts.token.transfer(escrow.address, "GTHIEF", 500n, {
					signers: [escrow.address],
				}),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });

			expect(await fx.contracts.token.balance("GTHIEF")).toBe(0n);
			expect(await fx.contracts.token.balance(escrow.address)).toBe(500n);
		});

		it("should refuse deposits drawn from the escrow's own custody", async () => {
			const mocked = await createLedgerFixture({ mockAllAuths: true });
			const mockedEscrow = mocked.contracts.escrow;
			await mocked.contracts.token.mint(mockedEscrow.address, 500n);

			await expect(
				mockedEscrow.deposit(mockedEscrow.address, bytes32(2), 500n, ""),
			).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
			expect(await mockedEscrow.getEscrowInfo(bytes32(2))).toBeNull();
		});

		it("should report NOT_FOUND when claiming from an unknown project", async () => {
			await expect(
				escrow.claim(projectId, 10n, await claimAttestation(10n)),
			).rejects.toMatchObject({ code: "NOT_FOUND" });
		});

		it("should fail deposits before initialize", async () => {
			const fresh = fx.host.deploy((h, a) => new FundingEscrow(h, a));
			await expect(
				fresh.deposit(DONOR, projectId, 10n, "", { signers: [DONOR] }),
			).rejects.toMatchObject({ code: "NOT_INITIALIZED" });
		});

		it("should initialize only once", async () => {
			await expect(
				escrow.initialize(fx.contracts.token.address, fx.attestor.publicKey()),
			).rejects.toMatchObject({ code: "ALREADY_INITIALIZED" });
		});
	});

	describe("token failures", () => {
		it("should leave escrow and token state untouched when the transfer fails", async () => {
			await mintTo(fx, "GPOOR", 100n);

			await expect(deposit(500n, "GPOOR")).rejects.toMatchObject({
				code: "INSUFFICIENT_FUNDS",
			});

			expect(await escrow.getEscrowInfo(projectId)).toBeNull();
			expect(await fx.contracts.token.balance("GPOOR")).toBe(100n);
			expect(await fx.contracts.token.balance(escrow.address)).toBe(0n);
		});
	});

	describe("releaseToRecipient", () => {
		it("should pay the recipient out of custody", async () => {
			const events: ContractEvent[] = [];
			fx.host.subscribe((event) => events.push(event));
			await deposit(500n);

			await escrow.releaseToRecipient(
				projectId,
				RECIPIENT,
				200n,
				await releaseAttestation(RECIPIENT, 200n),
			);

			expect(await fx.contracts.token.balance(RECIPIENT)).toBe(200n);
			expect(await fx.contracts.token.balance(escrow.address)).toBe(300n);
			expect(await escrow.getBalance(projectId)).toBe(300n);
			expect(events.map((e) => e.topic)).toEqual([
				"transfer",
				"deposit",
				"transfer",
				"release",
			]);
			expect(events[3].data).toEqual({
				projectId: "01".repeat(32),
				recipient: RECIPIENT,
				amount: 200n,
			});
		});

		it("should reject an attestation issued for another recipient", async () => {
			await deposit(500n);
			await expect(
				escrow.releaseToRecipient(
					projectId,
					"GMALLORY",
					200n,
					await releaseAttestation(RECIPIENT, 200n),
				),
			).rejects.toMatchObject({ code: "INVALID_ATTESTATION" });
			expect(await fx.contracts.token.balance("GMALLORY")).toBe(0n);
		});
	});

	describe("attestations", () => {
		beforeEach(async () => {
			await deposit(500n);
		});

		it("should reject a replayed nonce", async () => {
			const attestation = await claimAttestation(100n, 42n);
			await escrow.claim(projectId, 100n, attestation);

			await expect(escrow.claim(projectId, 100n, attestation)).rejects.toMatchObject({
				code: "INVALID_ATTESTATION",
			});
			expect(await escrow.isNonceUsed(42n)).toBe(true);
			expect((await escrow.getEscrowInfo(projectId))?.totalClaimed).toBe(100n);
		});

		it("should reject an attestation signed for a different amount", async () => {
			const attestation = await claimAttestation(100n, 7n);
			await expect(escrow.claim(projectId, 150n, attestation)).rejects.toMatchObject({
				code: "INVALID_ATTESTATION",
			});
			expect(await escrow.isNonceUsed(7n)).toBe(false);
		});

		it("should reject attestations shorter than a signature", async () => {
			await expect(
				escrow.claim(projectId, 10n, new Uint8Array(10)),
			).rejects.toMatchObject({ code: "INVALID_ATTESTATION" });
		});

		it("should verify against a rotated key", async () => {
			const next = new SchnorrAttestor(OTHER_SECRET_KEY);
			const rotation = await fx.attestor.attest({
				contract: escrow.address,
				action: "rotate-key",
				projectId,
				subject: next.publicKey(),
				amount: 0n,
				nonce: randomNonce(),
			});
			await escrow.setAttestationKey(projectId, next.publicKey(), rotation);

			await expect(
				escrow.claim(projectId, 10n, await claimAttestation(10n)),
			).rejects.toMatchObject({ code: "INVALID_ATTESTATION" });
			await escrow.claim(projectId, 10n, await claimAttestation(10n, 1n, next));
			expect(await escrow.getBalance(projectId)).toBe(490n);
		});
	});

	describe("funding state", () => {
		it("should move between funded and depleted", async () => {
			expect(await escrow.getFundingState(projectId)).toBe("uninitialized");
			await deposit(500n);
			expect(await escrow.getFundingState(projectId)).toBe("funded");
			await escrow.claim(projectId, 500n, await claimAttestation(500n));
			expect(await escrow.getFundingState(projectId)).toBe("depleted");
			await deposit(100n);
			expect(await escrow.getFundingState(projectId)).toBe("funded");
		});

		it("should report zero for projects that never received a deposit", async () => {
			const unknown = bytes32(99);
			expect(await escrow.getBalance(unknown)).toBe(0n);
			expect(await escrow.getEscrowInfo(unknown)).toBeNull();
		});
	});

	describe("length-only scheme", () => {
		beforeEach(async () => {
			fx = await createLedgerFixture({ verifier: new LengthOnlyAttestationVerifier() });
			escrow = fx.contracts.escrow;
			await mintTo(fx, DONOR, 1_000n);
			await deposit(500n);
		});

		it("should accept any value of at least 64 bytes, repeatedly", async () => {
			const placeholder = new Uint8Array(64);
			await escrow.claim(projectId, 100n, placeholder);
			await escrow.claim(projectId, 100n, placeholder);
			expect(await escrow.getBalance(projectId)).toBe(300n);
		});

		it("should still reject values shorter than 64 bytes", async () => {
			await expect(
				escrow.claim(projectId, 100n, new Uint8Array(63)),
			).rejects.toMatchObject({ code: "INVALID_ATTESTATION" });
		});
	});
});
