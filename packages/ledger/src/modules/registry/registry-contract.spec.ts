import { LedgerHost } from "../../runtime/host.js";
import { ManualClock } from "../../runtime/clock.js";
import { MemoryStorageAdapter } from "../../storage/memory-adapter.js";
import { ProjectRegistry } from "./registry-contract.js";

describe("ProjectRegistry", () => {
	const owner = "GOWNER";
	const projectId = new Uint8Array(32).fill(0xab);
	let storage: MemoryStorageAdapter;
	let clock: ManualClock;
	let registry: ProjectRegistry;

	beforeEach(() => {
		storage = new MemoryStorageAdapter();
		clock = new ManualClock(1_700_000_500);
		const host = new LedgerHost({ storage, clock });
		registry = host.deploy((h, a) => new ProjectRegistry(h, a));
	});

	it("should register a project stamped with the ledger time", async () => {
		await registry.register(owner, projectId, "ipfs://meta", { signers: [owner] });

		expect(await registry.getProject(projectId)).toEqual({
			projectId,
			owner,
			metadataUri: "ipfs://meta",
			registeredAt: 1_700_000_500,
		});
		expect(await registry.getProjectCount()).toBe(1);
	});

	it("should reject a second registration without changing state", async () => {
		await registry.register(owner, projectId, "ipfs://meta", { signers: [owner] });
		const entries = storage.size();
		clock.advance(10);

		await expect(
			registry.register("GOTHER", projectId, "ipfs://other", { signers: ["GOTHER"] }),
		).rejects.toMatchObject({ code: "ALREADY_REGISTERED" });

		expect(storage.size()).toBe(entries);
		expect(await registry.getProjectCount()).toBe(1);
		expect((await registry.getProject(projectId))?.owner).toBe(owner);
	});

	it("should require the owner's signature to register", async () => {
		await expect(
			registry.register(owner, projectId, "ipfs://meta", { signers: ["GOTHER"] }),
		).rejects.toMatchObject({ code: "UNAUTHORIZED" });
		expect(await registry.getProjectCount()).toBe(0);
	});

	it("should count each registered project once", async () => {
		for (let i = 1; i <= 3; i++) {
			await registry.register(owner, new Uint8Array(32).fill(i), `ipfs://${i}`, {
				signers: [owner],
			});
		}
		expect(await registry.getProjectCount()).toBe(3);
	});

	describe("updateMetadata", () => {
		beforeEach(async () => {
			await registry.register(owner, projectId, "ipfs://meta", { signers: [owner] });
		});

		it("should let the stored owner replace the uri", async () => {
			clock.advance(100);
			await registry.updateMetadata(projectId, "ipfs://meta-v2", { signers: [owner] });

			const project = await registry.getProject(projectId);
			expect(project?.metadataUri).toBe("ipfs://meta-v2");
			expect(project?.registeredAt).toBe(1_700_000_500);
		});

		it("should reject anyone else", async () => {
			await expect(
				registry.updateMetadata(projectId, "ipfs://evil", { signers: ["GOTHER"] }),
			).rejects.toMatchObject({ code: "UNAUTHORIZED" });
			expect((await registry.getProject(projectId))?.metadataUri).toBe("ipfs://meta");
		});

		it("should report NOT_FOUND for unknown projects", async () => {
			await expect(
				registry.updateMetadata(new Uint8Array(32), "ipfs://x", { signers: [owner] }),
			).rejects.toMatchObject({ code: "NOT_FOUND" });
		});
	});

	it("should return null for unknown projects", async () => {
		expect(await registry.getProject(new Uint8Array(32))).toBeNull();
	});

	it("should reject ids that are not 32 bytes", async () => {
		await expect(
			registry.register(owner, new Uint8Array(16), "ipfs://meta", { signers: [owner] }),
		).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
	});
});
