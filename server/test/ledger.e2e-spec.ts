import { Test, TestingModule } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	DeployedContracts,
	StorageAdapter,
	bytesToHex,
	milestoneIdFromString,
} from "@fundchain/ledger";
import { DEPOSIT_RECEIVED_ID, LedgerEvent } from "../src/common/ledger.event";
import {
	CONTRACT_ADDRESSES,
	LEDGER_CONTRACTS,
	LEDGER_STORAGE,
} from "../src/ledger/ledger.constants";
import { ContractClientService } from "../src/orchestrator/contract-client.service";
import { DisbursementWatcher } from "../src/orchestrator/disbursement-watcher.service";

describe("Ledger host (e2e)", () => {
	const projectUuid = "3f2504e0-4f89-41d3-9a0c-0305e82c3301";
	let moduleRef: TestingModule;
	let client: ContractClientService;
	let contracts: DeployedContracts;
	let storage: StorageAdapter;
	let watcher: DisbursementWatcher;
	let events: EventEmitter2;

	beforeAll(async () => {
		process.env.NODE_ENV = "test";
		process.env.ATTESTATION_SECRET_KEY = "07".repeat(32);
		process.env.ADMIN_ADDRESS = "GADMIN";
		process.env.RECONCILE_INTERVAL_MS = "60000";

		// configuration is validated when the module is loaded
		const { AppModule } = await import("../src/app.module.js");
		moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
		await moduleRef.init();

		client = moduleRef.get(ContractClientService);
		contracts = moduleRef.get<DeployedContracts>(LEDGER_CONTRACTS);
		storage = moduleRef.get<StorageAdapter>(LEDGER_STORAGE);
		watcher = moduleRef.get(DisbursementWatcher);
		events = moduleRef.get(EventEmitter2);

		await contracts.token.mint("GDONOR", 1_000n, { signers: ["GADMIN"] });
	});

	afterAll(async () => {
		await moduleRef.close();
	});

	it("should deploy the contracts at their fixed addresses", () => {
		expect(client.getContracts()).toEqual(CONTRACT_ADDRESSES);
	});

	it("should persist deposits and announce them on the event bus", async () => {
		const received: LedgerEvent[] = [];
		events.on(DEPOSIT_RECEIVED_ID, (event: LedgerEvent) => received.push(event));

		await client.registerProject("GOWNER", projectUuid, "ipfs://project");
		await client.recordDeposit({
			projectId: projectUuid,
			donorAddress: "GDONOR",
			amountStroops: 500n,
			memo: "first gift",
		});

		expect(received).toHaveLength(1);
		expect(received[0].contract).toBe(CONTRACT_ADDRESSES.funding_escrow);
		expect(received[0].data.amount).toBe(500n);
		expect(received[0].data.memo).toBe("first gift");
		expect(await client.getProjectBalance(projectUuid)).toBe(500n);
		expect(await storage.exists(CONTRACT_ADDRESSES.token, "Balance:GDONOR")).toBe(true);
	});

	it("should finish a payout left behind after approval", async () => {
		await client.registerMilestone({
			projectId: projectUuid,
			milestoneId: "m1",
			amountStroops: 300n,
			proofRequired: false,
			released: false,
			recipientAddress: "GRECIPIENT",
		});
		await client.releaseMilestone("m1");

		const milestoneHex = bytesToHex(milestoneIdFromString("m1"));
		expect(watcher.pending()).toEqual([milestoneHex]);

		const later = Date.now() + 60_000;
		const now = jest.spyOn(Date, "now").mockReturnValue(later);
		try {
			await watcher.tick();
		} finally {
			now.mockRestore();
		}

		expect(watcher.pending()).toEqual([]);
		expect(await contracts.token.balance("GRECIPIENT")).toBe(300n);
		expect(await client.getProjectBalance(projectUuid)).toBe(200n);
		expect(await client.isAwaitingPayout("m1")).toBe(false);
	});
});
