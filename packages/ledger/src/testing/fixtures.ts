import { SchnorrAttestor } from "../attestation/attestor.js";
import type { AttestationVerifier } from "../attestation/types.js";
import { deployContracts } from "../client/deploy.js";
import type { DeployedContracts } from "../client/types.js";
import type { Address } from "../core/types.js";
import { ManualClock } from "../runtime/clock.js";
import { LedgerHost } from "../runtime/host.js";
import { MemoryStorageAdapter } from "../storage/memory-adapter.js";

export const ADMIN = "GADMIN";
export const OWNER = "GOWNER";
export const DONOR = "GDONOR";
export const RECIPIENT = "GRECIPIENT";

export const TEST_SECRET_KEY = new Uint8Array(32).fill(7);
export const OTHER_SECRET_KEY = new Uint8Array(32).fill(9);

export const START_TIME = 1_700_000_000;

export function bytes32(fill: number): Uint8Array {
	return new Uint8Array(32).fill(fill);
}

export interface LedgerFixture {
	storage: MemoryStorageAdapter;
	clock: ManualClock;
	host: LedgerHost;
	attestor: SchnorrAttestor;
	contracts: DeployedContracts;
}

export async function createLedgerFixture(
	options: { mockAllAuths?: boolean; verifier?: AttestationVerifier } = {},
): Promise<LedgerFixture> {
	const storage = new MemoryStorageAdapter();
	const clock = new ManualClock(START_TIME);
	const host = new LedgerHost({
		storage,
		clock,
		mockAllAuths: options.mockAllAuths ?? false,
	});
	const attestor = new SchnorrAttestor(TEST_SECRET_KEY);
	const contracts = await deployContracts(host, {
		admin: ADMIN,
		attestationKey: attestor.publicKey(),
		verifier: options.verifier,
	});
	return { storage, clock, host, attestor, contracts };
}

export async function mintTo(
	fixture: LedgerFixture,
	to: Address,
	amount: bigint,
): Promise<void> {
	await fixture.contracts.token.mint(to, amount, { signers: [ADMIN] });
}
