/**
 * Funding Escrow Contract
 *
 * Holds donated funds per project in the escrow's own token balance and
 * tracks cumulative deposits and claims. Withdrawals are gated by
 * attestations from the release authority.
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
import { consumeAttestation, nonceKey } from "../../attestation/guard.js";
import type { AttestationAction, AttestationVerifier } from "../../attestation/types.js";
import { SchnorrAttestationVerifier } from "../../attestation/verifier.js";
import { stringToBytes } from "../../utils/encoding.js";
import { FungibleToken } from "../token/token-contract.js";
import type { TokenOperations } from "../token/types.js";
import {
	EscrowAccount,
	FundingEscrowOptions,
	FundingState,
	availableOf,
	escrowFromRecord,
	escrowToRecord,
	fundingStateOf,
} from "./types.js";

const TOKEN_KEY = "Token";
const ATTESTATION_KEY = "AttestationKey";

function escrowKey(projectId: Bytes32): string {
	return `Escrow:${idToHex(projectId)}`;
}

/**
 * @example
 * ```typescript
 * const escrow = host.deploy((h, address) => new FundingEscrow(h, address));
 * await escrow.initialize(token.address, attestor.publicKey());
 *
 * await escrow.deposit(donor, projectId, 500n, "donation-42", { signers: [donor] });
 * await escrow.getBalance(projectId); // 500n
 *
 * const attestation = await attestor.attest({
 *   contract: escrow.address,
 *   action: "release",
 *   projectId,
 *   subject: stringToBytes(recipient),
 *   amount: 200n,
 *   nonce: randomNonce(),
 * });
 * await escrow.releaseToRecipient(projectId, recipient, 200n, attestation);
 * ```
 */
export class FundingEscrow extends Contract {
	private readonly verifier: AttestationVerifier;

	constructor(host: LedgerHost, address: Address, options: FundingEscrowOptions = {}) {
		super(host, address);
		this.verifier = options.verifier ?? new SchnorrAttestationVerifier();
		if (this.verifier.scheme === "length-only") {
			options.logger?.warn(
				`FundingEscrow ${address} accepts unverified attestations (length-only scheme)`,
			);
		}
	}

	// ==================== Configuration ====================

	/**
	 * One-time, contract-wide setup: the custodied token and the default
	 * attestation key given to new escrow accounts.
	 */
	async initialize(
		token: Address,
		attestationPubkey: XOnlyPubKey,
		options?: CallOptions,
	): Promise<void> {
		await this.invoke("initialize", options, async (env) => {
			if (await env.instance().has(TOKEN_KEY)) {
				throw new ContractError("Escrow already initialized", "ALREADY_INITIALIZED");
			}
			assertAddress(token, "token");
			assertBytes32(attestationPubkey, "attestationPubkey");
			env.instance().set(TOKEN_KEY, token);
			env.instance().set(ATTESTATION_KEY, attestationPubkey);
		});
	}

	/**
	 * Replace one project's attestation key. The attestation must verify under
	 * the key being replaced.
	 */
	async setAttestationKey(
		projectId: Bytes32,
		newKey: XOnlyPubKey,
		attestation: Uint8Array,
		options?: CallOptions,
	): Promise<EscrowAccount> {
		return this.invoke("set_attestation_key", options, async (env) => {
			assertBytes32(projectId, "projectId");
			assertBytes32(newKey, "newKey");
			const account = await this.requireAccount(env, projectId);

			await this.checkAttestation(env, account, "rotate-key", attestation, 0n, newKey);

			const updated: EscrowAccount = { ...account, attestationPubkey: newKey };
			this.saveAccount(env, updated);
			env.publish("attestation_key_rotated", { projectId: idToHex(projectId) });
			return updated;
		});
	}

	// ==================== Funds ====================

	/**
	 * Move `amount` from `from` into custody and credit the project. `memo`
	 * only travels in the deposit event.
	 */
	async deposit(
		from: Address,
		projectId: Bytes32,
		amount: bigint,
		memo: string,
		options?: CallOptions,
	): Promise<EscrowAccount> {
		return this.invoke("deposit", options, async (env) => {
			assertAddress(from, "from");
			assertBytes32(projectId, "projectId");
			if (from === this.address) {
				throw new ContractError(
					"Escrow cannot deposit from its own custody",
					"INVALID_ARGUMENT",
					{ from },
				);
			}
			env.requireAuth(from);
			assertPositiveAmount(amount);
			const token = await this.requireToken(env);

			await token.transfer(from, this.address, amount);

			const existing = await this.loadAccount(env, projectId);
			const account: EscrowAccount = existing ?? {
				projectId,
				totalDeposited: 0n,
				totalClaimed: 0n,
				attestationPubkey: await this.defaultKey(env),
			};
			const updated: EscrowAccount = {
				...account,
				totalDeposited: account.totalDeposited + amount,
			};
			this.saveAccount(env, updated);

			env.publish("deposit", {
				projectId: idToHex(projectId),
				from,
				amount,
				memo,
			});
			return updated;
		});
	}

	/**
	 * Mark `amount` as claimed. No tokens move: the payout settles outside
	 * the ledger and this records it.
	 */
	async claim(
		projectId: Bytes32,
		amount: bigint,
		attestation: Uint8Array,
		options?: CallOptions,
	): Promise<EscrowAccount> {
		return this.invoke("claim", options, async (env) => {
			assertBytes32(projectId, "projectId");
			assertPositiveAmount(amount);
			const account = await this.requireAccount(env, projectId);
			assertAvailable(account, amount);
			await this.checkAttestation(env, account, "claim", attestation, amount);

			const updated = this.recordClaim(env, account, amount);
			env.publish("claim", { projectId: idToHex(projectId), amount });
			return updated;
		});
	}

	/**
	 * Pay `amount` out of custody to `recipient`. The only entry point that
	 * moves custodied funds to a third party.
	 */
	async releaseToRecipient(
		projectId: Bytes32,
		recipient: Address,
		amount: bigint,
		attestation: Uint8Array,
		options?: CallOptions,
	): Promise<EscrowAccount> {
		return this.invoke("release_to_recipient", options, async (env) => {
			assertBytes32(projectId, "projectId");
			assertAddress(recipient, "recipient");
			assertPositiveAmount(amount);
			const account = await this.requireAccount(env, projectId);
			assertAvailable(account, amount);
			await this.checkAttestation(
				env,
				account,
				"release",
				attestation,
				amount,
				stringToBytes(recipient),
			);
			const token = await this.requireToken(env);

			await token.transfer(this.address, recipient, amount);

			const updated = this.recordClaim(env, account, amount);
			env.publish("release", {
				projectId: idToHex(projectId),
				recipient,
				amount,
			});
			return updated;
		});
	}

	// ==================== Reads ====================

	/**
	 * Available balance; 0n for projects that never received a deposit.
	 */
	getBalance(projectId: Bytes32): Promise<bigint> {
		return this.query("get_balance", async (env) => {
			const account = await this.loadAccount(env, projectId);
			return account ? availableOf(account) : 0n;
		});
	}

	getEscrowInfo(projectId: Bytes32): Promise<EscrowAccount | null> {
		return this.query("get_escrow_info", (env) => this.loadAccount(env, projectId));
	}

	getFundingState(projectId: Bytes32): Promise<FundingState> {
		return this.query("get_funding_state", async (env) =>
			fundingStateOf(await this.loadAccount(env, projectId)),
		);
	}

	/**
	 * Whether an attestation nonce has been consumed by this escrow.
	 */
	isNonceUsed(nonce: bigint): Promise<boolean> {
		return this.query("is_nonce_used", (env) => env.persistent().has(nonceKey(nonce)));
	}

	getToken(): Promise<Address | null> {
		return this.query("get_token", async (env) => {
			const token = await env.instance().get(TOKEN_KEY);
			return typeof token === "string" ? token : null;
		});
	}

	// ==================== Internals ====================

	private async loadAccount(
		env: InvocationEnv,
		projectId: Bytes32,
	): Promise<EscrowAccount | null> {
		assertBytes32(projectId, "projectId");
		const stored = await env.persistent().get(escrowKey(projectId));
		return stored === null ? null : escrowFromRecord(stored);
	}

	private async requireAccount(
		env: InvocationEnv,
		projectId: Bytes32,
	): Promise<EscrowAccount> {
		const account = await this.loadAccount(env, projectId);
		if (!account) {
			throw new ContractError("Escrow account not found", "NOT_FOUND", {
				projectId: idToHex(projectId),
			});
		}
		return account;
	}

	private saveAccount(env: InvocationEnv, account: EscrowAccount): void {
		env.persistent().set(escrowKey(account.projectId), escrowToRecord(account));
	}

	private recordClaim(
		env: InvocationEnv,
		account: EscrowAccount,
		amount: bigint,
	): EscrowAccount {
		const updated: EscrowAccount = {
			...account,
			totalClaimed: account.totalClaimed + amount,
		};
		this.saveAccount(env, updated);
		return updated;
	}

	private async requireToken(env: InvocationEnv): Promise<TokenOperations> {
		const address = await env.instance().get(TOKEN_KEY);
		if (typeof address !== "string") {
			throw new ContractError("Escrow not initialized", "NOT_INITIALIZED");
		}
		return this.host.getContract(address, FungibleToken).within(env);
	}

	private async defaultKey(env: InvocationEnv): Promise<XOnlyPubKey> {
		const key = await env.instance().get(ATTESTATION_KEY);
		if (!(key instanceof Uint8Array)) {
			throw new ContractError("Escrow not initialized", "NOT_INITIALIZED");
		}
		return key;
	}

	private checkAttestation(
		env: InvocationEnv,
		account: EscrowAccount,
		action: AttestationAction,
		attestation: Uint8Array,
		amount: bigint,
		subject?: Uint8Array,
	): Promise<void> {
		return consumeAttestation(
			env,
			this.verifier,
			attestation,
			{ contract: this.address, action, projectId: account.projectId, subject, amount },
			account.attestationPubkey,
		);
	}
}

function assertAvailable(account: EscrowAccount, amount: bigint): void {
	const available = availableOf(account);
	if (amount > available) {
		throw new ContractError("Insufficient escrow balance", "INSUFFICIENT_BALANCE", {
			available: available.toString(),
			amount: amount.toString(),
		});
	}
}
