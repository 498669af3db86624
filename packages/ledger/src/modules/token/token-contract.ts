/**
 * Fungible Token Contract
 *
 * Minimal custodial token. Balances live in the token's own persistent
 * storage; only the holder (or a contract further up the call chain acting
 * as holder) can move them.
 */

import {
	Address,
	assertAddress,
	assertPositiveAmount,
} from "../../core/types.js";
import { ContractError } from "../../contracts/types.js";
import { Contract } from "../../runtime/contract.js";
import type { InvocationEnv } from "../../runtime/invocation.js";
import type { CallOptions } from "../../runtime/types.js";
import { MAX_DECIMALS, TokenInfo, TokenOperations } from "./types.js";

const ADMIN_KEY = "Admin";
const DECIMALS_KEY = "Decimals";
const SYMBOL_KEY = "Symbol";

function balanceKey(address: Address): string {
	return `Balance:${address}`;
}

/**
 * @example
 * ```typescript
 * const token = host.deploy((h, address) => new FungibleToken(h, address));
 * await token.initialize(issuer, 7, "XLM");
 * await token.mint(donor, 1_000n, { signers: [issuer] });
 * await token.transfer(donor, recipient, 250n, { signers: [donor] });
 * ```
 */
export class FungibleToken extends Contract {
	// ==================== Entry points ====================

	async initialize(
		admin: Address,
		decimals: number,
		symbol: string,
		options?: CallOptions,
	): Promise<void> {
		assertAddress(admin, "admin");
		if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
			throw new ContractError(
				`decimals must be an integer between 0 and ${MAX_DECIMALS}`,
				"INVALID_ARGUMENT",
				{ decimals },
			);
		}
		if (symbol.trim().length === 0) {
			throw new ContractError("symbol must not be empty", "INVALID_ARGUMENT");
		}

		await this.invoke("initialize", options, async (env) => {
			if (await env.instance().has(ADMIN_KEY)) {
				throw new ContractError("Token already initialized", "ALREADY_INITIALIZED");
			}
			env.instance().set(ADMIN_KEY, admin);
			env.instance().set(DECIMALS_KEY, decimals);
			env.instance().set(SYMBOL_KEY, symbol);
		});
	}

	async mint(to: Address, amount: bigint, options?: CallOptions): Promise<void> {
		await this.invoke("mint", options, async (env) => {
			const { admin } = await loadInfo(env);
			env.requireAuth(admin);
			assertAddress(to, "to");
			assertPositiveAmount(amount);

			const current = await readBalance(env, to);
			env.persistent().set(balanceKey(to), current + amount);
			env.publish("mint", { to, amount });
		});
	}

	async transfer(
		from: Address,
		to: Address,
		amount: bigint,
		options?: CallOptions,
	): Promise<void> {
		await this.invoke("transfer", options, (env) =>
			applyTransfer(env, from, to, amount),
		);
	}

	// ==================== Reads ====================

	balance(address: Address): Promise<bigint> {
		return this.query("balance", (env) => readBalance(env, address));
	}

	/**
	 * Issuer, or null before initialize.
	 */
	admin(): Promise<Address | null> {
		return this.query("admin", async (env) => {
			const admin = await env.instance().get(ADMIN_KEY);
			return typeof admin === "string" ? admin : null;
		});
	}

	symbol(): Promise<string> {
		return this.query("symbol", async (env) => (await loadInfo(env)).symbol);
	}

	decimals(): Promise<number> {
		return this.query("decimals", async (env) => (await loadInfo(env)).decimals);
	}

	// ==================== Cross-contract ====================

	/**
	 * Bind token operations to a calling contract's invocation. Writes land in
	 * the caller's staging buffer and the caller counts as authorized.
	 */
	within(caller: InvocationEnv): TokenOperations {
		const env = caller.enter(this.address);
		return {
			transfer: (from, to, amount) => applyTransfer(env, from, to, amount),
			balance: (address) => readBalance(env, address),
		};
	}
}

// ==================== Internals ====================

async function applyTransfer(
	env: InvocationEnv,
	from: Address,
	to: Address,
	amount: bigint,
): Promise<void> {
	await loadInfo(env);
	assertAddress(from, "from");
	assertAddress(to, "to");
	env.requireAuth(from);
	assertPositiveAmount(amount);

	const fromBalance = await readBalance(env, from);
	if (fromBalance < amount) {
		throw new ContractError("Insufficient token balance", "INSUFFICIENT_FUNDS", {
			from,
			balance: fromBalance.toString(),
			amount: amount.toString(),
		});
	}
	if (from !== to) {
		const toBalance = await readBalance(env, to);
		env.persistent().set(balanceKey(from), fromBalance - amount);
		env.persistent().set(balanceKey(to), toBalance + amount);
	}
	env.publish("transfer", { from, to, amount });
}

async function readBalance(env: InvocationEnv, address: Address): Promise<bigint> {
	const stored = await env.persistent().get(balanceKey(address));
	return typeof stored === "bigint" ? stored : 0n;
}

async function loadInfo(env: InvocationEnv): Promise<TokenInfo> {
	const [admin, decimals, symbol] = await Promise.all([
		env.instance().get(ADMIN_KEY),
		env.instance().get(DECIMALS_KEY),
		env.instance().get(SYMBOL_KEY),
	]);
	if (
		typeof admin !== "string" ||
		typeof decimals !== "number" ||
		typeof symbol !== "string"
	) {
		throw new ContractError("Token not initialized", "NOT_INITIALIZED");
	}
	return { admin, decimals, symbol };
}
