/**
 * Contract deployment
 */

import type { LedgerHost } from "../runtime/host.js";
import { ProjectRegistry } from "../modules/registry/registry-contract.js";
import { FundingEscrow } from "../modules/escrow/escrow-contract.js";
import { MilestoneManager } from "../modules/milestones/milestone-contract.js";
import { FungibleToken } from "../modules/token/token-contract.js";
import type { DeployOptions, DeployedContracts } from "./types.js";

const DEFAULT_SYMBOL = "XLM";
const DEFAULT_DECIMALS = 7;

/**
 * Deploy the token, registry, escrow and milestone manager on a host and
 * initialize them. Contracts found already initialized at fixed addresses
 * (a host restarted on persistent storage) are reattached as they are.
 *
 * @example
 * ```typescript
 * const contracts = await deployContracts(host, {
 *   admin: "GADMIN",
 *   attestationKey: attestor.publicKey(),
 * });
 * contracts.addresses.funding_escrow; // "C..."
 * ```
 */
export async function deployContracts(
	host: LedgerHost,
	options: DeployOptions,
): Promise<DeployedContracts> {
	const { addresses = {}, verifier, logger } = options;

	const token = host.deploy((h, a) => new FungibleToken(h, a), addresses.token);
	const registry = host.deploy(
		(h, a) => new ProjectRegistry(h, a),
		addresses.project_registry,
	);
	const escrow = host.deploy(
		(h, a) => new FundingEscrow(h, a, { verifier, logger }),
		addresses.funding_escrow,
	);
	const milestones = host.deploy(
		(h, a) => new MilestoneManager(h, a, { verifier, logger }),
		addresses.milestone_manager,
	);

	if ((await token.admin()) === null) {
		await token.initialize(
			options.tokenAdmin ?? options.admin,
			options.tokenDecimals ?? DEFAULT_DECIMALS,
			options.tokenSymbol ?? DEFAULT_SYMBOL,
		);
	}
	if ((await escrow.getToken()) === null) {
		await escrow.initialize(token.address, options.attestationKey);
	}
	if ((await milestones.getAdmin()) === null) {
		await milestones.initialize(options.admin, options.attestationKey);
	}

	logger?.log(
		`Contracts ready: registry=${registry.address} escrow=${escrow.address} milestones=${milestones.address} token=${token.address}`,
	);

	return {
		registry,
		escrow,
		milestones,
		token,
		addresses: {
			project_registry: registry.address,
			funding_escrow: escrow.address,
			milestone_manager: milestones.address,
			token: token.address,
		},
	};
}
