/**
 * Escrow Module
 *
 * Per-project custody of donated funds, gated by attestations.
 */

export type {
	FundingState,
	EscrowAccount,
	FundingEscrowOptions,
} from "./types.js";

export {
	availableOf,
	fundingStateOf,
	escrowToRecord,
	escrowFromRecord,
} from "./types.js";

export { FundingEscrow } from "./escrow-contract.js";
