import type { ContractAddressBook } from "@fundchain/ledger";

export const LEDGER_STORAGE = Symbol("LEDGER_STORAGE");
export const LEDGER_HOST = Symbol("LEDGER_HOST");
export const LEDGER_CONTRACTS = Symbol("LEDGER_CONTRACTS");
export const ATTESTATION_VERIFIER = Symbol("ATTESTATION_VERIFIER");
export const ATTESTOR = Symbol("ATTESTOR");

// Fixed so a restarted host finds its contracts in the database again
export const CONTRACT_ADDRESSES: ContractAddressBook = {
	project_registry: "CPROJECTREGISTRYAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA",
	funding_escrow: "CFUNDINGESCROWAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA",
	milestone_manager: "CMILESTONEMANAGERAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA",
	token: "CTOKENAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA",
};
