/**
 * Client module - Deployment and cross-contract orchestration
 */

export type {
	ContractName,
	ContractAddressBook,
	Attestor,
	DeployOptions,
	DeployedContracts,
	ContractClientOptions,
	MilestoneInfo,
	DepositInfo,
	MilestoneRef,
	StepOutcome,
	DisbursementResult,
	ReconciliationReport,
} from "./types.js";
export type { MilestoneRegistration } from "./contract-client.js";

export { CONTRACT_NAMES } from "./types.js";
export { deployContracts } from "./deploy.js";
export { ContractClient } from "./contract-client.js";
export {
	projectIdFromUuid,
	uuidFromProjectId,
	milestoneIdFromString,
	milestoneIdToString,
	toMilestoneId,
	toStroops,
	fromStroops,
} from "./ids.js";
