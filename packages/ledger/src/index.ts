/**
 * Fundchain Ledger
 *
 * Escrow and milestone-release contracts for donated funds, executed on an
 * in-process contract host with all-or-nothing invocations.
 *
 * @example
 * ```typescript
 * import {
 *   LedgerHost,
 *   SchnorrAttestor,
 *   ContractClient,
 *   deployContracts,
 * } from "@fundchain/ledger";
 *
 * const host = new LedgerHost();
 * const attestor = new SchnorrAttestor(secretKey);
 * const contracts = await deployContracts(host, {
 *   admin: "GADMIN",
 *   attestationKey: attestor.publicKey(),
 * });
 *
 * const client = new ContractClient(contracts, { attestor, admin: "GADMIN" });
 * await client.recordDeposit({
 *   projectId: "0f8fad5b-d9cb-469f-a165-70867728950e",
 *   donorAddress: "GDONOR",
 *   amountStroops: 5_000_000n,
 * });
 * ```
 */

// Core - Identifiers and amounts
export {
	type Address,
	type Bytes32,
	type XOnlyPubKey,
	type Stroops,
	STROOPS_PER_UNIT,
	MAX_AMOUNT,
	ID_LENGTH,
	assertBytes32,
	assertAddress,
	assertPositiveAmount,
	idToHex,
} from "./core/index.js";

// Contracts - State machines and errors
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	type ContractErrorCode,
	ContractStateMachine,
	ContractError,
	CONTRACT_ERROR_CODES,
	isContractError,
	createState,
	createTransition,
} from "./contracts/index.js";

// Storage - Persistence adapters
export {
	type StorageTier,
	type StoredEntry,
	type QueryOptions,
	type QueryResult,
	type StorageAdapter,
	type StorageValue,
	type StorageRecord,
	StorageError,
	MemoryStorageAdapter,
	encodeValue,
	decodeValue,
} from "./storage/index.js";

// Runtime - Contract host
export {
	type LoggerLike,
	type LedgerClock,
	type CallOptions,
	type LedgerInfo,
	type ContractEvent,
	type EventListener,
	type LedgerHostOptions,
	LedgerHost,
	HOST_NAMESPACE,
	Contract,
	InvocationEnv,
	SystemClock,
	ManualClock,
} from "./runtime/index.js";

// Attestation
export {
	type AttestationAction,
	type AttestationScheme,
	type AttestationPayload,
	type AttestationVerifier,
	type VerifiedAttestation,
	ATTESTATION_LENGTH,
	ATTESTATION_SCHEMES,
	SIGNATURE_LENGTH,
	attestationMessage,
	encodeAttestation,
	decodeAttestation,
	SchnorrAttestationVerifier,
	LengthOnlyAttestationVerifier,
	createAttestationVerifier,
	SchnorrAttestor,
	randomNonce,
	milestonePayoutNonce,
} from "./attestation/index.js";

// Modules - Contracts
export {
	type TokenInfo,
	type TokenOperations,
	FungibleToken,
} from "./modules/token/index.js";

export { type Project, ProjectRegistry } from "./modules/registry/index.js";

export {
	type FundingState,
	type EscrowAccount,
	type FundingEscrowOptions,
	availableOf,
	fundingStateOf,
	FundingEscrow,
} from "./modules/escrow/index.js";

export {
	type MilestoneState,
	type MilestoneAction,
	type Milestone,
	type ProjectMilestonesSummary,
	type MilestoneManagerOptions,
	MILESTONE_STATE_MACHINE,
	isReleasable,
	MilestoneManager,
} from "./modules/milestones/index.js";

// Client - Orchestration
export {
	type ContractName,
	type ContractAddressBook,
	type Attestor,
	type DeployOptions,
	type DeployedContracts,
	type ContractClientOptions,
	type MilestoneInfo,
	type DepositInfo,
	type MilestoneRef,
	type StepOutcome,
	type DisbursementResult,
	type ReconciliationReport,
	type MilestoneRegistration,
	CONTRACT_NAMES,
	deployContracts,
	ContractClient,
	projectIdFromUuid,
	uuidFromProjectId,
	milestoneIdFromString,
	milestoneIdToString,
	toStroops,
	fromStroops,
} from "./client/index.js";

// Utils
export {
	bytesToHex,
	hexToBytes,
	stringToBytes,
	bytesToString,
} from "./utils/index.js";
