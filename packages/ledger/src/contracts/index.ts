/**
 * Contracts module - State machines and the shared error taxonomy
 */

// Types
export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
	ContractErrorCode,
} from "./types.js";

export { ContractError, CONTRACT_ERROR_CODES, isContractError } from "./types.js";

// State machine
export {
	ContractStateMachine,
	createState,
	createTransition,
} from "./state-machine.js";
