/**
 * Contract layer types
 *
 * Types for defining contract state machines and the error taxonomy shared by
 * every contract entry point.
 */

/**
 * Generic state definition for a contract state machine.
 */
export interface StateDefinition<TState extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: string[];
	/** Is this a terminal state (no further transitions)? */
	isFinal: boolean;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
	/** Optional guard condition that must be true for transition to occur */
	guard?: (context: TContext) => boolean;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	/** Initial state when the record is created */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction, TContext>[];
}

export const CONTRACT_ERROR_CODES = [
	"ALREADY_INITIALIZED",
	"NOT_INITIALIZED",
	"INVALID_AMOUNT",
	"INVALID_ARGUMENT",
	"NOT_FOUND",
	"ALREADY_EXISTS",
	"ALREADY_REGISTERED",
	"ALREADY_RELEASED",
	"INSUFFICIENT_BALANCE",
	"INSUFFICIENT_FUNDS",
	"INVALID_ATTESTATION",
	"UNAUTHORIZED",
	"PROOF_NOT_REQUIRED",
	"PROOF_ALREADY_SUBMITTED",
	"CONTRACT_NOT_FOUND",
	// state machine
	"ACTION_NOT_ALLOWED",
	"UNKNOWN_STATE",
	"GUARD_FAILED",
] as const;
export type ContractErrorCode = (typeof CONTRACT_ERROR_CODES)[number];

/**
 * Error thrown during contract operations.
 *
 * Any ContractError raised inside an invocation aborts it before commit.
 */
export class ContractError extends Error {
	constructor(
		message: string,
		public readonly code: ContractErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "ContractError";
	}
}

/**
 * Narrow an unknown error to a ContractError, optionally of a given code.
 */
export function isContractError(
	err: unknown,
	code?: ContractErrorCode,
): err is ContractError {
	return err instanceof ContractError && (code === undefined || err.code === code);
}
