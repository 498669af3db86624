/**
 * Record lifecycles
 *
 * Contracts keep each record's status in storage; a ContractStateMachine is
 * rebuilt from that status on every invocation, checked, and discarded.
 * Everything here is synchronous so a rejected action throws before the
 * invocation stages any write.
 */

import {
	ContractError,
	StateDefinition,
	StateMachineConfig,
	StateTransition,
} from "./types.js";

type TransitionTable<TState extends string, TAction extends string, TContext> = Map<
	TState,
	Map<TAction, StateTransition<TState, TAction, TContext>>
>;

function buildTable<TState extends string, TAction extends string, TContext>(
	transitions: StateTransition<TState, TAction, TContext>[],
): TransitionTable<TState, TAction, TContext> {
	const table: TransitionTable<TState, TAction, TContext> = new Map();
	for (const transition of transitions) {
		const sources = typeof transition.from === "string" ? [transition.from] : transition.from;
		for (const source of sources) {
			const row = table.get(source) ?? new Map<TAction, StateTransition<TState, TAction, TContext>>();
			row.set(transition.action, transition);
			table.set(source, row);
		}
	}
	return table;
}

/**
 * @example
 * ```typescript
 * const machine = new ContractStateMachine(MILESTONE_STATE_MACHINE, "registered");
 * if (machine.canPerform("release")) {
 *   machine.perform("release", milestone); // "released"
 * }
 * ```
 */
export class ContractStateMachine<
	TState extends string,
	TAction extends string,
	TContext = unknown,
> {
	private state: TState;
	private readonly definitions = new Map<TState, StateDefinition<TState>>();
	private readonly table: TransitionTable<TState, TAction, TContext>;

	constructor(
		config: StateMachineConfig<TState, TAction, TContext>,
		from: TState = config.initialState,
	) {
		for (const definition of config.states) {
			this.definitions.set(definition.name, definition);
		}
		if (!this.definitions.has(from)) {
			throw new ContractError(`Unknown state: ${from}`, "UNKNOWN_STATE", {
				state: from,
				validStates: [...this.definitions.keys()],
			});
		}
		this.table = buildTable(config.transitions);
		this.state = from;
	}

	getState(): TState {
		return this.state;
	}

	getAllowedActions(): string[] {
		return this.definitions.get(this.state)?.allowedActions ?? [];
	}

	/**
	 * Whether `action` is listed for the current state and has a transition.
	 * Guards are not evaluated.
	 */
	canPerform(action: TAction): boolean {
		return (
			this.getAllowedActions().includes(action) &&
			this.table.get(this.state)?.has(action) === true
		);
	}

	isFinal(): boolean {
		return this.definitions.get(this.state)?.isFinal === true;
	}

	/**
	 * Apply `action`, running its guard against `context`.
	 *
	 * @returns The state moved to
	 */
	perform(action: TAction, context: TContext): TState {
		const transition = this.canPerform(action)
			? this.table.get(this.state)?.get(action)
			: undefined;
		if (transition === undefined) {
			throw new ContractError(
				`Cannot ${action} from state "${this.state}"`,
				"ACTION_NOT_ALLOWED",
				{ action, state: this.state, allowedActions: this.getAllowedActions() },
			);
		}
		if (transition.guard !== undefined && !transition.guard(context)) {
			throw new ContractError(
				`Precondition for ${action} not met in state "${this.state}"`,
				"GUARD_FAILED",
				{ action, state: this.state },
			);
		}
		this.state = transition.to;
		return this.state;
	}
}

export function createState<TState extends string>(
	name: TState,
	allowedActions: string[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal === true,
		description: options.description,
	};
}

export function createTransition<
	TState extends string,
	TAction extends string,
	TContext = unknown,
>(
	from: TState | TState[],
	action: TAction,
	to: TState,
	options: { guard?: (context: TContext) => boolean } = {},
): StateTransition<TState, TAction, TContext> {
	return options.guard === undefined
		? { from, action, to }
		: { from, action, to, guard: options.guard };
}
