/**
 * Milestone State Machine Configuration
 */

import {
	ContractStateMachine,
	StateMachineConfig,
	createState,
	createTransition,
} from "../../contracts/index.js";
import type { Milestone, MilestoneAction, MilestoneState } from "./types.js";

/**
 * States:
 * - registered: waiting for proof (when required) or release
 * - proof-submitted: proof recorded, waiting for release
 * - released: approved (terminal)
 *
 * Proof is advisory for release: `registered -> released` stays open even
 * when a proof is required.
 */
export const MILESTONE_STATE_MACHINE: StateMachineConfig<
	MilestoneState,
	MilestoneAction,
	Milestone
> = {
	initialState: "registered",
	states: [
		createState("registered", ["submit-proof", "release"], {
			description: "Registered by the admin",
		}),
		createState("proof-submitted", ["release"], {
			description: "Proof submitted by the recipient",
		}),
		createState("released", [], {
			isFinal: true,
			description: "Approved for payout",
		}),
	],
	transitions: [
		createTransition<MilestoneState, MilestoneAction, Milestone>(
			"registered",
			"submit-proof",
			"proof-submitted",
			{ guard: (milestone) => milestone.proofRequired },
		),
		createTransition<MilestoneState, MilestoneAction, Milestone>(
			["registered", "proof-submitted"],
			"release",
			"released",
		),
	],
};

export function milestoneState(milestone: Milestone): MilestoneState {
	if (milestone.released) return "released";
	return milestone.proofSubmitted ? "proof-submitted" : "registered";
}

/**
 * State machine positioned at the milestone's current state.
 */
export function milestoneMachine(
	milestone: Milestone,
): ContractStateMachine<MilestoneState, MilestoneAction, Milestone> {
	return new ContractStateMachine(MILESTONE_STATE_MACHINE, milestoneState(milestone));
}

/**
 * Not yet released, and carrying its proof when one is required.
 */
export function isReleasable(milestone: Milestone): boolean {
	const machine = milestoneMachine(milestone);
	return (
		machine.canPerform("release") && (!milestone.proofRequired || milestone.proofSubmitted)
	);
}
