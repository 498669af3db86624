/**
 * Milestone Module
 *
 * Funding milestones per project and their approval lifecycle.
 */

// Types
export type {
	MilestoneState,
	MilestoneAction,
	Milestone,
	ProjectMilestonesSummary,
	MilestoneManagerOptions,
} from "./types.js";

export {
	emptySummary,
	milestoneToRecord,
	milestoneFromRecord,
	summaryToRecord,
	summaryFromRecord,
} from "./types.js";

// State machine
export {
	MILESTONE_STATE_MACHINE,
	milestoneState,
	milestoneMachine,
	isReleasable,
} from "./milestone-state-machine.js";

// Main contract class
export { MilestoneManager } from "./milestone-contract.js";
