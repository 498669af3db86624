import type { Milestone } from "./types.js";
import { isReleasable, milestoneMachine, milestoneState } from "./milestone-state-machine.js";

function thrownBy(fn: () => unknown): unknown {
	try {
		fn();
	} catch (err) {
		return err;
	}
	throw new Error("Expected function to throw");
}

describe("milestone state machine", () => {
	const base: Milestone = {
		projectId: new Uint8Array(32),
		milestoneId: new Uint8Array(32).fill(1),
		amount: 100n,
		proofRequired: true,
		proofSubmitted: false,
		proofUri: null,
		released: false,
		releasedAt: 0,
		recipient: "GRECIPIENT",
	};

	it("should derive the state from the record", () => {
		expect(milestoneState(base)).toBe("registered");
		expect(milestoneState({ ...base, proofSubmitted: true })).toBe("proof-submitted");
		expect(
			milestoneState({ ...base, proofSubmitted: true, released: true, releasedAt: 5 }),
		).toBe("released");
	});

	it("should guard proof submission on proofRequired", () => {
		const machine = milestoneMachine({ ...base, proofRequired: false });
		expect(
			thrownBy(() => machine.perform("submit-proof", { ...base, proofRequired: false })),
		).toMatchObject({ code: "GUARD_FAILED" });
	});

	it("should treat released as final", () => {
		const machine = milestoneMachine({ ...base, released: true, releasedAt: 5 });
		expect(machine.isFinal()).toBe(true);
		expect(machine.getAllowedActions()).toEqual([]);
		expect(thrownBy(() => machine.perform("release", base))).toMatchObject({
			code: "ACTION_NOT_ALLOWED",
		});
	});

	it("should require submitted proof before reporting releasable", () => {
		expect(isReleasable(base)).toBe(false);
		expect(isReleasable({ ...base, proofSubmitted: true })).toBe(true);
		expect(isReleasable({ ...base, proofRequired: false })).toBe(true);
		expect(isReleasable({ ...base, released: true, releasedAt: 5 })).toBe(false);
	});
});
