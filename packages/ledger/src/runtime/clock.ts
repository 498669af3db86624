import type { LedgerClock } from "./types.js";

/**
 * Wall-clock ledger time.
 */
export class SystemClock implements LedgerClock {
	now(): number {
		return Math.floor(Date.now() / 1000);
	}
}

/**
 * Ledger time under test control.
 */
export class ManualClock implements LedgerClock {
	constructor(private current: number = 1_700_000_000) {}

	now(): number {
		return this.current;
	}

	set(timestamp: number): void {
		this.current = timestamp;
	}

	advance(seconds: number): void {
		this.current += seconds;
	}
}
