/**
 * Runs async tasks one at a time, in submission order.
 */
export class SerialQueue {
	private tail: Promise<void> = Promise.resolve();

	run<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task);
		// The chain only orders tasks; each caller observes its own outcome via `result`.
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
