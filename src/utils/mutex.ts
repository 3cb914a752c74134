/** Promise-chain mutual exclusion for async read-modify-write sections */

type Task<T> = () => Promise<T> | T;

/**
 * Runs tasks one at a time in call order. A failing task does not poison the chain:
 * its rejection goes to its own caller and the next task still runs.
 *
 * Not reentrant: calling `runExclusive` from inside a running task deadlocks.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	runExclusive<T>(task: Task<T>): Promise<T> {
		this.pending++;
		const run = this.tail.then(task);

		this.tail = run.then(
			() => {
				this.pending--;
			},
			() => {
				this.pending--;
			},
		);

		return run;
	}

	/** Tasks queued or running */
	get size(): number {
		return this.pending;
	}
}
