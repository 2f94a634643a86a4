/**
 * Concurrency Utilities
 *
 * Provides a semaphore-based concurrency limiter for batched async operations.
 * Prevents unbounded Promise.all() from overwhelming the embedding service.
 *
 * Used by:
 * - Embedder sub-batch dispatch
 */

/**
 * Marker stored in place of a result for tasks that never started because the
 * signal was aborted.
 */
export const SKIPPED: unique symbol = Symbol("skipped");

/**
 * Run async tasks with a concurrency limit.
 *
 * Unlike Promise.all(), this ensures at most `limit` tasks run simultaneously.
 * Tasks are started in order and results are returned in the same order as input.
 * Once `signal` aborts, no further task is started; tasks already running finish
 * normally and the rest report SKIPPED.
 *
 * A task error stops its worker. The call settles only after every other worker
 * has finished its current task, then rejects with the first error.
 *
 * @param tasks - Array of async task functions to execute
 * @param limit - Maximum number of concurrent tasks (default: 5)
 * @returns Results in the same order as input tasks
 */
export async function runWithConcurrency<T>(
	tasks: Array<() => Promise<T>>,
	limit: number = 5,
	signal?: AbortSignal,
): Promise<Array<T | typeof SKIPPED>> {
	if (tasks.length === 0) return [];
	if (limit < 1) limit = 1;

	const results: Array<T | typeof SKIPPED> = new Array(tasks.length).fill(SKIPPED);
	let nextIndex = 0;

	async function runNext(): Promise<void> {
		while (nextIndex < tasks.length && !signal?.aborted) {
			const currentIndex = nextIndex++;
			results[currentIndex] = await tasks[currentIndex]();
		}
	}

	// Start `limit` workers, each processing tasks sequentially
	const workers = Array.from({ length: Math.min(limit, tasks.length) }, () => runNext());
	const settled = await Promise.allSettled(workers);

	const failed = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === "rejected");
	if (failed) {
		throw failed.reason;
	}

	return results;
}
