/**
 * Retry Handler Module
 *
 * Retry primitives for external calls (embedding, completion): exponential
 * backoff with jitter, a bounded per-call timeout, and conversion of the final
 * outcome into the error taxonomy in errors.ts.
 *
 * ## Exponential Backoff Formula
 *
 * ```
 * baseDelay = min(baseDelayMs * factor^retry, maxDelayMs)
 * rate limit: delay = min(max(baseDelay * rateLimitMultiplier, retryAfterMs), maxDelayMs * rateLimitMultiplier)
 * actualDelay = delay + (delay * random * jitterPercent / 100)
 * ```
 *
 * `sleep` and `random` are injectable so tests drive the loop without wall-clock
 * delays.
 */

import {
	type BatchRef,
	ConfigurationError,
	classifyServiceError,
	PermanentFailure,
	RateLimitFailure,
	TransientFailure,
} from "./errors.js";
import { retryLogger } from "./logger.js";

/**
 * Backoff configuration
 */
export interface RetryPolicy {
	/** Total attempts including the first call (1 = no retries) */
	maxAttempts: number;
	/** Delay before the first retry in milliseconds */
	baseDelayMs: number;
	/** Upper bound for a single delay (before the rate-limit multiplier) */
	maxDelayMs: number;
	/** Exponential backoff multiplier (e.g., 2 = double each retry) */
	factor: number;
	/** Extra multiplier applied when the service signals a rate limit */
	rateLimitMultiplier: number;
	/** Jitter percentage (0-100) added on top of each delay */
	jitterPercent: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryOptions {
	policy: RetryPolicy;
	/** Operation name used in errors and logs */
	operation: string;
	/** Embedding sub-batch this call covers, carried into PermanentFailure */
	batch?: BatchRef;
	sleep?: SleepFn;
	/** Source of randomness for jitter, in [0, 1) */
	random?: () => number;
}

// =============================================================================
// Retry Constants
// =============================================================================

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	maxAttempts: 4,
	baseDelayMs: 500,
	maxDelayMs: 8000,
	factor: 2,
	rateLimitMultiplier: 2,
	jitterPercent: 10,
};

// =============================================================================
// Sleep Utilities
// =============================================================================

/**
 * Asynchronous sleep utility.
 *
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Backoff Calculation
// =============================================================================

/**
 * Calculate the delay before retry number `retry` (0-indexed).
 *
 * @example
 * ```typescript
 * // baseDelayMs 100, factor 2, maxDelayMs 1000, jitterPercent 0
 * calculateBackoffDelay(0, policy); // 100
 * calculateBackoffDelay(1, policy); // 200
 * calculateBackoffDelay(5, policy); // 1000 (capped)
 * ```
 */
export function calculateBackoffDelay(
	retry: number,
	policy: RetryPolicy,
	failure?: TransientFailure,
	random: () => number = Math.random,
): number {
	const { baseDelayMs, maxDelayMs, factor, rateLimitMultiplier, jitterPercent } = policy;

	let delay = Math.min(baseDelayMs * factor ** retry, maxDelayMs);

	if (failure instanceof RateLimitFailure) {
		const ceiling = maxDelayMs * rateLimitMultiplier;
		delay = Math.min(Math.max(delay * rateLimitMultiplier, failure.retryAfterMs ?? 0), ceiling);
	}

	const jitter = delay * (jitterPercent / 100) * random();
	return Math.floor(delay + jitter);
}

// =============================================================================
// Timeout
// =============================================================================

/**
 * Run `operation` with an abort signal that fires after `timeoutMs`.
 *
 * A timeout rejects with TransientFailure so the retry loop treats it like any
 * other hiccup. The timer is cleared once the operation settles.
 */
export function withTimeout<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	name: string,
): Promise<T> {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;

	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			controller.abort();
			reject(new TransientFailure(`${name} timed out after ${timeoutMs}ms`, name));
		}, timeoutMs);
	});

	return Promise.race([operation(controller.signal), timeout]).finally(() => {
		if (timer !== undefined) clearTimeout(timer);
	});
}

// =============================================================================
// Async Retry Wrapper
// =============================================================================

/**
 * Execute an external call with retry logic.
 *
 * Transient and rate-limit failures are retried with backoff until the policy's
 * attempt budget is spent. The call then fails with PermanentFailure, which
 * names the batch when one was given. A 4xx-class rejection fails immediately.
 * ConfigurationError is rethrown untouched.
 *
 * @param operation - Receives the 1-based attempt number
 * @throws {PermanentFailure} After exhausting attempts or on a non-retryable rejection
 * @throws {ConfigurationError} When the call reports a configuration problem
 *
 * @example
 * ```typescript
 * const vectors = await withRetry(
 *   () => service.embed(texts, { model }),
 *   { policy, operation: "embed", batch: { index: 2, start: 128, size: 64 } },
 * );
 * ```
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
	const { policy, operation: name, batch, sleep: sleepFn = sleep, random = Math.random } = options;
	const maxAttempts = Math.max(1, policy.maxAttempts);

	for (let attempt = 1; ; attempt++) {
		try {
			return await operation(attempt);
		} catch (error: unknown) {
			const failure = classifyServiceError(error, name);

			if (failure instanceof ConfigurationError) {
				throw failure;
			}

			if (failure instanceof PermanentFailure) {
				retryLogger.warn({ operation: name, attempt, batch, error: failure.message }, "Request rejected, not retrying");
				throw new PermanentFailure(`${name} rejected: ${failure.message}`, name, {
					attempts: attempt,
					batch,
					underlying: failure.underlying ?? error,
				});
			}

			if (!(failure instanceof TransientFailure) || attempt >= maxAttempts) {
				retryLogger.error({ operation: name, attempts: attempt, batch, error: failure.message }, "Retry budget exhausted");
				throw new PermanentFailure(`${name} failed after ${attempt} attempt(s): ${failure.message}`, name, {
					attempts: attempt,
					batch,
					exhausted: true,
					underlying: error,
				});
			}

			const delayMs = calculateBackoffDelay(attempt - 1, policy, failure, random);
			retryLogger.debug(
				{ operation: name, attempt, delayMs, rateLimited: failure instanceof RateLimitFailure },
				"Retrying after transient failure",
			);
			await sleepFn(delayMs);
		}
	}
}
