/**
 * Custom Error Classes
 *
 * Failure taxonomy for the ingestion and retrieval pipeline. Every class extends
 * AppError so callers can branch on `instanceof` or on `code`.
 *
 * | Class              | Retried | Raised for                                        |
 * |--------------------|---------|---------------------------------------------------|
 * | ConfigurationError | never   | bad settings, missing credentials, dim mismatch   |
 * | TransientFailure   | yes     | network hiccups, timeouts, 5xx                    |
 * | RateLimitFailure   | yes     | 429 / "rate limit" (longer backoff)               |
 * | PermanentFailure   | never   | retry budget exhausted, 4xx rejections            |
 *
 * An empty collection or an empty retrieval is not an error anywhere in the
 * pipeline; those paths return sentinels instead.
 */

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() so instanceof checks survive transpilation.
 *
 * @example
 * ```typescript
 * throw new AppError("Something went wrong", "GENERIC_ERROR");
 * ```
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Fatal misconfiguration
 *
 * Surfaces at the call that triggered it and is never retried.
 *
 * @param setting - The config key or invariant that was violated (e.g. "chunking.overlap")
 *
 * @example
 * ```typescript
 * if (overlap >= size) {
 *   throw new ConfigurationError("overlap must be smaller than size", "chunking.overlap");
 * }
 * ```
 */
export class ConfigurationError extends AppError {
	constructor(
		message: string,
		public readonly setting: string,
	) {
		super(message, "CONFIGURATION_ERROR");
		this.name = "ConfigurationError";
		Object.setPrototypeOf(this, ConfigurationError.prototype);
	}
}

/**
 * A failed external call that is worth retrying
 *
 * @param operation - The external operation (e.g. "embed", "complete")
 */
export class TransientFailure extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
		code = "TRANSIENT_FAILURE",
	) {
		super(message, code);
		this.name = "TransientFailure";
		Object.setPrototypeOf(this, TransientFailure.prototype);
	}
}

/**
 * The external service asked us to slow down
 *
 * Retried like any transient failure, with a more conservative delay. When the
 * service says how long to wait, `retryAfterMs` carries it.
 */
export class RateLimitFailure extends TransientFailure {
	constructor(
		message: string,
		operation: string,
		public readonly retryAfterMs?: number,
	) {
		super(message, operation, "RATE_LIMIT_FAILURE");
		this.name = "RateLimitFailure";
		Object.setPrototypeOf(this, RateLimitFailure.prototype);
	}
}

/**
 * Position of an embedding sub-batch within the caller's input
 */
export interface BatchRef {
	index: number;
	start: number;
	size: number;
}

export interface PermanentFailureDetails {
	attempts: number;
	/** Embedding sub-batch the call covered */
	batch?: BatchRef;
	/** True when the retry budget ran out, false for an outright rejection */
	exhausted?: boolean;
	underlying?: unknown;
}

/**
 * A failure that retrying will not fix
 *
 * Raised when the retry budget is exhausted or the service rejects the request
 * outright (4xx-class). `batch` names the embedding sub-batch when there is one,
 * so ingestion can isolate it and carry on.
 */
export class PermanentFailure extends AppError {
	public readonly attempts: number;
	public readonly batch?: BatchRef;
	public readonly exhausted: boolean;
	public readonly underlying?: unknown;

	constructor(
		message: string,
		public readonly operation: string,
		details: PermanentFailureDetails,
	) {
		super(message, "PERMANENT_FAILURE");
		this.name = "PermanentFailure";
		this.attempts = details.attempts;
		this.batch = details.batch;
		this.exhausted = details.exhausted ?? false;
		this.underlying = details.underlying;
		Object.setPrototypeOf(this, PermanentFailure.prototype);
	}
}

// =============================================================================
// Classification
// =============================================================================

const PERMANENT_STATUS_CODES = new Set([400, 401, 403, 404, 422]);

/**
 * Pull a "retry after N seconds" hint out of a service error message.
 * Returns milliseconds, or undefined when there is no hint.
 */
export function extractRetryAfterMs(message: string): number | undefined {
	const match = /retry after (\d+(?:\.\d+)?) ?(ms|milliseconds|s|sec|seconds)?/i.exec(message);
	if (!match) return undefined;
	const value = Number.parseFloat(match[1]);
	const unit = match[2]?.toLowerCase();
	if (unit === "ms" || unit === "milliseconds") return Math.round(value);
	return Math.round(value * 1000);
}

/**
 * Read an HTTP status from an error-like value, if it carries one
 */
function statusOf(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null) return undefined;
	for (const key of ["statusCode", "status"]) {
		if (key in error) {
			const value: unknown = Reflect.get(error, key);
			if (typeof value === "number") return value;
		}
	}
	return undefined;
}

/**
 * Convert a raw error from an external service into the pipeline's taxonomy.
 *
 * Errors already in the taxonomy pass through unchanged. Anything unrecognised
 * is treated as transient, so one retry cycle decides whether it sticks.
 *
 * @example
 * ```typescript
 * try {
 *   return await service.embed(texts, { model });
 * } catch (error) {
 *   throw classifyServiceError(error, "embed");
 * }
 * ```
 */
export function classifyServiceError(error: unknown, operation: string): AppError {
	if (error instanceof AppError) {
		return error;
	}

	const message = error instanceof Error ? error.message : String(error);
	const lower = message.toLowerCase();
	const status = statusOf(error);

	if (status === 429 || lower.includes("rate limit") || lower.includes("too many requests")) {
		return new RateLimitFailure(message, operation, extractRetryAfterMs(message));
	}

	if (
		(status !== undefined && PERMANENT_STATUS_CODES.has(status)) ||
		lower.includes("invalid api key") ||
		lower.includes("incorrect api key") ||
		lower.includes("unauthorized") ||
		lower.includes("bad request")
	) {
		return new PermanentFailure(message, operation, { attempts: 1, underlying: error });
	}

	return new TransientFailure(message, operation);
}
