/**
 * Embedder Module
 *
 * Turns texts into vectors through an EmbeddingService.
 *
 * Key features:
 * - Sub-batches of at most `maxBatchSize` (the API's hard input limit)
 * - At most `concurrency` sub-batches in flight
 * - Every call bounded by `timeoutMs` and retried per the retry policy
 * - Per-batch outcomes, so one bad batch does not sink the rest
 */

import type { EmbeddingConfig } from "../config.js";
import { runWithConcurrency, SKIPPED } from "../concurrency.js";
import { type BatchRef, PermanentFailure } from "../errors.js";
import { logger as rootLogger } from "../logger.js";
import { type RetryPolicy, type SleepFn, withRetry, withTimeout } from "../retry-handler.js";
import { type EmbeddingService, validateEmbeddingResult } from "./embedding-service.js";
import type { BatchFailure } from "./types.js";

const logger = rootLogger.child({ module: "rag-embedder" });

export interface EmbedderOptions extends Pick<EmbeddingConfig, "model" | "maxBatchSize" | "concurrency" | "timeoutMs"> {
	service: EmbeddingService;
	retry: RetryPolicy;
	sleep?: SleepFn;
	random?: () => number;
}

/**
 * A successfully embedded sub-batch; `vectors[i]` belongs to `texts[start + i]`
 */
export interface EmbeddedBatch extends BatchRef {
	vectors: number[][];
}

export type BatchHandler = (batch: EmbeddedBatch) => void | Promise<void>;

/**
 * Split `total` inputs into consecutive sub-batches of at most `maxBatchSize`
 */
export function planBatches(total: number, maxBatchSize: number): BatchRef[] {
	const size = Math.max(1, maxBatchSize);
	const batches: BatchRef[] = [];
	for (let start = 0; start < total; start += size) {
		batches.push({ index: batches.length, start, size: Math.min(size, total - start) });
	}
	return batches;
}

export class Embedder {
	readonly model: string;
	private options: EmbedderOptions;

	constructor(options: EmbedderOptions) {
		this.options = options;
		this.model = options.model;
	}

	/**
	 * Embed texts, one vector per text, in input order
	 *
	 * @throws {PermanentFailure} For the first sub-batch that could not be embedded
	 * @throws {ConfigurationError} When the service reports a configuration problem
	 */
	async embed(texts: string[]): Promise<number[][]> {
		const vectors: number[][] = new Array(texts.length);

		const failures = await this.embedInBatches(texts, (batch) => {
			batch.vectors.forEach((vector, i) => {
				vectors[batch.start + i] = vector;
			});
		});

		const first = failures[0];
		if (first) {
			throw new PermanentFailure(first.message, "embed", {
				attempts: first.attempts,
				batch: { index: first.index, start: first.start, size: first.size },
				exhausted: first.reason === "exhausted",
			});
		}

		return vectors;
	}

	/**
	 * Embed texts sub-batch by sub-batch, handing each success to `onBatch` as it
	 * completes. Sub-batches that fail or are never dispatched are returned.
	 *
	 * An error thrown by `onBatch`, or a ConfigurationError from the service,
	 * stops dispatch and propagates once the sub-batches already in flight have
	 * settled. Their results are discarded, not handed to `onBatch`.
	 */
	async embedInBatches(texts: string[], onBatch: BatchHandler, signal?: AbortSignal): Promise<BatchFailure[]> {
		const batches = planBatches(texts.length, this.options.maxBatchSize);
		if (batches.length === 0) {
			return [];
		}

		// Aborted by the caller, or by us on a fatal error
		const stop = new AbortController();
		const onAbort = () => stop.abort();
		if (signal?.aborted) stop.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		const failures: BatchFailure[] = [];
		// Set on the first error that is not a PermanentFailure
		let fatal = false;

		const tasks = batches.map((batch) => async () => {
			try {
				const vectors = await this.embedBatch(texts.slice(batch.start, batch.start + batch.size), batch);
				if (fatal) {
					logger.debug({ batch: batch.index }, "Discarding embedded batch after a fatal error");
					return;
				}
				await onBatch({ ...batch, vectors });
			} catch (error) {
				if (!(error instanceof PermanentFailure)) {
					fatal = true;
					stop.abort();
					throw error;
				}
				failures.push({
					...batch,
					reason: error.exhausted ? "exhausted" : "rejected",
					message: error.message,
					attempts: error.attempts,
				});
			}
		});

		logger.debug(
			{ texts: texts.length, batches: batches.length, concurrency: this.options.concurrency },
			"Dispatching embedding batches",
		);

		try {
			const results = await runWithConcurrency(tasks, this.options.concurrency, stop.signal);
			results.forEach((result, i) => {
				if (result === SKIPPED) {
					failures.push({
						...batches[i],
						reason: "aborted",
						message: "Ingestion aborted before this batch was dispatched",
						attempts: 0,
					});
				}
			});
		} finally {
			signal?.removeEventListener("abort", onAbort);
		}

		if (failures.length > 0) {
			logger.warn(
				{ failed: failures.map((f) => ({ index: f.index, reason: f.reason })), total: batches.length },
				"Some embedding batches failed",
			);
		}

		return failures.sort((a, b) => a.index - b.index);
	}

	private embedBatch(texts: string[], batch: BatchRef): Promise<number[][]> {
		const { service, model, timeoutMs, retry, sleep, random } = this.options;

		return withRetry(
			async () => {
				const result = await withTimeout((timeoutSignal) => service.embed(texts, { model, signal: timeoutSignal }), timeoutMs, "embed");
				return validateEmbeddingResult(result, texts.length).vectors;
			},
			{ policy: retry, operation: "embed", batch, sleep, random },
		);
	}
}

/**
 * Create an embedder from the embedding and retry sections of the config
 */
export function createEmbedder(
	config: EmbeddingConfig,
	retry: RetryPolicy,
	service: EmbeddingService,
): Embedder {
	return new Embedder({
		service,
		model: config.model,
		maxBatchSize: config.maxBatchSize,
		concurrency: config.concurrency,
		timeoutMs: config.timeoutMs,
		retry,
	});
}
