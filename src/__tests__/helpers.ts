/**
 * Test Helpers
 *
 * In-process stand-ins for the external embedding and completion services,
 * plus config and temp-directory factories.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type GroundlineConfig, getDefaultConfig } from "../config.js";
import type { CompletionOptions, CompletionResult, CompletionService } from "../rag/completion-service.js";
import type { EmbedCallOptions, EmbeddingResult, EmbeddingService } from "../rag/embedding-service.js";
import type { RetryPolicy } from "../retry-handler.js";

/**
 * Retry policy without jitter, so recorded sleeps are exact
 */
export const TEST_RETRY_POLICY: RetryPolicy = {
	maxAttempts: 3,
	baseDelayMs: 100,
	maxDelayMs: 1000,
	factor: 2,
	rateLimitMultiplier: 2,
	jitterPercent: 0,
};

/**
 * Deterministic 4-dimensional embedding from keyword counts:
 * [cat words, dog words, bird words, 0.1]
 */
export function keywordEmbedding(text: string): number[] {
	const lower = text.toLowerCase();
	const count = (pattern: RegExp) => (lower.match(pattern) ?? []).length;
	return [count(/cat|feline|kitten/g), count(/dog|canine|puppy/g), count(/bird|parrot/g), 0.1];
}

/**
 * Embedding service stand-in. Records every call; `failWith` may return an
 * error to throw for a given call (0-based call number), and `delayMs` holds a
 * call open for that long before it answers.
 */
export class FakeEmbeddingService implements EmbeddingService {
	readonly calls: string[][] = [];
	inFlight = 0;
	maxInFlight = 0;

	constructor(
		private failWith: (texts: string[], call: number) => unknown = () => undefined,
		private embedText: (text: string) => number[] = keywordEmbedding,
		private delayMs: (texts: string[], call: number) => number = () => 0,
	) {}

	async embed(texts: string[], _options: EmbedCallOptions): Promise<EmbeddingResult> {
		const call = this.calls.length;
		this.calls.push([...texts]);
		this.inFlight++;
		this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
		try {
			const delay = this.delayMs(texts, call);
			if (delay > 0) {
				await new Promise((resolve) => setTimeout(resolve, delay));
			}
			const failure = this.failWith(texts, call);
			if (failure !== undefined) {
				throw failure;
			}
			return { vectors: texts.map((text) => this.embedText(text)) };
		} finally {
			this.inFlight--;
		}
	}
}

/**
 * Completion service stand-in that returns a fixed answer or throws
 */
export class FakeCompletionService implements CompletionService {
	readonly calls: Array<{ systemPrompt: string; userPrompt: string; options: CompletionOptions }> = [];

	constructor(private reply: (call: number) => string | Error = () => "An answer.") {}

	async complete(systemPrompt: string, userPrompt: string, options: CompletionOptions): Promise<CompletionResult> {
		const call = this.calls.length;
		this.calls.push({ systemPrompt, userPrompt, options });
		const result = this.reply(call);
		if (result instanceof Error) {
			throw result;
		}
		return { text: result };
	}
}

/**
 * An HTTP-style error, as the provider SDKs throw them
 */
export function httpError(statusCode: number, message: string): Error & { statusCode: number } {
	return Object.assign(new Error(message), { statusCode });
}

/**
 * Config rooted in `stateDir`, with instant retries and small batches
 */
export function createTestConfig(stateDir: string, overrides: Partial<GroundlineConfig> = {}): GroundlineConfig {
	const defaults = getDefaultConfig();
	return {
		...defaults,
		stateDir,
		chunking: { size: 100, overlap: 20 },
		embedding: { ...defaults.embedding, model: "test-embedding", maxBatchSize: 2, concurrency: 2, timeoutMs: 1000 },
		retry: { ...TEST_RETRY_POLICY, baseDelayMs: 0, maxDelayMs: 0 },
		generation: { ...defaults.generation, model: "test-completion", timeoutMs: 1000 },
		...overrides,
	};
}

export function createTempDir(prefix: string): string {
	return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
	rmSync(dir, { recursive: true, force: true });
}

/**
 * Sleep stand-in that records requested delays and resolves at once
 */
export function recordingSleep(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
	const sleeps: number[] = [];
	return {
		sleeps,
		sleep: async (ms: number) => {
			sleeps.push(ms);
		},
	};
}
