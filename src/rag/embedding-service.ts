/**
 * Embedding Service
 *
 * Boundary to the external embedding API. One call embeds one sub-batch; the
 * Embedder owns batching, retries and timeouts.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { embedMany } from "ai";
import { z } from "zod";
import type { EmbeddingConfig } from "../config.js";
import { ConfigurationError, PermanentFailure } from "../errors.js";

export interface EmbeddingResult {
	vectors: number[][];
}

export interface EmbedCallOptions {
	model: string;
	signal?: AbortSignal;
}

/**
 * Anything that turns texts into vectors, one per text, in order
 */
export interface EmbeddingService {
	embed(texts: string[], options: EmbedCallOptions): Promise<EmbeddingResult>;
}

const VectorSchema = z.array(z.number().finite()).min(1);

/**
 * Check a service response against the request that produced it
 *
 * @throws {PermanentFailure} On a wrong vector count, a non-finite value or mixed dimensions
 */
export function validateEmbeddingResult(result: unknown, expected: number): EmbeddingResult {
	const schema = z.object({
		vectors: z
			.array(VectorSchema)
			.length(expected, { message: `expected ${expected} vectors` })
			.refine((vectors) => vectors.every((v) => v.length === vectors[0]?.length), {
				message: "vectors have mixed dimensions",
			}),
	});

	const parsed = schema.safeParse(result);
	if (!parsed.success) {
		const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
		throw new PermanentFailure(`Invalid embedding response: ${detail}`, "embed", { attempts: 1 });
	}
	return parsed.data;
}

/**
 * OpenAI (or OpenAI-compatible) embeddings through the AI SDK
 */
export class OpenAIEmbeddingService implements EmbeddingService {
	private provider: ReturnType<typeof createOpenAI> | null;

	constructor(options: Pick<EmbeddingConfig, "apiKey" | "baseUrl">) {
		// Without a key the store can still be inspected; embedding fails on first use
		this.provider = options.apiKey ? createOpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl }) : null;
	}

	async embed(texts: string[], options: EmbedCallOptions): Promise<EmbeddingResult> {
		if (!this.provider) {
			throw new ConfigurationError(
				"No embedding API key configured; set OPENAI_API_KEY or embedding.apiKey in .groundlinerc",
				"embedding.apiKey",
			);
		}

		const { embeddings } = await embedMany({
			model: this.provider.textEmbeddingModel(options.model),
			values: texts,
			// retries belong to the Embedder
			maxRetries: 0,
			abortSignal: options.signal,
		});
		return { vectors: embeddings };
	}
}
