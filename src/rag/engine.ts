/**
 * RAG Engine
 *
 * Main orchestrator for the pipeline. Provides the high-level API for:
 * - Ingesting documents (chunk, embed, store)
 * - Answering questions from retrieved context
 * - Inspecting and clearing the collection
 *
 * Lifecycle: idle -> ingesting -> ready -> querying -> ready. Ingest calls
 * queue behind one another; queries never mutate the collection and may run
 * concurrently.
 */

import type { GroundlineConfig } from "../config.js";
import { logger as rootLogger } from "../logger.js";
import { computeChunkId, createChunker, type Chunker } from "./chunker.js";
import { AnthropicCompletionService, type CompletionService } from "./completion-service.js";
import { type IndexStore, openIndexStore } from "./database.js";
import { createEmbedder, type Embedder } from "./embedder.js";
import { type EmbeddingService, OpenAIEmbeddingService } from "./embedding-service.js";
import { Generator } from "./generator.js";
import { type IntegrityBounds, type IntegrityReport, verifyIntegrity } from "./integrity.js";
import { buildPrompt, GENERATION_FALLBACK, INSUFFICIENT_INFORMATION } from "./prompt-builder.js";
import { Retriever } from "./retriever.js";
import type {
	Chunk,
	Document,
	EngineState,
	FailedBatch,
	IndexEntry,
	IngestReport,
	RAGStats,
	RetrievedChunk,
} from "./types.js";

const logger = rootLogger.child({ module: "rag-engine" });

export interface RAGEngineComponents {
	chunker: Chunker;
	embedder: Pick<Embedder, "embed" | "embedInBatches">;
	store: IndexStore;
	generator: Pick<Generator, "generate">;
	topK: number;
	integrity: IntegrityBounds;
}

export interface IngestOptions {
	/** Stops dispatch of further embedding batches */
	signal?: AbortSignal;
}

/**
 * RAG Engine - main orchestrator
 */
export class RAGEngine {
	private chunker: Chunker;
	private embedder: Pick<Embedder, "embed" | "embedInBatches">;
	private store: IndexStore;
	private generator: Pick<Generator, "generate">;
	private retriever: Retriever;
	private topK: number;
	private integrity: IntegrityBounds;

	private ingestQueue: Promise<void> = Promise.resolve();
	private activeIngests = 0;
	private activeQueries = 0;
	private hasIngested = false;

	constructor(components: RAGEngineComponents) {
		this.chunker = components.chunker;
		this.embedder = components.embedder;
		this.store = components.store;
		this.generator = components.generator;
		this.retriever = new Retriever(components.embedder, components.store);
		this.topK = components.topK;
		this.integrity = components.integrity;
	}

	get state(): EngineState {
		if (this.activeIngests > 0) return "ingesting";
		if (this.activeQueries > 0) return "querying";
		if (this.hasIngested || this.store.count() > 0) return "ready";
		return "idle";
	}

	/**
	 * Chunk, embed and store documents
	 *
	 * Each embedded sub-batch is committed as soon as it arrives. Batches that
	 * fail are reported in `failed` and the rest carry on; re-running over the
	 * same documents is safe.
	 *
	 * @throws {ConfigurationError} On a dimension/model mismatch or missing credentials
	 */
	ingest(documents: readonly Document[], options: IngestOptions = {}): Promise<IngestReport> {
		const run = this.ingestQueue.then(() => this.runIngest(documents, options.signal));
		// Keep the queue moving; the caller observes failures through `run`
		this.ingestQueue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async runIngest(documents: readonly Document[], signal?: AbortSignal): Promise<IngestReport> {
		this.activeIngests++;
		try {
			const chunks = documents.flatMap((document) => this.chunker.chunk(document));
			const ids = chunks.map(computeChunkId);

			if (chunks.length === 0) {
				logger.info({ documents: documents.length }, "No chunks to ingest");
				return { ingested: 0, failed: [], chunks: 0, documents: documents.length };
			}

			let ingested = 0;
			const failures = await this.embedder.embedInBatches(
				chunks.map((chunk) => chunk.content),
				(batch) => {
					const entries = batch.vectors.map((embedding, i) =>
						toEntry(ids[batch.start + i], chunks[batch.start + i], embedding),
					);
					this.store.upsert(entries);
					ingested += entries.length;
				},
				signal,
			);

			const failed: FailedBatch[] = failures.map((failure) => {
				const covered = chunks.slice(failure.start, failure.start + failure.size);
				return {
					...failure,
					chunkIds: ids.slice(failure.start, failure.start + failure.size),
					sources: [...new Set(covered.map((chunk) => chunk.source))],
				};
			});

			logger.info(
				{ documents: documents.length, chunks: chunks.length, ingested, failedBatches: failed.length },
				"Ingestion finished",
			);

			return { ingested, failed, chunks: chunks.length, documents: documents.length };
		} finally {
			this.activeIngests--;
			this.hasIngested = true;
		}
	}

	/**
	 * Nearest chunks to `query`, `topK` by default
	 */
	retrieve(query: string, k: number = this.topK): Promise<RetrievedChunk[]> {
		return this.retriever.retrieve(query, k);
	}

	/**
	 * Answer a question from the indexed documents. Never throws.
	 *
	 * Returns INSUFFICIENT_INFORMATION without calling the model when nothing
	 * is retrieved, and GENERATION_FALLBACK on any internal failure.
	 */
	async ask(query: string): Promise<string> {
		this.activeQueries++;
		try {
			const chunks = await this.retriever.retrieve(query, this.topK);
			if (chunks.length === 0) {
				logger.debug({ query }, "Nothing retrieved, skipping generation");
				return INSUFFICIENT_INFORMATION;
			}
			return await this.generator.generate(buildPrompt(query, chunks));
		} catch (error) {
			logger.error({ query, error: String(error) }, "Question answering failed");
			return GENERATION_FALLBACK;
		} finally {
			this.activeQueries--;
		}
	}

	count(): number {
		return this.store.count();
	}

	stats(): RAGStats {
		return this.store.stats();
	}

	verify(): IntegrityReport {
		return verifyIntegrity(this.store.all(), this.integrity);
	}

	clear(): void {
		this.store.clear();
		this.hasIngested = false;
		logger.info("RAG index cleared");
	}

	close(): void {
		this.store.close();
	}
}

function toEntry(id: string, chunk: Chunk, embedding: number[]): IndexEntry {
	return {
		id,
		embedding,
		text: chunk.content,
		metadata: { source: chunk.source, sequence: chunk.sequence },
	};
}

export interface EngineServices {
	embeddingService?: EmbeddingService;
	completionService?: CompletionService;
	store?: IndexStore;
}

/**
 * Wire an engine from configuration. Services default to OpenAI embeddings,
 * Claude completions and the SQLite store under `stateDir`.
 */
export function createRAGEngine(config: GroundlineConfig, services: EngineServices = {}): RAGEngine {
	const embeddingService = services.embeddingService ?? new OpenAIEmbeddingService(config.embedding);
	const completionService = services.completionService ?? new AnthropicCompletionService(config.generation);
	const store = services.store ?? openIndexStore(config);

	return new RAGEngine({
		chunker: createChunker(config.chunking),
		embedder: createEmbedder(config.embedding, config.retry, embeddingService),
		store,
		generator: new Generator({ ...config.generation, service: completionService, retry: config.retry }),
		topK: config.retrieval.topK,
		integrity: { minChars: 1, maxChars: config.chunking.size },
	});
}
