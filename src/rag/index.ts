/**
 * RAG Module
 *
 * Ingestion-and-retrieval pipeline:
 * - Recursive character chunking with overlap
 * - OpenAI-compatible embeddings via the AI SDK, batched and retried
 * - better-sqlite3 + sqlite-vec cosine search
 * - Grounded answers from Claude via the Agent SDK
 */

// Chunker
export { type Chunker, chunkDocuments, computeChunkId, createChunker, RecursiveCharacterChunker } from "./chunker.js";
// Completion
export {
	AnthropicCompletionService,
	type CompletionOptions,
	type CompletionResult,
	type CompletionService,
} from "./completion-service.js";
// Database
export { type IndexStore, openIndexStore, RAG_DB_FILENAME, SqliteIndexStore } from "./database.js";
// Embedder
export { type BatchHandler, createEmbedder, type EmbeddedBatch, Embedder, type EmbedderOptions } from "./embedder.js";
export {
	type EmbedCallOptions,
	type EmbeddingResult,
	type EmbeddingService,
	OpenAIEmbeddingService,
} from "./embedding-service.js";
// Engine (main entry point)
export { createRAGEngine, type EngineServices, type IngestOptions, RAGEngine } from "./engine.js";
// Generator
export { Generator, type GeneratorOptions } from "./generator.js";
// Integrity
export { type IntegrityBounds, type IntegrityReport, verifyIntegrity } from "./integrity.js";
// Loader
export { loadDocuments, loadFile, SUPPORTED_EXTENSIONS } from "./loader.js";
// Prompt
export {
	buildPrompt,
	GENERATION_FALLBACK,
	GENERATOR_SYSTEM_PROMPT,
	INSUFFICIENT_CONTEXT_REPLY,
	INSUFFICIENT_INFORMATION,
} from "./prompt-builder.js";
// Retriever
export { Retriever } from "./retriever.js";
// Types
export type {
	BatchFailure,
	Chunk,
	ChunkId,
	Document,
	EngineState,
	FailedBatch,
	IndexEntry,
	IngestReport,
	RAGStats,
	RetrievedChunk,
	ScoredEntry,
} from "./types.js";
