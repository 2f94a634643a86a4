/**
 * RAG Module Types
 *
 * Core type definitions for the ingestion-and-retrieval pipeline.
 */

import type { BatchRef } from "../errors.js";

/**
 * A loaded document, as produced by a loader. Immutable once created.
 */
export interface Document {
	readonly source: string;
	readonly content: string;
}

/**
 * A bounded, overlap-linked segment of one document
 */
export interface Chunk {
	source: string;
	content: string;
	/** 0-based position within the source document */
	sequence: number;
}

/**
 * Content-addressed chunk identifier (`chunk_<hex>`)
 */
export type ChunkId = string;

/**
 * A stored chunk with its embedding
 */
export interface IndexEntry {
	id: ChunkId;
	embedding: number[];
	text: string;
	metadata: {
		source: string;
		sequence: number;
	};
}

/**
 * An entry returned by a similarity query, with its cosine distance
 */
export interface ScoredEntry extends IndexEntry {
	distance: number;
}

/**
 * A chunk returned by the retriever
 */
export interface RetrievedChunk extends Chunk {
	id: ChunkId;
	distance: number;
}

/**
 * Why an ingestion sub-batch was not committed
 */
export type BatchFailureReason = "exhausted" | "rejected" | "aborted";

/**
 * An embedding sub-batch that did not make it into the index
 */
export interface BatchFailure extends BatchRef {
	reason: BatchFailureReason;
	message: string;
	/** Calls made before giving up; 0 when the batch was never dispatched */
	attempts: number;
}

/**
 * A failed ingestion sub-batch, with the chunks it covered so it can be retried
 */
export interface FailedBatch extends BatchFailure {
	chunkIds: ChunkId[];
	sources: string[];
}

/**
 * Result of RAGEngine.ingest()
 */
export interface IngestReport {
	/** Chunks committed during this run */
	ingested: number;
	failed: FailedBatch[];
	/** Chunks produced by the chunker */
	chunks: number;
	documents: number;
}

/**
 * Collection statistics
 */
export interface RAGStats {
	collection: string;
	entryCount: number;
	embeddingDimensions: number | null;
	embeddingModel: string | null;
	sources: Array<{ source: string; chunkCount: number }>;
}

/**
 * Orchestrator lifecycle
 */
export type EngineState = "idle" | "ingesting" | "ready" | "querying";

/**
 * Database row type for SQLite mapping
 */
export interface EntryRow {
	id: string;
	seq: number;
	source: string;
	sequence: number;
	text: string;
	embedding: string;
	created_at: string;
	updated_at: string;
	distance?: number;
}
