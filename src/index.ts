/**
 * groundline - Centralized Export Module
 *
 * Single entry point for embedding the pipeline in another program:
 * - Configuration loading and validation
 * - The RAG engine and its components
 * - Error taxonomy and retry primitives
 */

// Concurrency
export { runWithConcurrency, SKIPPED } from "./concurrency.js";
// Configuration
export {
	type ChunkingConfig,
	type EmbeddingConfig,
	type GenerationConfig,
	type GroundlineConfig,
	type GroundlineRc,
	getDefaultConfig,
	type LoadConfigOptions,
	loadConfig,
	mergeWithConfig,
	type RetrievalConfig,
	validateConfig,
} from "./config.js";
// Errors
export {
	AppError,
	type BatchRef,
	ConfigurationError,
	classifyServiceError,
	PermanentFailure,
	RateLimitFailure,
	TransientFailure,
} from "./errors.js";
// Logging
export { logger } from "./logger.js";
// RAG pipeline
export * from "./rag/index.js";
// Retry
export {
	calculateBackoffDelay,
	DEFAULT_RETRY_POLICY,
	type RetryOptions,
	type RetryPolicy,
	type SleepFn,
	withRetry,
	withTimeout,
} from "./retry-handler.js";
