/**
 * Configuration
 *
 * Builds the explicit GroundlineConfig object that is passed into every
 * pipeline component. Nothing reads configuration at import time.
 *
 * Sources (in order of precedence, highest first):
 * 1. CLI flags (applied by the caller through mergeWithConfig)
 * 2. Environment variables (GROUNDLINE_*, OPENAI_API_KEY, ANTHROPIC_API_KEY)
 * 3. .groundlinerc in the current directory
 * 4. .groundlinerc in the home directory
 * 5. Built-in defaults
 *
 * Each rc file is JSON, validated with zod. Invalid values are dropped with a
 * warning and the lower-precedence value is kept. Cross-field problems
 * (e.g. overlap >= chunk size) are fatal ConfigurationErrors.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { configLogger } from "./logger.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry-handler.js";

export const RC_FILENAME = ".groundlinerc";

export interface ChunkingConfig {
	/** Maximum characters per chunk */
	size: number;
	/** Characters carried over from the previous chunk */
	overlap: number;
}

export interface EmbeddingConfig {
	model: string;
	/** OpenAI-compatible endpoint; the public OpenAI API when unset */
	baseUrl?: string;
	apiKey?: string;
	/** Hard per-request input limit of the embedding API */
	maxBatchSize: number;
	/** Sub-batches in flight at once */
	concurrency: number;
	timeoutMs: number;
}

export interface RetrievalConfig {
	topK: number;
}

export interface GenerationConfig {
	model: string;
	/** Anthropic-compatible endpoint; the public Anthropic API when unset */
	baseUrl?: string;
	apiKey?: string;
	/** Sampling temperature, 0 to 1 */
	temperature: number;
	/** Upper bound on generated tokens */
	maxTokens: number;
	timeoutMs: number;
	maxAnswerChars: number;
}

export interface GroundlineConfig {
	stateDir: string;
	collection: string;
	chunking: ChunkingConfig;
	embedding: EmbeddingConfig;
	retry: RetryPolicy;
	retrieval: RetrievalConfig;
	generation: GenerationConfig;
}

// =============================================================================
// Schema
// =============================================================================

const RcSchema = z.object({
	stateDir: z.string().min(1).optional(),
	collection: z
		.string()
		.regex(/^[A-Za-z0-9_-]+$/, "letters, digits, '-' and '_' only")
		.optional(),
	chunking: z
		.object({
			size: z.number().int().min(1).max(100_000).optional(),
			overlap: z.number().int().min(0).max(100_000).optional(),
		})
		.optional(),
	embedding: z
		.object({
			model: z.string().min(1).optional(),
			baseUrl: z.string().url().optional(),
			apiKey: z.string().min(1).optional(),
			maxBatchSize: z.number().int().min(1).max(4096).optional(),
			concurrency: z.number().int().min(1).max(32).optional(),
			timeoutMs: z.number().int().min(100).optional(),
		})
		.optional(),
	retry: z
		.object({
			maxAttempts: z.number().int().min(1).max(20).optional(),
			baseDelayMs: z.number().int().min(0).optional(),
			maxDelayMs: z.number().int().min(0).optional(),
			factor: z.number().min(1).max(10).optional(),
			rateLimitMultiplier: z.number().min(1).max(10).optional(),
			jitterPercent: z.number().min(0).max(100).optional(),
		})
		.optional(),
	retrieval: z
		.object({
			topK: z.number().int().min(1).max(100).optional(),
		})
		.optional(),
	generation: z
		.object({
			model: z.string().min(1).optional(),
			baseUrl: z.string().url().optional(),
			apiKey: z.string().min(1).optional(),
			temperature: z.number().min(0).max(1).optional(),
			maxTokens: z.number().int().min(1).max(64_000).optional(),
			timeoutMs: z.number().int().min(100).optional(),
			maxAnswerChars: z.number().int().min(1).optional(),
		})
		.optional(),
});

/**
 * Shape of a .groundlinerc file; every key is optional
 */
export type GroundlineRc = z.infer<typeof RcSchema>;

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: GroundlineConfig = {
	stateDir: ".groundline",
	collection: "documents",
	chunking: { size: 1000, overlap: 200 },
	embedding: {
		model: "text-embedding-3-small",
		maxBatchSize: 64,
		concurrency: 4,
		timeoutMs: 30_000,
	},
	retry: { ...DEFAULT_RETRY_POLICY },
	retrieval: { topK: 3 },
	generation: {
		model: "claude-haiku-4-5",
		temperature: 0.7,
		maxTokens: 1000,
		timeoutMs: 60_000,
		maxAnswerChars: 4000,
	},
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate an rc object, dropping the keys that fail and keeping the rest
 */
export function validateRc(raw: unknown, filePath: string): GroundlineRc | null {
	if (!isRecord(raw)) {
		configLogger.warn({ filePath }, "Config is not an object, ignoring");
		return null;
	}

	const first = RcSchema.safeParse(raw);
	if (first.success) {
		return first.data;
	}

	const cleaned = structuredClone(raw);
	const warnings: string[] = [];
	for (const issue of first.error.issues) {
		const [section, key] = issue.path;
		warnings.push(`${issue.path.join(".")}: ${issue.message}`);
		if (typeof section !== "string") continue;
		const inner = cleaned[section];
		if (typeof key === "string" && isRecord(inner)) {
			delete inner[key];
		} else {
			delete cleaned[section];
		}
	}
	configLogger.warn({ filePath, warnings }, "Invalid config values ignored");

	const second = RcSchema.safeParse(cleaned);
	return second.success ? second.data : null;
}

/**
 * Try to read and parse a config file
 */
function tryReadRc(filePath: string): GroundlineRc | null {
	if (!fs.existsSync(filePath)) {
		return null;
	}

	try {
		const content = fs.readFileSync(filePath, "utf-8");
		return validateRc(JSON.parse(content), filePath);
	} catch (error) {
		configLogger.warn({ filePath, error: String(error) }, "Could not read config file, ignoring");
		return null;
	}
}

/**
 * Read GROUNDLINE_* and credential variables into an rc overlay
 */
function rcFromEnv(env: NodeJS.ProcessEnv): GroundlineRc {
	const rc: GroundlineRc = {};
	if (env.GROUNDLINE_STATE_DIR) rc.stateDir = env.GROUNDLINE_STATE_DIR;
	if (env.GROUNDLINE_COLLECTION) rc.collection = env.GROUNDLINE_COLLECTION;

	const embedding: NonNullable<GroundlineRc["embedding"]> = {};
	if (env.GROUNDLINE_EMBEDDING_MODEL) embedding.model = env.GROUNDLINE_EMBEDDING_MODEL;
	if (env.GROUNDLINE_EMBEDDING_BASE_URL) embedding.baseUrl = env.GROUNDLINE_EMBEDDING_BASE_URL;
	if (env.OPENAI_API_KEY) embedding.apiKey = env.OPENAI_API_KEY;
	if (Object.keys(embedding).length > 0) rc.embedding = embedding;

	const generation: NonNullable<GroundlineRc["generation"]> = {};
	if (env.GROUNDLINE_COMPLETION_MODEL) generation.model = env.GROUNDLINE_COMPLETION_MODEL;
	if (env.ANTHROPIC_API_KEY) generation.apiKey = env.ANTHROPIC_API_KEY;
	if (Object.keys(generation).length > 0) rc.generation = generation;

	return validateRc(rc, "environment") ?? {};
}

/**
 * Overlay an rc onto a full config. Undefined values never override.
 */
export function mergeWithConfig(config: GroundlineConfig, rc: GroundlineRc): GroundlineConfig {
	const pick = <T extends object>(base: T, overlay: Partial<T> | undefined): T => {
		const merged = { ...base };
		if (!overlay) return merged;
		for (const [key, value] of Object.entries(overlay)) {
			if (value !== undefined) {
				Reflect.set(merged, key, value);
			}
		}
		return merged;
	};

	return {
		stateDir: rc.stateDir ?? config.stateDir,
		collection: rc.collection ?? config.collection,
		chunking: pick(config.chunking, rc.chunking),
		embedding: pick(config.embedding, rc.embedding),
		retry: pick(config.retry, rc.retry),
		retrieval: pick(config.retrieval, rc.retrieval),
		generation: pick(config.generation, rc.generation),
	};
}

/**
 * Check the invariants that span more than one key
 *
 * @throws {ConfigurationError} On the first violated invariant
 */
export function validateConfig(config: GroundlineConfig): GroundlineConfig {
	if (config.chunking.overlap >= config.chunking.size) {
		throw new ConfigurationError(
			`chunking.overlap (${config.chunking.overlap}) must be smaller than chunking.size (${config.chunking.size})`,
			"chunking.overlap",
		);
	}
	if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
		throw new ConfigurationError(
			`retry.maxDelayMs (${config.retry.maxDelayMs}) must be at least retry.baseDelayMs (${config.retry.baseDelayMs})`,
			"retry.maxDelayMs",
		);
	}
	return config;
}

export interface LoadConfigOptions {
	cwd?: string;
	homeDir?: string;
	env?: NodeJS.ProcessEnv;
	/** Highest-precedence overlay, typically from CLI flags */
	overrides?: GroundlineRc;
}

/**
 * Load configuration from rc files and the environment
 *
 * @throws {ConfigurationError} When the merged result violates a cross-field invariant
 */
export function loadConfig(options: LoadConfigOptions = {}): GroundlineConfig {
	const { cwd = process.cwd(), homeDir = os.homedir(), env = process.env, overrides } = options;

	let config = getDefaultConfig();

	for (const filePath of [path.join(homeDir, RC_FILENAME), path.join(cwd, RC_FILENAME)]) {
		const rc = tryReadRc(filePath);
		if (rc) {
			config = mergeWithConfig(config, rc);
			configLogger.debug({ filePath }, "Config file loaded");
		}
	}

	config = mergeWithConfig(config, rcFromEnv(env));
	if (overrides) {
		config = mergeWithConfig(config, overrides);
	}

	return validateConfig(config);
}

/**
 * Get default config values
 */
export function getDefaultConfig(): GroundlineConfig {
	return structuredClone(DEFAULT_CONFIG);
}
