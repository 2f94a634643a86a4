/**
 * RAG Commands
 *
 * | Command         | Purpose                                         |
 * |-----------------|-------------------------------------------------|
 * | ingest <paths>  | Load, chunk, embed and store documents          |
 * | ask <question>  | Answer a question from the indexed documents    |
 * | chat            | Interactive question loop                       |
 * | stats           | Show collection statistics                      |
 * | verify          | Check chunk attribution and size distribution   |
 * | clear           | Delete every entry in the collection            |
 */

import { createInterface } from "node:readline";
import { type GroundlineRc, loadConfig } from "../config.js";
import { answer, header, info, keyValue, list, section, success, warning } from "../output.js";
import { createRAGEngine, type EngineServices, loadDocuments, type RAGEngine } from "../rag/index.js";
import type { CommandModule } from "./types.js";
import { parseNonNegativeInt, parsePositiveInt, reportFailure } from "./utils.js";

const EXIT_WORDS = new Set(["quit", "exit", "q"]);

// =============================================================================
// Option Types
// =============================================================================

interface IngestOptions {
	chunkSize?: number;
	overlap?: number;
	recursive?: boolean;
}

interface AskOptions {
	topK?: number;
}

// =============================================================================
// Engine lifecycle
// =============================================================================

/**
 * Services used in place of the defaults, for embedding the CLI in tests
 */
let serviceOverrides: EngineServices = {};

export function setEngineServices(services: EngineServices): void {
	serviceOverrides = services;
}

async function withEngine(overrides: GroundlineRc, run: (engine: RAGEngine) => Promise<void> | void): Promise<void> {
	const engine = createRAGEngine(loadConfig({ overrides }), serviceOverrides);
	try {
		await run(engine);
	} finally {
		engine.close();
	}
}

// =============================================================================
// Handlers
// =============================================================================

export async function handleIngest(paths: string[], options: IngestOptions): Promise<void> {
	try {
		const documents = await loadDocuments(paths, { recursive: options.recursive ?? false });
		if (documents.length === 0) {
			warning("No readable .txt or .md documents found");
			return;
		}

		info(`Ingesting ${documents.length} document(s)...`);

		await withEngine({ chunking: { size: options.chunkSize, overlap: options.overlap } }, async (engine) => {
			const report = await engine.ingest(documents);

			if (report.failed.length === 0) {
				success(`Ingested ${report.ingested} chunk(s) from ${report.documents} document(s)`, {
					ingested: report.ingested,
					chunks: report.chunks,
					documents: report.documents,
				});
				return;
			}

			warning(`Ingested ${report.ingested} of ${report.chunks} chunk(s); ${report.failed.length} batch(es) failed`, {
				ingested: report.ingested,
				chunks: report.chunks,
				failed: report.failed.length,
			});
			list(
				report.failed.map(
					(batch) =>
						`batch ${batch.index} (chunks ${batch.start}-${batch.start + batch.size - 1}, ${batch.sources.join(", ")}): ${batch.reason}, ${batch.message}`,
				),
			);
			process.exitCode = 1;
		});
	} catch (err) {
		reportFailure("Ingestion failed", err);
	}
}

export async function handleAsk(question: string, options: AskOptions): Promise<void> {
	try {
		await withEngine({ retrieval: { topK: options.topK } }, async (engine) => {
			answer(await engine.ask(question), { question });
		});
	} catch (err) {
		reportFailure("Question failed", err);
	}
}

export async function handleChat(options: AskOptions): Promise<void> {
	try {
		await withEngine({ retrieval: { topK: options.topK } }, async (engine) => {
			header("groundline chat", `${engine.count()} chunk(s) indexed; type "quit" to leave`);

			const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
			rl.setPrompt("> ");
			rl.prompt();

			for await (const line of rl) {
				const question = line.trim();
				if (EXIT_WORDS.has(question.toLowerCase())) {
					break;
				}
				if (question) {
					answer(await engine.ask(question), { question });
				}
				rl.prompt();
			}

			rl.close();
		});
	} catch (err) {
		reportFailure("Chat failed", err);
	}
}

export async function handleStats(): Promise<void> {
	try {
		await withEngine({}, (engine) => {
			const stats = engine.stats();

			header("Collection Statistics");
			keyValue("Collection", stats.collection);
			keyValue("Chunks", stats.entryCount);
			keyValue("Embedding Model", stats.embeddingModel ?? "none");
			keyValue("Embedding Dimensions", stats.embeddingDimensions ?? "none");

			if (stats.sources.length > 0) {
				section("Sources");
				list(stats.sources.map((s) => `${s.source}: ${s.chunkCount} chunks`));
			}
		});
	} catch (err) {
		reportFailure("Failed to get stats", err);
	}
}

export async function handleVerify(): Promise<void> {
	try {
		await withEngine({}, (engine) => {
			const report = engine.verify();

			header("Integrity Report");
			keyValue("Chunks", report.entryCount);
			keyValue("Average length", report.averageChars);
			keyValue("Shortest", report.minChars);
			keyValue("Longest", report.maxChars);

			if (report.sources.length > 0) {
				section("Sources");
				for (const sample of report.sources) {
					keyValue(sample.source, `${sample.chunkCount} chunks, first ${sample.firstChunkId}`);
					info(sample.preview);
				}
			}

			if (report.missingSource > 0) {
				warning(`${report.missingSource} chunk(s) have no source`);
			}
			if (report.oversized > 0) {
				warning(`${report.oversized} chunk(s) exceed the configured chunk size`);
			}
			if (report.undersized > 0) {
				warning(`${report.undersized} chunk(s) are empty`);
			}

			if (report.healthy) {
				success("Collection is healthy");
			} else {
				process.exitCode = 1;
			}
		});
	} catch (err) {
		reportFailure("Verification failed", err);
	}
}

export async function handleClear(): Promise<void> {
	try {
		await withEngine({}, (engine) => {
			const removed = engine.count();
			engine.clear();
			success(`Removed ${removed} chunk(s)`);
		});
	} catch (err) {
		reportFailure("Failed to clear collection", err);
	}
}

// =============================================================================
// Command Module
// =============================================================================

export const ragCommands: CommandModule = {
	register(program) {
		program
			.command("ingest <paths...>")
			.description("Load, chunk, embed and store .txt/.md documents")
			.option("-c, --chunk-size <n>", "Maximum characters per chunk", parsePositiveInt)
			.option("-o, --overlap <n>", "Characters shared between consecutive chunks", parseNonNegativeInt)
			.option("-r, --recursive", "Descend into subdirectories")
			.action((paths: string[], options: IngestOptions) => handleIngest(paths, options));

		program
			.command("ask <question>")
			.description("Answer a question from the indexed documents")
			.option("-k, --top-k <n>", "Chunks to retrieve", parsePositiveInt)
			.action((question: string, options: AskOptions) => handleAsk(question, options));

		program
			.command("chat")
			.description("Ask questions interactively")
			.option("-k, --top-k <n>", "Chunks to retrieve", parsePositiveInt)
			.action((options: AskOptions) => handleChat(options));

		program
			.command("stats")
			.description("Show collection statistics")
			.action(() => handleStats());

		program
			.command("verify")
			.description("Check chunk attribution and size distribution")
			.action(() => handleVerify());

		program
			.command("clear")
			.description("Delete every entry in the collection")
			.action(() => handleClear());
	},
};
