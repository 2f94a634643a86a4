/**
 * Prompt Builder
 *
 * Pure, deterministic assembly of the grounded-answer prompt. Same inputs give
 * byte-identical output.
 */

import type { Chunk } from "./types.js";

/**
 * Exact reply the model is told to give when the context does not answer the question
 */
export const INSUFFICIENT_CONTEXT_REPLY = "I don't know based on the provided documents.";

/**
 * Returned by ask() when retrieval finds nothing; the model is not called
 */
export const INSUFFICIENT_INFORMATION = "I don't have enough information in the indexed documents to answer that.";

/**
 * Returned when generation fails after retries
 */
export const GENERATION_FALLBACK = "Sorry, I couldn't generate an answer right now. Please try again later.";

export const GENERATOR_SYSTEM_PROMPT =
	"You are a careful assistant that answers questions using only the documents provided in the user's message. " +
	"You never use outside knowledge and never invent facts, names or numbers.";

const CHUNK_SEPARATOR = "\n\n---\n\n";

/**
 * Format chunks as numbered, source-labelled context blocks
 */
export function formatContext(chunks: readonly Chunk[]): string {
	return chunks.map((chunk, i) => `[${i + 1}] source: ${chunk.source}\n${chunk.content}`).join(CHUNK_SEPARATOR);
}

/**
 * Build the user prompt for a query and its retrieved chunks
 */
export function buildPrompt(query: string, chunks: readonly Chunk[]): string {
	return [
		"Answer the question using ONLY the context below.",
		`If the context does not contain the answer, reply exactly: "${INSUFFICIENT_CONTEXT_REPLY}"`,
		"",
		"---CONTEXT---",
		formatContext(chunks),
		"---END CONTEXT---",
		"",
		`QUESTION: ${query}`,
		"",
		"ANSWER:",
	].join("\n");
}
