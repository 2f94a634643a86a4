/**
 * Chunker Module
 *
 * Splits documents into bounded, overlap-linked chunks suitable for embedding.
 *
 * Strategy:
 * 1. Split by paragraphs (blank lines)
 * 2. Re-split oversized pieces by line, then sentence, then whitespace, then raw characters
 * 3. Merge adjacent pieces greedily while they fit
 * 4. Prepend the trailing `overlap` characters of the previous chunk's content
 */

import { createHash } from "node:crypto";
import type { ChunkingConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { Chunk, ChunkId, Document } from "./types.js";

/**
 * Chunker interface for splitting documents into chunks
 */
export interface Chunker {
	chunk(document: Document): Chunk[];
}

/**
 * Separators from coarsest to finest. Each match stays attached to the end of
 * the piece before it, so joining the pieces gives back the original text.
 */
const SEPARATORS: readonly RegExp[] = [/\n\s*\n/g, /\n/g, /(?<=[.!?])\s+/g, /\s+/g];

/**
 * Content-addressed chunk id. Depends only on (source, sequence, content).
 */
export function computeChunkId(chunk: Chunk): ChunkId {
	const digest = createHash("sha256")
		.update(`${chunk.source}\u0000${chunk.sequence}\u0000${chunk.content}`)
		.digest("hex");
	return `chunk_${digest.substring(0, 32)}`;
}

function splitKeepingSeparator(text: string, separator: RegExp): string[] {
	const pieces: string[] = [];
	let last = 0;
	for (const match of text.matchAll(separator)) {
		const end = (match.index ?? 0) + match[0].length;
		if (end > last) {
			pieces.push(text.slice(last, end));
			last = end;
		}
	}
	if (last < text.length) {
		pieces.push(text.slice(last));
	}
	return pieces;
}

function hardSplit(text: string, limit: number): string[] {
	const pieces: string[] = [];
	for (let i = 0; i < text.length; i += limit) {
		pieces.push(text.slice(i, i + limit));
	}
	return pieces;
}

/**
 * Split `text` into pieces no longer than `limit`, preferring the coarsest
 * separator that works
 */
function splitRecursive(text: string, limit: number, level: number): string[] {
	if (text.length <= limit) {
		return [text];
	}
	if (level >= SEPARATORS.length) {
		return hardSplit(text, limit);
	}

	const pieces = splitKeepingSeparator(text, SEPARATORS[level]);
	if (pieces.length <= 1) {
		return splitRecursive(text, limit, level + 1);
	}

	const result: string[] = [];
	let buffer = "";

	for (const piece of pieces) {
		if (piece.length > limit) {
			if (buffer) {
				result.push(buffer);
				buffer = "";
			}
			result.push(...splitRecursive(piece, limit, level + 1));
			continue;
		}

		if (buffer.length + piece.length > limit) {
			result.push(buffer);
			buffer = piece;
		} else {
			buffer += piece;
		}
	}

	if (buffer) {
		result.push(buffer);
	}

	return result;
}

/**
 * The whitespace a piece ends with, as a single character
 */
function trailingSeparator(piece: string): string {
	const trailing = /\s+$/.exec(piece)?.[0] ?? "";
	if (!trailing) return "";
	return trailing.includes("\n") ? "\n" : " ";
}

/**
 * Recursive character chunker
 */
export class RecursiveCharacterChunker implements Chunker {
	private size: number;
	private overlap: number;

	constructor(options: ChunkingConfig) {
		if (!Number.isInteger(options.size) || options.size <= 0) {
			throw new ConfigurationError(`chunk size must be a positive integer, got ${options.size}`, "chunking.size");
		}
		if (!Number.isInteger(options.overlap) || options.overlap < 0) {
			throw new ConfigurationError(
				`chunk overlap must be a non-negative integer, got ${options.overlap}`,
				"chunking.overlap",
			);
		}
		if (options.overlap >= options.size) {
			throw new ConfigurationError(
				`chunk overlap (${options.overlap}) must be smaller than chunk size (${options.size})`,
				"chunking.overlap",
			);
		}
		this.size = options.size;
		this.overlap = options.overlap;
	}

	chunk(document: Document): Chunk[] {
		const text = document.content.trim();
		if (!text) {
			return [];
		}

		if (text.length <= this.size) {
			return [{ source: document.source, content: text, sequence: 0 }];
		}

		// Room for one separator between the carried-over tail and the body
		const joint = this.overlap > 0 && this.size - this.overlap > 1 ? 1 : 0;
		const bodies = splitRecursive(text, this.size - this.overlap - joint, 0).filter(
			(piece) => piece.trim().length > 0,
		);

		const chunks: Chunk[] = [];
		let previousContent = "";
		let previousBody = "";

		for (const body of bodies) {
			let content = body.trim();
			if (this.overlap > 0 && previousContent) {
				const separator = joint > 0 && !/^\s/.test(body) ? trailingSeparator(previousBody) : "";
				content = (previousContent.slice(-this.overlap) + separator + body).trim();
			}
			chunks.push({ source: document.source, content, sequence: chunks.length });
			previousContent = content;
			previousBody = body;
		}

		return chunks;
	}
}

/**
 * Chunk every document, in input order
 *
 * @throws {ConfigurationError} When size/overlap are out of range
 */
export function chunkDocuments(documents: readonly Document[], size: number, overlap: number): Chunk[] {
	const chunker = new RecursiveCharacterChunker({ size, overlap });
	return documents.flatMap((document) => chunker.chunk(document));
}

/**
 * Create a chunker from the chunking section of the config
 */
export function createChunker(options: ChunkingConfig): Chunker {
	return new RecursiveCharacterChunker(options);
}
