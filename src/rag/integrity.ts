/**
 * Integrity Report
 *
 * Summarises a collection's entries: source attribution, chunk length
 * distribution and a sample per source.
 */

import type { ChunkId, IndexEntry } from "./types.js";

const PREVIEW_CHARS = 200;

export interface IntegrityBounds {
	/** Shortest acceptable chunk, in characters */
	minChars: number;
	/** Longest acceptable chunk, in characters */
	maxChars: number;
}

export interface SourceSample {
	source: string;
	chunkCount: number;
	firstChunkId: ChunkId;
	preview: string;
}

export interface IntegrityReport {
	entryCount: number;
	sources: SourceSample[];
	/** Entries whose source is empty */
	missingSource: number;
	minChars: number;
	maxChars: number;
	averageChars: number;
	oversized: number;
	undersized: number;
	healthy: boolean;
}

function preview(text: string): string {
	return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

/**
 * Build an integrity report over `entries`, taken in insertion order
 */
export function verifyIntegrity(entries: readonly IndexEntry[], bounds: IntegrityBounds): IntegrityReport {
	const bySource = new Map<string, SourceSample>();
	let missingSource = 0;
	let total = 0;
	let minChars = Number.POSITIVE_INFINITY;
	let maxChars = 0;
	let oversized = 0;
	let undersized = 0;

	for (const entry of entries) {
		const length = entry.text.length;
		total += length;
		minChars = Math.min(minChars, length);
		maxChars = Math.max(maxChars, length);
		if (length > bounds.maxChars) oversized++;
		if (length < bounds.minChars) undersized++;

		const source = entry.metadata.source;
		if (!source) {
			missingSource++;
			continue;
		}
		const sample = bySource.get(source);
		if (sample) {
			sample.chunkCount++;
		} else {
			bySource.set(source, { source, chunkCount: 1, firstChunkId: entry.id, preview: preview(entry.text) });
		}
	}

	return {
		entryCount: entries.length,
		sources: [...bySource.values()].sort((a, b) => a.source.localeCompare(b.source)),
		missingSource,
		minChars: entries.length > 0 ? minChars : 0,
		maxChars,
		averageChars: entries.length > 0 ? Math.round(total / entries.length) : 0,
		oversized,
		undersized,
		healthy: missingSource === 0 && oversized === 0 && undersized === 0,
	};
}
