/**
 * Retriever Module
 *
 * Embeds a query and returns the nearest stored chunks.
 */

import { ConfigurationError } from "../errors.js";
import { logger as rootLogger } from "../logger.js";
import type { IndexStore } from "./database.js";
import type { Embedder } from "./embedder.js";
import type { RetrievedChunk } from "./types.js";

const logger = rootLogger.child({ module: "rag-retriever" });

export class Retriever {
	constructor(
		private embedder: Pick<Embedder, "embed">,
		private store: IndexStore,
	) {}

	/**
	 * Up to `k` chunks closest to `query`, nearest first
	 *
	 * An empty collection or a blank query returns [] without an embedding
	 * call. Embedding failures are logged and also return [].
	 *
	 * @throws {ConfigurationError} When the query vector does not match the collection
	 */
	async retrieve(query: string, k: number): Promise<RetrievedChunk[]> {
		if (!query.trim() || k <= 0 || this.store.count() === 0) {
			return [];
		}

		let vector: number[];
		try {
			[vector] = await this.embedder.embed([query]);
		} catch (error) {
			if (error instanceof ConfigurationError) {
				throw error;
			}
			logger.error({ error: String(error), k }, "Query embedding failed");
			return [];
		}

		const results = this.store.query(vector, k).map((entry) => ({
			id: entry.id,
			source: entry.metadata.source,
			sequence: entry.metadata.sequence,
			content: entry.text,
			distance: entry.distance,
		}));

		logger.debug({ k, returned: results.length }, "Retrieved chunks");
		return results;
	}
}
