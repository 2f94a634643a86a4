/**
 * Tests for RAG database layer
 *
 * Tests the SQLite index store:
 * - Idempotent upsert keyed by id
 * - Insertion order and batch-order independence
 * - Cosine similarity query with insertion-order ties
 * - Dimension and model enforcement
 * - Statistics and clearing
 */

import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors.js";
import { openIndexStore, RAG_DB_FILENAME, SqliteIndexStore } from "../rag/database.js";
import type { IndexEntry } from "../rag/types.js";
import { createTempDir, createTestConfig, removeTempDir } from "./helpers.js";

function entry(id: string, embedding: number[], source = "pets.txt", sequence = 0, text = `text of ${id}`): IndexEntry {
	return { id, embedding, text, metadata: { source, sequence } };
}

const CAT = entry("chunk_cat", [1, 0, 0, 0.1], "cats.txt", 0, "This is about cats.");
const DOG = entry("chunk_dog", [0, 1, 0, 0.1], "dogs.txt", 0, "This is about dogs.");
const BIRD = entry("chunk_bird", [0, 0, 1, 0.1], "birds.txt", 0, "This is about birds.");

describe("rag/database.ts", () => {
	let tempDir: string;
	let dbPath: string;
	let store: SqliteIndexStore;

	beforeEach(() => {
		tempDir = createTempDir("rag-db-test-");
		dbPath = join(tempDir, RAG_DB_FILENAME);
		store = new SqliteIndexStore({ path: dbPath, collection: "documents", model: "test-embedding" });
	});

	afterEach(() => {
		store.close();
		removeTempDir(tempDir);
	});

	// ==========================================================================
	// Upsert
	// ==========================================================================

	describe("upsert", () => {
		it("stores entries retrievable by id", () => {
			store.upsert([CAT, DOG]);

			expect(store.count()).toBe(2);
			expect(store.get("chunk_dog")).toEqual(DOG);
			expect(store.get("chunk_missing")).toBeNull();
		});

		it("ignores an empty call", () => {
			store.upsert([]);
			expect(store.count()).toBe(0);
			expect(store.stats().embeddingDimensions).toBeNull();
		});

		it("replaces an existing id in place", () => {
			store.upsert([CAT, DOG]);
			store.upsert([{ ...CAT, text: "Cats, revised." }]);

			expect(store.count()).toBe(2);
			expect(store.all().map((e) => [e.id, e.text])).toEqual([
				["chunk_cat", "Cats, revised."],
				["chunk_dog", "This is about dogs."],
			]);
		});

		it("gives the same collection for one batch or many single batches", () => {
			const other = new SqliteIndexStore({
				path: join(tempDir, "other.db"),
				collection: "documents",
				model: "test-embedding",
			});
			try {
				store.upsert([CAT, DOG, BIRD]);
				other.upsert([CAT]);
				other.upsert([DOG]);
				other.upsert([BIRD]);

				expect(other.all()).toEqual(store.all());
			} finally {
				other.close();
			}
		});

		it("rejects a vector of a different dimension and writes nothing", () => {
			store.upsert([CAT]);

			expect(() => store.upsert([DOG, entry("chunk_wide", [1, 2, 3])])).toThrow(ConfigurationError);
			expect(store.count()).toBe(1);
			expect(store.get("chunk_dog")).toBeNull();
		});

		it("rejects mixed dimensions within the first call", () => {
			expect(() => store.upsert([CAT, entry("chunk_short", [1, 2])])).toThrow(ConfigurationError);
			expect(store.count()).toBe(0);
			expect(store.stats().embeddingDimensions).toBeNull();
		});

		it("rejects writes from a different embedding model", () => {
			store.upsert([CAT]);
			const other = new SqliteIndexStore({ path: dbPath, collection: "documents", model: "another-model" });
			try {
				expect(() => other.upsert([DOG])).toThrow(ConfigurationError);
			} finally {
				other.close();
			}
		});
	});

	// ==========================================================================
	// Query
	// ==========================================================================

	describe("query", () => {
		beforeEach(() => {
			store.upsert([CAT, DOG, BIRD]);
		});

		it("returns the nearest entry first", () => {
			const results = store.query([0, 1, 0, 0.1], 1);

			expect(results).toHaveLength(1);
			expect(results[0].id).toBe("chunk_dog");
			expect(results[0].text).toBe("This is about dogs.");
			expect(results[0].distance).toBeCloseTo(0, 5);
		});

		it("orders results by ascending distance", () => {
			const results = store.query([0.2, 1, 0, 0.1], 3);

			expect(results.map((r) => r.id)).toEqual(["chunk_dog", "chunk_cat", "chunk_bird"]);
			expect(results[0].distance).toBeLessThan(results[1].distance);
			expect(results[1].distance).toBeLessThan(results[2].distance);
		});

		it("breaks ties by insertion order", () => {
			const twinA = entry("chunk_twin_a", [0, 0, 0, 1]);
			const twinB = entry("chunk_twin_b", [0, 0, 0, 1]);
			store.upsert([twinA, twinB]);
			store.upsert([twinA]);

			const results = store.query([0, 0, 0, 1], 2);

			expect(results.map((r) => r.id)).toEqual(["chunk_twin_a", "chunk_twin_b"]);
		});

		it("returns the same list for the same query", () => {
			const first = store.query([0.5, 0.5, 0, 0.1], 3);
			const second = store.query([0.5, 0.5, 0, 0.1], 3);
			expect(second).toEqual(first);
		});

		it("returns at most the collection size", () => {
			expect(store.query([1, 0, 0, 0.1], 10)).toHaveLength(3);
		});

		it("returns [] for k <= 0", () => {
			expect(store.query([1, 0, 0, 0.1], 0)).toEqual([]);
			expect(store.query([1, 0, 0, 0.1], -2)).toEqual([]);
		});

		it("rejects a query vector of the wrong dimension", () => {
			expect(() => store.query([1, 0], 1)).toThrow(ConfigurationError);
		});
	});

	it("returns [] when querying an empty collection", () => {
		expect(store.query([1, 0, 0, 0.1], 3)).toEqual([]);
	});

	// ==========================================================================
	// Stats, clear, persistence
	// ==========================================================================

	describe("stats", () => {
		it("reports count, dimension, model and per-source counts in insertion order", () => {
			store.upsert([DOG, entry("chunk_dog_2", [0, 2, 0, 0.1], "dogs.txt", 1), CAT]);

			expect(store.stats()).toEqual({
				collection: "documents",
				entryCount: 3,
				embeddingDimensions: 4,
				embeddingModel: "test-embedding",
				sources: [
					{ source: "dogs.txt", chunkCount: 2 },
					{ source: "cats.txt", chunkCount: 1 },
				],
			});
		});

		it("reports nulls for an empty collection", () => {
			expect(store.stats()).toEqual({
				collection: "documents",
				entryCount: 0,
				embeddingDimensions: null,
				embeddingModel: null,
				sources: [],
			});
		});
	});

	describe("clear", () => {
		it("drops entries and forgets the recorded dimension", () => {
			store.upsert([CAT, DOG]);
			store.clear();

			expect(store.count()).toBe(0);
			expect(store.stats().embeddingDimensions).toBeNull();

			store.upsert([entry("chunk_new", [1, 2])]);
			expect(store.stats().embeddingDimensions).toBe(2);
		});
	});

	it("keeps collections in one file separate", () => {
		const other = new SqliteIndexStore({ path: dbPath, collection: "notes", model: "test-embedding" });
		try {
			store.upsert([CAT, DOG]);
			other.upsert([entry("chunk_note", [1, 2])]);

			expect(store.count()).toBe(2);
			expect(other.count()).toBe(1);
			expect(other.stats().embeddingDimensions).toBe(2);
		} finally {
			other.close();
		}
	});

	it("persists entries across reopen", () => {
		store.upsert([CAT, DOG]);
		store.close();

		store = openIndexStore(createTestConfig(tempDir));
		expect(store.all()).toEqual([CAT, DOG]);
	});
});
