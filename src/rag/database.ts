/**
 * RAG Database Layer
 *
 * SQLite storage for index entries using:
 * - better-sqlite3 as the base driver
 * - sqlite-vec's vec_distance_cosine for brute-force similarity search
 *
 * Entries are keyed by (collection, id). Upserting an existing id rewrites the
 * row in place and keeps its `seq`, which orders `all()` and breaks distance
 * ties in `query()`. The first upsert records the collection's embedding
 * dimension and model in `rag_meta`; later writes and queries must match.
 */

import { existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import Database from "better-sqlite3";
import { load as loadSqliteVec } from "sqlite-vec";
import { z } from "zod";
import type { GroundlineConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { logger as rootLogger } from "../logger.js";
import type { ChunkId, EntryRow, IndexEntry, RAGStats, ScoredEntry } from "./types.js";

const logger = rootLogger.child({ module: "rag-database" });

export const RAG_DB_FILENAME = "rag.db";

const EmbeddingJsonSchema = z.array(z.number());

/**
 * Persistent, idempotent store of embedded chunks
 */
export interface IndexStore {
	upsert(entries: IndexEntry[]): void;
	query(vector: number[], k: number): ScoredEntry[];
	count(): number;
	get(id: ChunkId): IndexEntry | null;
	all(): IndexEntry[];
	stats(): RAGStats;
	clear(): void;
	close(): void;
}

export interface SqliteIndexStoreOptions {
	/** Database file, or ":memory:" */
	path: string;
	collection: string;
	/** Embedding model the vectors come from */
	model: string;
}

interface MetaRow {
	key: string;
	value: string;
}

function rowToEntry(row: EntryRow): IndexEntry {
	return {
		id: row.id,
		embedding: EmbeddingJsonSchema.parse(JSON.parse(row.embedding)),
		text: row.text,
		metadata: { source: row.source, sequence: row.sequence },
	};
}

export class SqliteIndexStore implements IndexStore {
	private db: Database.Database;
	private collection: string;
	private model: string;

	constructor(options: SqliteIndexStoreOptions) {
		if (options.path !== ":memory:") {
			const dir = dirname(options.path);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}
		}

		this.collection = options.collection;
		this.model = options.model;
		this.db = new Database(options.path);

		// WAL lets readers in other processes see the last committed snapshot
		this.db.pragma("journal_mode = WAL");
		this.db.pragma("busy_timeout = 5000");
		this.db.pragma("synchronous = NORMAL");

		loadSqliteVec(this.db);
		this.initializeSchema();

		logger.debug({ path: options.path, collection: this.collection }, "Index store opened");
	}

	private initializeSchema(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS rag_entries (
				seq INTEGER PRIMARY KEY AUTOINCREMENT,
				collection TEXT NOT NULL,
				id TEXT NOT NULL,
				source TEXT NOT NULL,
				sequence INTEGER NOT NULL,
				text TEXT NOT NULL,
				embedding TEXT NOT NULL,
				created_at TEXT DEFAULT CURRENT_TIMESTAMP,
				updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
				UNIQUE (collection, id)
			);

			CREATE INDEX IF NOT EXISTS idx_rag_entries_source ON rag_entries(collection, source);

			CREATE TABLE IF NOT EXISTS rag_meta (
				collection TEXT NOT NULL,
				key TEXT NOT NULL,
				value TEXT NOT NULL,
				PRIMARY KEY (collection, key)
			);
		`);
	}

	// =========================================================================
	// Meta
	// =========================================================================

	private readMeta(): { dimensions: number | null; model: string | null } {
		const rows = this.db
			.prepare<[string], MetaRow>("SELECT key, value FROM rag_meta WHERE collection = ?")
			.all(this.collection);
		const meta = new Map(rows.map((row) => [row.key, row.value]));
		const dimensions = meta.get("dimensions");
		return {
			dimensions: dimensions === undefined ? null : Number.parseInt(dimensions, 10),
			model: meta.get("model") ?? null,
		};
	}

	private writeMeta(dimensions: number): void {
		const stmt = this.db.prepare<[string, string, string]>(
			"INSERT INTO rag_meta (collection, key, value) VALUES (?, ?, ?) ON CONFLICT(collection, key) DO UPDATE SET value = excluded.value",
		);
		stmt.run(this.collection, "dimensions", String(dimensions));
		stmt.run(this.collection, "model", this.model);
	}

	private assertModel(recorded: string | null): void {
		if (recorded !== null && recorded !== this.model) {
			throw new ConfigurationError(
				`Collection "${this.collection}" was built with embedding model "${recorded}", but "${this.model}" is configured. Clear the collection or switch models.`,
				"embedding.model",
			);
		}
	}

	private assertDimensions(expected: number | null, actual: number, what: string): void {
		if (expected !== null && expected !== actual) {
			throw new ConfigurationError(
				`${what} has ${actual} dimensions but collection "${this.collection}" stores ${expected}`,
				"embedding.model",
			);
		}
	}

	// =========================================================================
	// Writes
	// =========================================================================

	/**
	 * Insert or replace entries by id. Validates the whole call before writing,
	 * so a rejected call writes nothing.
	 *
	 * @throws {ConfigurationError} On a dimension or model mismatch
	 */
	upsert(entries: IndexEntry[]): void {
		if (entries.length === 0) {
			return;
		}

		const meta = this.readMeta();
		this.assertModel(meta.model);

		const dimensions = meta.dimensions ?? entries[0].embedding.length;
		for (const entry of entries) {
			this.assertDimensions(dimensions, entry.embedding.length, `Entry ${entry.id}`);
			if (!entry.embedding.every(Number.isFinite)) {
				throw new ConfigurationError(`Entry ${entry.id} has a non-finite embedding value`, "embedding.model");
			}
		}

		const stmt = this.db.prepare<[string, string, string, number, string, string]>(`
			INSERT INTO rag_entries (collection, id, source, sequence, text, embedding)
			VALUES (?, ?, ?, ?, ?, ?)
			ON CONFLICT(collection, id) DO UPDATE SET
				source = excluded.source,
				sequence = excluded.sequence,
				text = excluded.text,
				embedding = excluded.embedding,
				updated_at = CURRENT_TIMESTAMP
		`);

		const write = this.db.transaction((batch: IndexEntry[]) => {
			if (meta.dimensions === null) {
				this.writeMeta(dimensions);
			}
			for (const entry of batch) {
				stmt.run(
					this.collection,
					entry.id,
					entry.metadata.source,
					entry.metadata.sequence,
					entry.text,
					JSON.stringify(entry.embedding),
				);
			}
		});

		write(entries);
		logger.debug({ collection: this.collection, entries: entries.length }, "Entries upserted");
	}

	/**
	 * Drop every entry and forget the recorded dimension and model
	 */
	clear(): void {
		const wipe = this.db.transaction(() => {
			this.db.prepare<[string]>("DELETE FROM rag_entries WHERE collection = ?").run(this.collection);
			this.db.prepare<[string]>("DELETE FROM rag_meta WHERE collection = ?").run(this.collection);
		});
		wipe();
		logger.info({ collection: this.collection }, "Collection cleared");
	}

	// =========================================================================
	// Reads
	// =========================================================================

	/**
	 * Up to `k` nearest entries by cosine distance, ascending; ties in insertion order
	 *
	 * @throws {ConfigurationError} When the vector does not match the collection
	 */
	query(vector: number[], k: number): ScoredEntry[] {
		if (k <= 0) {
			return [];
		}

		const meta = this.readMeta();
		if (meta.dimensions === null) {
			return [];
		}
		this.assertModel(meta.model);
		this.assertDimensions(meta.dimensions, vector.length, "Query vector");

		const rows = this.db
			.prepare<[string, string, number], EntryRow & { distance: number }>(`
				SELECT *, vec_distance_cosine(embedding, ?) AS distance
				FROM rag_entries
				WHERE collection = ?
				ORDER BY distance, seq
				LIMIT ?
			`)
			.all(JSON.stringify(vector), this.collection, Math.floor(k));

		return rows.map((row) => ({ ...rowToEntry(row), distance: row.distance }));
	}

	count(): number {
		const row = this.db
			.prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM rag_entries WHERE collection = ?")
			.get(this.collection);
		return row?.count ?? 0;
	}

	get(id: ChunkId): IndexEntry | null {
		const row = this.db
			.prepare<[string, string], EntryRow>("SELECT * FROM rag_entries WHERE collection = ? AND id = ?")
			.get(this.collection, id);
		return row ? rowToEntry(row) : null;
	}

	/**
	 * Every entry in insertion order
	 */
	all(): IndexEntry[] {
		return this.db
			.prepare<[string], EntryRow>("SELECT * FROM rag_entries WHERE collection = ? ORDER BY seq")
			.all(this.collection)
			.map(rowToEntry);
	}

	stats(): RAGStats {
		const meta = this.readMeta();
		const sources = this.db
			.prepare<[string], { source: string; chunk_count: number }>(`
				SELECT source, COUNT(*) AS chunk_count
				FROM rag_entries
				WHERE collection = ?
				GROUP BY source
				ORDER BY MIN(seq)
			`)
			.all(this.collection);

		return {
			collection: this.collection,
			entryCount: this.count(),
			embeddingDimensions: meta.dimensions,
			embeddingModel: meta.model,
			sources: sources.map((s) => ({ source: s.source, chunkCount: s.chunk_count })),
		};
	}

	close(): void {
		if (this.db.open) {
			this.db.close();
			logger.debug({ collection: this.collection }, "Index store closed");
		}
	}
}

/**
 * Open the store for the configured state directory and collection
 */
export function openIndexStore(config: Pick<GroundlineConfig, "stateDir" | "collection" | "embedding">): SqliteIndexStore {
	return new SqliteIndexStore({
		path: join(config.stateDir, RAG_DB_FILENAME),
		collection: config.collection,
		model: config.embedding.model,
	});
}
