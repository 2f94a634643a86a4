/**
 * Tests for RAG document loader
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppError } from "../errors.js";
import { loadDocuments, loadFile } from "../rag/loader.js";
import { createTempDir, removeTempDir } from "./helpers.js";

describe("rag/loader.ts", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = createTempDir("rag-loader-test-");
		writeFileSync(join(tempDir, "a.txt"), "Alpha text.");
		writeFileSync(join(tempDir, "b.md"), "# Beta\n\nMarkdown body.");
		writeFileSync(join(tempDir, "c.json"), '{"skip": true}');
		writeFileSync(join(tempDir, "empty.txt"), "  \n");
		mkdirSync(join(tempDir, "sub"));
		writeFileSync(join(tempDir, "sub", "d.txt"), "Nested text.");
	});

	afterEach(() => {
		removeTempDir(tempDir);
	});

	describe("loadFile", () => {
		it("reads a supported file with its basename as source", () => {
			expect(loadFile(join(tempDir, "a.txt"))).toEqual({ source: "a.txt", content: "Alpha text." });
		});

		it("skips unsupported extensions", () => {
			expect(loadFile(join(tempDir, "c.json"))).toBeNull();
		});

		it("skips blank files", () => {
			expect(loadFile(join(tempDir, "empty.txt"))).toBeNull();
		});

		it("skips files that cannot be read", () => {
			expect(loadFile(join(tempDir, "missing.txt"))).toBeNull();
		});
	});

	describe("loadDocuments", () => {
		it("loads supported files from a directory in name order", async () => {
			const documents = await loadDocuments([tempDir]);
			expect(documents.map((d) => d.source)).toEqual(["a.txt", "b.md"]);
		});

		it("descends into subdirectories when recursive", async () => {
			const documents = await loadDocuments([tempDir], { recursive: true });
			expect(documents.map((d) => d.source)).toEqual(["a.txt", "b.md", "sub/d.txt"]);
		});

		it("gives same-named files in different subdirectories distinct sources", async () => {
			mkdirSync(join(tempDir, "other"));
			writeFileSync(join(tempDir, "other", "d.txt"), "Other nested text.");

			const documents = await loadDocuments([tempDir], { recursive: true });

			expect(documents.filter((d) => d.source.endsWith("d.txt"))).toEqual([
				{ source: "other/d.txt", content: "Other nested text." },
				{ source: "sub/d.txt", content: "Nested text." },
			]);
		});

		it("names sources relative to the directory given", async () => {
			const documents = await loadDocuments([join(tempDir, "sub")]);
			expect(documents).toEqual([{ source: "d.txt", content: "Nested text." }]);
		});

		it("keeps the order of the given paths", async () => {
			const documents = await loadDocuments([join(tempDir, "sub", "d.txt"), join(tempDir, "a.txt")]);
			expect(documents).toEqual([
				{ source: "d.txt", content: "Nested text." },
				{ source: "a.txt", content: "Alpha text." },
			]);
		});

		it("throws for a path that does not exist", async () => {
			const missing = join(tempDir, "nope");

			await expect(loadDocuments([missing])).rejects.toThrow(`Path does not exist: ${missing}`);
			await expect(loadDocuments([missing])).rejects.toBeInstanceOf(AppError);
		});
	});
});
