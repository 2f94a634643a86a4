/**
 * Document Loader
 *
 * Reads plain-text and Markdown files, or directories of them, into Documents.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { basename, extname, relative, sep } from "node:path";
import { glob } from "glob";
import { AppError } from "../errors.js";
import { logger as rootLogger } from "../logger.js";
import type { Document } from "./types.js";

const logger = rootLogger.child({ module: "rag-loader" });

/**
 * Supported file extensions for loading
 */
export const SUPPORTED_EXTENSIONS = new Set([".txt", ".md", ".markdown"]);

export interface LoadOptions {
	/** Descend into subdirectories */
	recursive?: boolean;
}

/**
 * Read one file. Unsupported, unreadable or blank files give null.
 *
 * The source is the file's basename unless `source` is given.
 */
export function loadFile(filePath: string, source: string = basename(filePath)): Document | null {
	const ext = extname(filePath).toLowerCase();
	if (!SUPPORTED_EXTENSIONS.has(ext)) {
		logger.debug({ filePath, ext }, "Skipping unsupported file type");
		return null;
	}

	let content: string;
	try {
		content = readFileSync(filePath, "utf-8");
	} catch (error) {
		logger.warn({ filePath, error: String(error) }, "Failed to read file, skipping");
		return null;
	}

	if (!content.trim()) {
		logger.warn({ filePath }, "File is empty, skipping");
		return null;
	}

	return { source, content };
}

async function loadDirectory(dirPath: string, recursive: boolean): Promise<Document[]> {
	const pattern = recursive ? "**/*" : "*";
	const files = await glob(pattern, {
		cwd: dirPath,
		nodir: true,
		absolute: true,
	});

	const documents: Document[] = [];
	for (const file of files.sort()) {
		// Relative to the directory given, with / separators
		const document = loadFile(file, relative(dirPath, file).split(sep).join("/"));
		if (document) {
			documents.push(document);
		}
	}

	logger.info({ dirPath, filesLoaded: documents.length, recursive }, "Directory loaded");
	return documents;
}

/**
 * Load every supported file under `paths`, in the order given
 *
 * @throws {AppError} When a path does not exist
 */
export async function loadDocuments(paths: readonly string[], options: LoadOptions = {}): Promise<Document[]> {
	const documents: Document[] = [];

	for (const path of paths) {
		if (!existsSync(path)) {
			throw new AppError(`Path does not exist: ${path}`, "PATH_NOT_FOUND");
		}

		if (statSync(path).isDirectory()) {
			documents.push(...(await loadDirectory(path, options.recursive ?? false)));
		} else {
			const document = loadFile(path);
			if (document) {
				documents.push(document);
			}
		}
	}

	return documents;
}
