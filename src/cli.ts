#!/usr/bin/env node

/**
 * groundline CLI
 *
 * Grounded question answering over your own text files.
 *
 * Commands:
 *   ingest <paths...>  Load, chunk, embed and store documents
 *   ask <question>     Answer a question from the indexed documents
 *   chat               Interactive question loop
 *   stats              Show collection statistics
 *   verify             Check chunk attribution and size distribution
 *   clear              Delete every entry in the collection
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { ragCommands } from "./commands/rag.js";
import type { CommandModule } from "./commands/types.js";
import { cliLogger } from "./logger.js";
import { configureOutput } from "./output.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Get version from package.json
function getVersion(): string {
	try {
		const pkgPath = join(__dirname, "..", "package.json");
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch (error) {
		cliLogger.debug({ error: String(error) }, "Could not read package version");
	}
	return "0.1.0";
}

const commandModules: CommandModule[] = [ragCommands];

const program = new Command();

program
	.name("groundline")
	.description("Answer questions from your own documents, and only from them")
	.version(getVersion())
	.option("--human", "Human-readable output even when piped")
	.option("-v, --verbose", "Include event data in human output")
	.hook("preAction", (command) => {
		const opts = command.opts<{ human?: boolean; verbose?: boolean }>();
		configureOutput({
			...(opts.human ? { mode: "human" as const } : {}),
			verbose: opts.verbose ?? false,
		});
	});

for (const module of commandModules) {
	module.register(program);
}

await program.parseAsync();
