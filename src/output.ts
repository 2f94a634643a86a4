/**
 * Unified Output System
 *
 * Consistent output for every CLI command:
 * - Human mode: concise, colored terminal output
 * - Agent mode: one JSON event per line for machine parsing
 *
 * Auto-detects TTY to choose mode; GROUNDLINE_OUTPUT or --human override it.
 * Diagnostics go through the pino logger on stderr, never through here.
 */

import chalk from "chalk";

export type OutputMode = "human" | "agent";

/**
 * Structured event for agent-mode JSON output
 */
export interface OutputEvent {
	type: "info" | "success" | "error" | "warning" | "progress" | "metrics" | "answer" | "debug";
	message: string;
	timestamp: string;
	data?: Record<string, unknown>;
}

interface OutputConfig {
	mode: OutputMode;
	verbose: boolean;
}

const globalConfig: OutputConfig = {
	mode: detectMode(),
	verbose: false,
};

/**
 * Auto-detect output mode based on environment
 * - TTY (interactive terminal) → human mode
 * - Non-TTY (piped, CI, agent) → agent mode (JSON)
 */
function detectMode(): OutputMode {
	if (process.env.GROUNDLINE_OUTPUT === "human") return "human";
	if (process.env.GROUNDLINE_OUTPUT === "agent") return "agent";
	if (process.argv.includes("--human")) return "human";
	return process.stdout.isTTY ? "human" : "agent";
}

/**
 * Configure the output system
 */
export function configureOutput(config: Partial<OutputConfig>): void {
	if (config.mode !== undefined) {
		globalConfig.mode = config.mode;
	}
	if (config.verbose !== undefined) {
		globalConfig.verbose = config.verbose;
	}
}

export function getOutputMode(): OutputMode {
	return globalConfig.mode;
}

export function isHumanMode(): boolean {
	return globalConfig.mode === "human";
}

function now(): string {
	return new Date().toISOString();
}

function getHumanPrefix(type: OutputEvent["type"]): string {
	switch (type) {
		case "success":
			return chalk.green("✓");
		case "error":
			return chalk.red("✗");
		case "warning":
			return chalk.yellow("⚠");
		case "progress":
			return chalk.cyan("→");
		case "metrics":
			return chalk.blue("📊");
		case "debug":
			return chalk.dim("·");
		default:
			return chalk.dim("•");
	}
}

function outputEvent(event: OutputEvent): void {
	if (globalConfig.mode === "agent") {
		console.log(JSON.stringify(event));
		return;
	}

	const prefix = getHumanPrefix(event.type);
	if (event.data && globalConfig.verbose) {
		console.log(`${prefix} ${event.message}`, event.data);
	} else {
		console.log(`${prefix} ${event.message}`);
	}
}

// =============================================================================
// Public API - Semantic output functions
// =============================================================================

export function info(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "info", message, timestamp: now(), data });
}

export function success(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "success", message, timestamp: now(), data });
}

export function error(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "error", message, timestamp: now(), data });
}

export function warning(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "warning", message, timestamp: now(), data });
}

export function progress(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "progress", message, timestamp: now(), data });
}

/**
 * Output metrics/statistics
 */
export function metrics(message: string, data: Record<string, unknown>): void {
	outputEvent({ type: "metrics", message, timestamp: now(), data });
}

/**
 * Output debug information (only in verbose mode)
 */
export function debug(message: string, data?: Record<string, unknown>): void {
	if (globalConfig.verbose) {
		outputEvent({ type: "debug", message, timestamp: now(), data });
	}
}

/**
 * Print a generated answer. Human mode prints the text as-is, without a prefix.
 */
export function answer(text: string, data?: Record<string, unknown>): void {
	if (globalConfig.mode === "human") {
		console.log(text);
	} else {
		outputEvent({ type: "answer", message: text, timestamp: now(), data });
	}
}

// =============================================================================
// Human-only formatting helpers
// =============================================================================

/**
 * Print a header/banner
 */
export function header(title: string, subtitle?: string): void {
	if (globalConfig.mode === "human") {
		console.log();
		console.log(chalk.cyan.bold(title));
		if (subtitle) {
			console.log(chalk.dim(`  ${subtitle}`));
		}
		console.log();
	} else {
		outputEvent({ type: "info", message: title, timestamp: now(), data: subtitle ? { subtitle } : undefined });
	}
}

/**
 * Print a section divider
 */
export function section(title: string): void {
	if (globalConfig.mode === "human") {
		console.log(chalk.cyan(`\n━━━ ${title} ━━━\n`));
	} else {
		outputEvent({ type: "info", message: title, timestamp: now() });
	}
}

export function keyValue(key: string, value: string | number | boolean): void {
	if (globalConfig.mode === "human") {
		console.log(`  ${chalk.dim(`${key}:`)} ${value}`);
	} else {
		outputEvent({ type: "info", message: `${key}: ${value}`, timestamp: now(), data: { [key]: value } });
	}
}

export function list(items: string[], prefix: string = "•"): void {
	if (globalConfig.mode === "human") {
		for (const item of items) {
			console.log(`  ${chalk.dim(prefix)} ${item}`);
		}
	} else {
		outputEvent({ type: "info", message: "list", timestamp: now(), data: { items } });
	}
}
