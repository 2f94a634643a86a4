/**
 * Shared utilities for command modules
 */
import { InvalidArgumentError } from "commander";
import { AppError } from "../errors.js";
import { cliLogger } from "../logger.js";
import { error } from "../output.js";

/**
 * Commander argument parser for positive integer options
 */
export function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

/**
 * Commander argument parser for non-negative integer options
 */
export function parseNonNegativeInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new InvalidArgumentError("Must be a non-negative integer.");
	}
	return parsed;
}

/**
 * Report a failed command and set a non-zero exit code
 */
export function reportFailure(action: string, err: unknown): void {
	const message = err instanceof Error ? err.message : String(err);
	const code = err instanceof AppError ? err.code : undefined;
	cliLogger.debug({ action, error: message, code }, "Command failed");
	error(`${action}: ${message}`, code ? { code } : undefined);
	process.exitCode = 1;
}
