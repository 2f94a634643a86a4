/**
 * Logger Module
 *
 * Pino-based structured logging for the pipeline.
 * Each component takes a child logger tagged with its module name, e.g.
 * `logger.child({ module: "rag-embedder" })`.
 *
 * Level comes from LOG_LEVEL; otherwise debug in development, info in
 * production and silent under the test runner.
 */

import pino from "pino";

const env = process.env.NODE_ENV;
const isTest = env === "test" || process.env.VITEST !== undefined;
const isDev = env !== "production" && !isTest;

function defaultLevel(): string {
	if (isTest) return "silent";
	return isDev ? "debug" : "info";
}

export const logger = pino({
	level: process.env.LOG_LEVEL || defaultLevel(),
	transport: isDev
		? {
				target: "pino-pretty",
				options: {
					colorize: true,
					ignore: "pid,hostname",
					translateTime: "HH:MM:ss",
					// keep stdout for command output
					destination: 2,
				},
			}
		: undefined,
});

// Child loggers for the layers outside src/rag
export const configLogger = logger.child({ module: "config" });
export const cliLogger = logger.child({ module: "cli" });
export const retryLogger = logger.child({ module: "retry" });
