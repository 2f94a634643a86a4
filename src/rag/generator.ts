/**
 * Generator Module
 *
 * Turns a grounded prompt into an answer. Never throws: any failure that
 * survives the retry policy becomes GENERATION_FALLBACK.
 */

import type { GenerationConfig } from "../config.js";
import { logger as rootLogger } from "../logger.js";
import { type RetryPolicy, type SleepFn, withRetry, withTimeout } from "../retry-handler.js";
import { type CompletionService, validateCompletionResult } from "./completion-service.js";
import { GENERATION_FALLBACK, GENERATOR_SYSTEM_PROMPT } from "./prompt-builder.js";

const logger = rootLogger.child({ module: "rag-generator" });

export interface GeneratorOptions extends GenerationConfig {
	service: CompletionService;
	retry: RetryPolicy;
	sleep?: SleepFn;
	random?: () => number;
}

export class Generator {
	constructor(private options: GeneratorOptions) {}

	async generate(prompt: string): Promise<string> {
		const { service, model, temperature, maxTokens, timeoutMs, maxAnswerChars, retry, sleep, random } = this.options;

		try {
			const { text } = await withRetry(
				async () => {
					const result = await withTimeout(
						(signal) => service.complete(GENERATOR_SYSTEM_PROMPT, prompt, { model, temperature, maxTokens, signal }),
						timeoutMs,
						"complete",
					);
					return validateCompletionResult(result);
				},
				{ policy: retry, operation: "complete", sleep, random },
			);

			const answer = text.trim();
			if (!answer) {
				logger.warn({ model }, "Completion returned an empty answer");
				return GENERATION_FALLBACK;
			}

			if (answer.length > maxAnswerChars) {
				logger.debug({ length: answer.length, maxAnswerChars }, "Answer truncated");
				return answer.slice(0, maxAnswerChars);
			}
			return answer;
		} catch (error) {
			logger.error({ model, error: String(error) }, "Generation failed");
			return GENERATION_FALLBACK;
		}
	}
}
