/**
 * Completion Service
 *
 * Boundary to the external language model. One call, one turn, no tools.
 */

import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText } from "ai";
import { z } from "zod";
import type { GenerationConfig } from "../config.js";
import { ConfigurationError, PermanentFailure } from "../errors.js";

export interface CompletionOptions {
	model: string;
	/** Sampling temperature, 0 to 1 */
	temperature: number;
	/** Upper bound on generated tokens */
	maxTokens: number;
	signal?: AbortSignal;
}

export interface CompletionResult {
	text: string;
}

export interface CompletionService {
	complete(systemPrompt: string, userPrompt: string, options: CompletionOptions): Promise<CompletionResult>;
}

const CompletionResultSchema = z.object({ text: z.string() });

/**
 * @throws {PermanentFailure} When the service returned something other than text
 */
export function validateCompletionResult(result: unknown): CompletionResult {
	const parsed = CompletionResultSchema.safeParse(result);
	if (!parsed.success) {
		throw new PermanentFailure("Invalid completion response", "complete", { attempts: 1 });
	}
	return parsed.data;
}

/**
 * Claude through the AI SDK. A plain text completion: no tools are offered to the model.
 */
export class AnthropicCompletionService implements CompletionService {
	private provider: ReturnType<typeof createAnthropic> | null;

	constructor(options: Pick<GenerationConfig, "apiKey" | "baseUrl">) {
		this.provider = options.apiKey ? createAnthropic({ apiKey: options.apiKey, baseURL: options.baseUrl }) : null;
	}

	async complete(systemPrompt: string, userPrompt: string, options: CompletionOptions): Promise<CompletionResult> {
		if (!this.provider) {
			throw new ConfigurationError(
				"No completion API key configured; set ANTHROPIC_API_KEY or generation.apiKey in .groundlinerc",
				"generation.apiKey",
			);
		}

		const result = await generateText({
			model: this.provider(options.model),
			system: systemPrompt,
			prompt: userPrompt,
			temperature: options.temperature,
			maxOutputTokens: options.maxTokens,
			// retries belong to the Generator
			maxRetries: 0,
			abortSignal: options.signal,
		});

		return validateCompletionResult({ text: result.text });
	}
}
