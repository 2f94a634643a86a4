/**
 * Tests for the Anthropic completion service
 *
 * The AI SDK is mocked; these check what the service asks of it.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

const generateTextMock = vi.hoisted(() => vi.fn());

vi.mock("ai", () => ({ generateText: generateTextMock }));
vi.mock("@ai-sdk/anthropic", () => ({
	createAnthropic: vi.fn(() => (modelId: string) => ({ modelId })),
}));

// Import after mocking
import { ConfigurationError, PermanentFailure } from "../errors.js";
import { AnthropicCompletionService } from "../rag/completion-service.js";

const OPTIONS = { model: "test-completion", temperature: 0.7, maxTokens: 1000 };

describe("rag/completion-service.ts", () => {
	beforeEach(() => {
		generateTextMock.mockReset();
	});

	it("sends a single tool-less request with the temperature and token limit", async () => {
		generateTextMock.mockResolvedValue({ text: "Dogs bark." });
		const service = new AnthropicCompletionService({ apiKey: "test-secret" });

		const result = await service.complete("SYSTEM", "PROMPT", OPTIONS);

		expect(result).toEqual({ text: "Dogs bark." });
		expect(generateTextMock).toHaveBeenCalledTimes(1);
		const [request] = generateTextMock.mock.calls[0];
		expect(request).toEqual({
			model: { modelId: "test-completion" },
			system: "SYSTEM",
			prompt: "PROMPT",
			temperature: 0.7,
			maxOutputTokens: 1000,
			maxRetries: 0,
			abortSignal: undefined,
		});
		expect(request).not.toHaveProperty("tools");
	});

	it("forwards the abort signal", async () => {
		generateTextMock.mockResolvedValue({ text: "Dogs bark." });
		const service = new AnthropicCompletionService({ apiKey: "test-secret" });
		const controller = new AbortController();

		await service.complete("SYSTEM", "PROMPT", { ...OPTIONS, signal: controller.signal });

		expect(generateTextMock.mock.calls[0][0].abortSignal).toBe(controller.signal);
	});

	it("fails with a ConfigurationError when no API key is configured", async () => {
		const service = new AnthropicCompletionService({});

		await expect(service.complete("SYSTEM", "PROMPT", OPTIONS)).rejects.toBeInstanceOf(ConfigurationError);
		expect(generateTextMock).not.toHaveBeenCalled();
	});

	it("rejects a response without text", async () => {
		generateTextMock.mockResolvedValue({ text: undefined });
		const service = new AnthropicCompletionService({ apiKey: "test-secret" });

		await expect(service.complete("SYSTEM", "PROMPT", OPTIONS)).rejects.toBeInstanceOf(PermanentFailure);
	});
});
