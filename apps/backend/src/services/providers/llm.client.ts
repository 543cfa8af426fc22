import type { LlmProvider } from "@read-along/shared/proxy";

import type { ProviderBaseUrls } from "../../config/server.js";
import {
	isRecord,
	UpstreamResponseFormatError,
	type ProviderRequest,
	type ProviderTransport
} from "./provider-transport.js";

const ANTHROPIC_VERSION = "2023-06-01" as const;
const DEFAULT_ANTHROPIC_MAX_TOKENS = 4000;

export const DEFAULT_LLM_MODELS: Record<LlmProvider, string> = {
	openai: "gpt-4o-mini",
	anthropic: "claude-sonnet-4-20250514",
	google: "gemini-2.0-flash"
};

export interface LlmCompletionInput {
	provider: LlmProvider;
	apiKey: string;
	prompt: string;
	system?: string;
	model?: string;
	temperature?: number;
	maxTokens?: number;
}

export interface LlmCompletionResult {
	provider: LlmProvider;
	model: string;
	text: string;
	/** The provider's response body, untouched. */
	response: unknown;
	latencyMs: number;
}

export interface LlmClientOptions {
	transport: ProviderTransport;
	baseUrls: Pick<ProviderBaseUrls, "openai" | "anthropic" | "google">;
}

export class LlmClient {
	private readonly transport: ProviderTransport;
	private readonly baseUrls: LlmClientOptions["baseUrls"];

	constructor(options: LlmClientOptions) {
		this.transport = options.transport;
		this.baseUrls = options.baseUrls;
	}

	async complete(input: LlmCompletionInput): Promise<LlmCompletionResult> {
		const model = input.model ?? DEFAULT_LLM_MODELS[input.provider];
		const request = this.createRequest(input, model);
		const response = await this.transport.postJson(request);
		const text = extractCompletionText(input.provider, response.json);

		if (text === null) {
			throw new UpstreamResponseFormatError(input.provider, response.json ?? response.rawBody);
		}

		return {
			provider: input.provider,
			model,
			text: text.trim(),
			response: response.json,
			latencyMs: response.latencyMs
		};
	}

	private createRequest(input: LlmCompletionInput, model: string): ProviderRequest {
		switch (input.provider) {
			case "anthropic":
				return this.buildAnthropicRequest(input, model);
			case "google":
				return this.buildGoogleRequest(input, model);
			case "openai":
			default:
				return this.buildOpenAiRequest(input, model);
		}
	}

	private buildOpenAiRequest(input: LlmCompletionInput, model: string): ProviderRequest {
		const messages: Array<{ role: "system" | "user"; content: string }> = [];
		if (input.system) {
			messages.push({ role: "system", content: input.system });
		}
		messages.push({ role: "user", content: input.prompt });

		return {
			provider: "openai",
			url: new URL(`${this.baseUrls.openai}/v1/chat/completions`),
			headers: {
				"content-type": "application/json",
				authorization: `Bearer ${input.apiKey}`
			},
			body: {
				model,
				messages,
				temperature: input.temperature,
				max_tokens: input.maxTokens
			}
		};
	}

	private buildAnthropicRequest(input: LlmCompletionInput, model: string): ProviderRequest {
		return {
			provider: "anthropic",
			url: new URL(`${this.baseUrls.anthropic}/v1/messages`),
			headers: {
				"content-type": "application/json",
				"x-api-key": input.apiKey,
				"anthropic-version": ANTHROPIC_VERSION
			},
			body: {
				model,
				max_tokens: input.maxTokens ?? DEFAULT_ANTHROPIC_MAX_TOKENS,
				system: input.system,
				temperature: input.temperature,
				messages: [{ role: "user", content: input.prompt }]
			}
		};
	}

	private buildGoogleRequest(input: LlmCompletionInput, model: string): ProviderRequest {
		const generationConfig: Record<string, number> = {};
		if (input.temperature !== undefined) {
			generationConfig.temperature = input.temperature;
		}
		if (input.maxTokens !== undefined) {
			generationConfig.maxOutputTokens = input.maxTokens;
		}

		return {
			provider: "google",
			url: new URL(`${this.baseUrls.google}/v1beta/models/${encodeURIComponent(model)}:generateContent`),
			headers: {
				"content-type": "application/json",
				"x-goog-api-key": input.apiKey
			},
			body: {
				contents: [{ role: "user", parts: [{ text: input.prompt }] }],
				systemInstruction: input.system ? { parts: [{ text: input.system }] } : undefined,
				generationConfig
			}
		};
	}
}

export function extractCompletionText(provider: LlmProvider, payload: unknown): string | null {
	if (!isRecord(payload)) {
		return null;
	}

	switch (provider) {
		case "anthropic":
			return joinTextParts(payload.content);
		case "google": {
			const candidates = Array.isArray(payload.candidates) ? payload.candidates : [];
			const first: unknown = candidates[0];
			if (!isRecord(first) || !isRecord(first.content)) {
				return null;
			}
			return joinTextParts(first.content.parts);
		}
		case "openai":
		default: {
			const choices = Array.isArray(payload.choices) ? payload.choices : [];
			const first: unknown = choices[0];
			if (!isRecord(first) || !isRecord(first.message)) {
				return null;
			}
			const content = first.message.content;
			return typeof content === "string" && content.trim().length > 0 ? content : null;
		}
	}
}

function joinTextParts(value: unknown): string | null {
	if (!Array.isArray(value)) {
		return null;
	}

	const parts: string[] = [];
	for (const item of value) {
		if (isRecord(item) && typeof item.text === "string" && item.text.trim().length > 0) {
			parts.push(item.text);
		}
	}

	return parts.length > 0 ? parts.join("") : null;
}
