import type { ProviderName } from "@read-along/shared/proxy";
import { performance } from "node:perf_hooks";
import pRetry, { AbortError } from "p-retry";

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_RETRY_DELAY_MS = 250;
const RETRYABLE_STATUSES = new Set([502, 503, 504]);

const PROVIDER_LABELS: Record<ProviderName, string> = {
	elevenlabs: "ElevenLabs",
	openai: "OpenAI",
	anthropic: "Anthropic",
	google: "Google Gemini"
};

export class ProviderHttpError extends Error {
	readonly code = "UPSTREAM_ERROR" as const;

	constructor(
		readonly provider: ProviderName,
		readonly status: number,
		readonly upstream: unknown,
		message: string
	) {
		super(message);
		this.name = "ProviderHttpError";
	}
}

export class UpstreamTimeoutError extends Error {
	readonly code = "UPSTREAM_TIMEOUT" as const;

	constructor(
		readonly provider: ProviderName,
		timeoutMs: number
	) {
		super(`${PROVIDER_LABELS[provider]} did not respond within ${timeoutMs}ms`);
		this.name = "UpstreamTimeoutError";
	}
}

export class UpstreamUnreachableError extends Error {
	readonly code = "UPSTREAM_UNREACHABLE" as const;

	constructor(
		readonly provider: ProviderName,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "UpstreamUnreachableError";
	}
}

export class UpstreamResponseFormatError extends Error {
	readonly code = "UPSTREAM_INVALID_RESPONSE" as const;

	constructor(
		readonly provider: ProviderName,
		readonly upstream: unknown
	) {
		super(`${PROVIDER_LABELS[provider]} returned a response without usable content`);
		this.name = "UpstreamResponseFormatError";
	}
}

export interface ProviderRequest {
	provider: ProviderName;
	url: URL;
	headers: Record<string, string>;
	body: unknown;
}

export interface ProviderResponse {
	status: number;
	/** Parsed JSON body, or null when the provider sent something else. */
	json: unknown;
	rawBody: string;
	latencyMs: number;
}

export interface ProviderTransportOptions {
	fetchImpl?: typeof fetch;
	timeoutMs?: number;
	maxRetries?: number;
	/** Fixed pause between attempts. */
	retryDelayMs?: number;
}

interface AttemptResult extends ProviderResponse {
	ok: boolean;
}

/**
 * Sends JSON to a provider with a per-attempt timeout. Network failures and
 * gateway statuses are retried up to `maxRetries` times; 4xx never are.
 */
export class ProviderTransport {
	private readonly fetchImpl: typeof fetch;
	private readonly timeoutMs: number;
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;

	constructor(options: ProviderTransportOptions = {}) {
		this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.maxRetries = Math.max(0, options.maxRetries ?? 0);
		this.retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
	}

	async postJson(request: ProviderRequest): Promise<ProviderResponse> {
		return pRetry(() => this.attempt(request), {
			retries: this.maxRetries,
			minTimeout: this.retryDelayMs,
			factor: 1,
			randomize: false
		});
	}

	/** One attempt; anything wrapped in AbortError ends the retry loop. */
	private async attempt(request: ProviderRequest): Promise<ProviderResponse> {
		let result: AttemptResult;

		try {
			result = await this.send(request);
		} catch (error: unknown) {
			if (error instanceof UpstreamUnreachableError) {
				throw error;
			}
			throw new AbortError(error instanceof Error ? error : String(error));
		}

		if (result.ok) {
			return {
				status: result.status,
				json: result.json,
				rawBody: result.rawBody,
				latencyMs: result.latencyMs
			};
		}

		const failure = new ProviderHttpError(
			request.provider,
			result.status,
			result.json ?? result.rawBody,
			extractProviderErrorMessage(request.provider, result.status, result.json, result.rawBody)
		);
		if (RETRYABLE_STATUSES.has(result.status)) {
			throw failure;
		}
		throw new AbortError(failure);
	}

	private async send(request: ProviderRequest): Promise<AttemptResult> {
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
		const startedAt = performance.now();

		try {
			const response = await this.fetchImpl(request.url.toString(), {
				method: "POST",
				headers: request.headers,
				body: JSON.stringify(request.body),
				signal: controller.signal
			});
			const rawBody = await response.text();

			return {
				ok: response.ok,
				status: response.status,
				json: safeJsonParse(rawBody),
				rawBody,
				latencyMs: Math.max(1, Math.round(performance.now() - startedAt))
			};
		} catch (error: unknown) {
			if (isAbortError(error)) {
				throw new UpstreamTimeoutError(request.provider, this.timeoutMs);
			}

			throw new UpstreamUnreachableError(
				request.provider,
				describeNetworkError(request.provider, error, request.url),
				{ cause: error }
			);
		} finally {
			clearTimeout(timeoutId);
		}
	}
}

export function extractProviderErrorMessage(
	provider: ProviderName,
	status: number,
	json: unknown,
	rawBody: string
): string {
	if (isRecord(json)) {
		if (provider === "elevenlabs") {
			const detail = json.detail;
			if (isRecord(detail) && typeof detail.message === "string" && detail.message.trim().length > 0) {
				return detail.message;
			}
			if (typeof detail === "string" && detail.trim().length > 0) {
				return detail;
			}
		}

		const error = json.error;
		if (isRecord(error) && typeof error.message === "string" && error.message.trim().length > 0) {
			return error.message;
		}

		if (typeof json.message === "string" && json.message.trim().length > 0) {
			return json.message;
		}
	}

	const trimmed = rawBody.trim();
	if (json === null && trimmed.length > 0 && trimmed.length <= 300) {
		return trimmed;
	}

	return `${PROVIDER_LABELS[provider]} request failed with status ${status}`;
}

function describeNetworkError(provider: ProviderName, error: unknown, url: URL): string {
	const code = deriveNetworkErrorCode(error);
	const label = PROVIDER_LABELS[provider];

	switch (code) {
		case "ECONNREFUSED":
			return `Unable to connect to ${label} at ${url.origin}`;
		case "ENOTFOUND":
			return `Could not resolve hostname ${url.hostname}`;
		case "ECONNRESET":
			return `Connection to ${label} was reset`;
		default:
			return error instanceof Error && error.message.trim().length > 0
				? `${label} request failed: ${error.message}`
				: `${label} request failed`;
	}
}

function deriveNetworkErrorCode(error: unknown): string | null {
	if (isRecord(error) && typeof error.code === "string" && error.code.trim().length > 0) {
		return error.code;
	}

	if (error instanceof Error && isRecord(error.cause) && typeof error.cause.code === "string") {
		return error.cause.code;
	}

	return null;
}

function isAbortError(error: unknown): boolean {
	return isRecord(error) && error.name === "AbortError";
}

export function safeJsonParse(value: string): unknown {
	try {
		return JSON.parse(value) as unknown;
	} catch {
		return null;
	}
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}
