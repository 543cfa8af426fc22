import { describe, expect, it, vi } from "vitest";

import {
	ProviderHttpError,
	ProviderTransport,
	UpstreamTimeoutError,
	UpstreamUnreachableError,
	extractProviderErrorMessage,
	type ProviderRequest
} from "../../src/services/providers/provider-transport.js";

const request: ProviderRequest = {
	provider: "openai",
	url: new URL("https://api.openai.test/v1/chat/completions"),
	headers: { "content-type": "application/json", authorization: "Bearer test-secret" },
	body: { model: "gpt-4o-mini" }
};

function jsonResponse(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json" }
	});
}

describe("ProviderTransport", () => {
	it("posts the JSON body with the given headers", async () => {
		const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(200, { ok: true }));
		const transport = new ProviderTransport({ fetchImpl });

		const response = await transport.postJson(request);

		expect(response.status).toBe(200);
		expect(response.json).toEqual({ ok: true });
		expect(fetchImpl).toHaveBeenCalledTimes(1);
		const [url, init] = fetchImpl.mock.calls[0] ?? [];
		expect(url).toBe("https://api.openai.test/v1/chat/completions");
		expect(init?.method).toBe("POST");
		expect(init?.body).toBe(JSON.stringify({ model: "gpt-4o-mini" }));
		expect(init?.headers).toEqual(request.headers);
	});

	it("passes the provider's status and message through on 4xx without retrying", async () => {
		const fetchImpl = vi.fn<typeof fetch>(async () =>
			jsonResponse(401, { error: { message: "Incorrect API key provided" } })
		);
		const transport = new ProviderTransport({ fetchImpl, maxRetries: 3, retryDelayMs: 0 });

		const error = await transport.postJson(request).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(ProviderHttpError);
		if (error instanceof ProviderHttpError) {
			expect(error.status).toBe(401);
			expect(error.message).toBe("Incorrect API key provided");
			expect(error.upstream).toEqual({ error: { message: "Incorrect API key provided" } });
		}
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("retries gateway errors until one succeeds", async () => {
		const fetchImpl = vi
			.fn<typeof fetch>()
			.mockResolvedValueOnce(jsonResponse(503, { message: "busy" }))
			.mockResolvedValueOnce(jsonResponse(200, { ok: true }));
		const transport = new ProviderTransport({ fetchImpl, maxRetries: 2, retryDelayMs: 0 });

		const response = await transport.postJson(request);

		expect(response.json).toEqual({ ok: true });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});

	it("retries a dropped connection", async () => {
		const fetchImpl = vi
			.fn<typeof fetch>()
			.mockRejectedValueOnce(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))
			.mockResolvedValueOnce(jsonResponse(200, { ok: true }));
		const transport = new ProviderTransport({ fetchImpl, maxRetries: 1, retryDelayMs: 0 });

		const response = await transport.postJson(request);

		expect(response.json).toEqual({ ok: true });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});

	it("does not retry when retries are disabled", async () => {
		const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(503, { message: "busy" }));
		const transport = new ProviderTransport({ fetchImpl, maxRetries: 0 });

		await expect(transport.postJson(request)).rejects.toMatchObject({ status: 503, message: "busy" });
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("gives up on a gateway error once retries are spent", async () => {
		const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(502, { message: "bad gateway" }));
		const transport = new ProviderTransport({ fetchImpl, maxRetries: 1, retryDelayMs: 0 });

		await expect(transport.postJson(request)).rejects.toMatchObject({ status: 502, message: "bad gateway" });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});

	it("maps refused connections to an unreachable error", async () => {
		const fetchImpl = vi.fn<typeof fetch>(async () => {
			throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
		});
		const transport = new ProviderTransport({ fetchImpl });

		const error = await transport.postJson(request).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(UpstreamUnreachableError);
		if (error instanceof Error) {
			expect(error.message).toBe("Unable to connect to OpenAI at https://api.openai.test");
		}
	});

	it("aborts a request that exceeds the timeout", async () => {
		const fetchImpl = vi.fn<typeof fetch>(
			(_input, init) =>
				new Promise<Response>((_resolve, reject) => {
					init?.signal?.addEventListener("abort", () => {
						reject(Object.assign(new Error("aborted"), { name: "AbortError" }));
					});
				})
		);
		const transport = new ProviderTransport({ fetchImpl, timeoutMs: 20, maxRetries: 2, retryDelayMs: 0 });

		await expect(transport.postJson(request)).rejects.toBeInstanceOf(UpstreamTimeoutError);
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});
});

describe("extractProviderErrorMessage", () => {
	it("reads ElevenLabs detail messages", () => {
		expect(
			extractProviderErrorMessage("elevenlabs", 401, { detail: { status: "invalid_api_key", message: "Invalid API key" } }, "")
		).toBe("Invalid API key");
	});

	it("falls back to a short plain-text body", () => {
		expect(extractProviderErrorMessage("anthropic", 500, null, "overloaded")).toBe("overloaded");
	});

	it("falls back to a generic message", () => {
		expect(extractProviderErrorMessage("google", 500, {}, "{}")).toBe("Google Gemini request failed with status 500");
	});
});
