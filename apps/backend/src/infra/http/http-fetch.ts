import { Buffer } from "node:buffer";
import * as http from "node:http";
import * as https from "node:https";

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

function createAbortError(): Error {
	const error = new Error("The operation was aborted");
	error.name = "AbortError";
	return error;
}

function toHeaderRecord(init: HeadersInit | undefined): Record<string, string> {
	const record: Record<string, string> = {};
	new Headers(init).forEach((value, key) => {
		record[key] = value;
	});
	return record;
}

function toResponseHeaders(incoming: http.IncomingHttpHeaders): Headers {
	const headers = new Headers();
	for (const [key, value] of Object.entries(incoming)) {
		if (Array.isArray(value)) {
			for (const entry of value) {
				headers.append(key, entry);
			}
		} else if (typeof value === "string") {
			headers.set(key, value);
		}
	}
	return headers;
}

function resolveUrl(input: string | URL | Request): URL {
	if (typeof input === "string") {
		return new URL(input);
	}
	return input instanceof URL ? input : new URL(input.url);
}

/**
 * `fetch` over node:http/node:https. Outbound provider calls go through this
 * so nock can intercept them in tests; it only sends string bodies.
 */
export function createHttpFetch(): typeof fetch {
	return function httpFetch(input: string | URL | Request, init?: RequestInit): Promise<Response> {
		const url = resolveUrl(input);
		const transport = url.protocol === "https:" ? https : http;
		const signal = init?.signal ?? null;
		const body = init?.body ?? null;

		if (body !== null && typeof body !== "string") {
			return Promise.reject(new TypeError("httpFetch only supports string request bodies"));
		}

		if (signal?.aborted) {
			return Promise.reject(createAbortError());
		}

		const headers = toHeaderRecord(init?.headers);
		if (body !== null) {
			headers["content-length"] = String(Buffer.byteLength(body));
		}

		return new Promise<Response>((resolve, reject) => {
			const request = transport.request(
				{
					hostname: url.hostname,
					port: url.port || (url.protocol === "https:" ? 443 : 80),
					path: url.pathname + url.search,
					method: init?.method ?? "GET",
					headers
				},
				(response) => {
					const chunks: Buffer[] = [];
					response.on("data", (chunk: Buffer) => {
						chunks.push(chunk);
					});
					response.on("error", reject);
					response.on("end", () => {
						const status = response.statusCode ?? 502;
						const text = Buffer.concat(chunks).toString("utf8");
						resolve(
							new Response(NULL_BODY_STATUSES.has(status) ? null : text, {
								status,
								statusText: response.statusMessage ?? "",
								headers: toResponseHeaders(response.headers)
							})
						);
					});
				}
			);

			request.on("error", reject);

			if (signal) {
				signal.addEventListener(
					"abort",
					() => {
						request.destroy();
						reject(createAbortError());
					},
					{ once: true }
				);
			}

			if (body !== null) {
				request.write(body);
			}

			request.end();
		});
	};
}
