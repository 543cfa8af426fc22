import type { LlmProvider, ProviderName } from "@read-along/shared/proxy";
import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { URL } from "node:url";

const DEFAULT_FILE_NAME = "usage-events.jsonl" as const;
export const USAGE_EVENTS_FILE_NAME = DEFAULT_FILE_NAME;
const DIRECTORY_MODE = 0o700;
const MAX_MESSAGE_LENGTH = 300;
const TRUNCATION_SUFFIX = "..." as const;

const HOSTNAME_KEYS = new Set(["url", "endpointUrl", "baseUrl"]);
const OMITTED_KEYS = new Set([
	"apiKey",
	"aiKey",
	"elevenlabsKey",
	"authorization",
	"xi-api-key",
	"x-api-key",
	"x-goog-api-key",
	"keys"
]);
const TRUNCATED_KEYS = new Set(["errorMessage"]);

export type ProxyEndpoint = "tts" | "complete" | "generate-tasks" | "translate" | "simplify-text" | "word-info";
export type CredentialSource = "header" | "body" | "session";

export interface ProxyRequestUsageEvent {
	type: "proxy_request";
	endpoint: ProxyEndpoint;
	provider: ProviderName;
	credentialSource: CredentialSource;
	status: "success" | "error";
	cached: boolean;
	latencyMs: number | null;
	httpStatus?: number;
	errorCode?: string;
	errorMessage?: string;
	url?: string;
	timestamp: number;
}

export interface SessionCreatedUsageEvent {
	type: "session_created";
	code: string;
	aiProvider: LlmProvider;
	hasAiKey: boolean;
	via: "http" | "socket";
	timestamp: number;
}

export interface SessionEndedUsageEvent {
	type: "session_ended";
	code: string;
	studentCount: number;
	durationMs: number;
	timestamp: number;
}

export interface SessionExpiredUsageEvent {
	type: "session_expired";
	code: string;
	studentCount: number;
	timestamp: number;
}

export type UsageEvent =
	| ProxyRequestUsageEvent
	| SessionCreatedUsageEvent
	| SessionEndedUsageEvent
	| SessionExpiredUsageEvent;

export type UsageLogWriter = (event: UsageEvent) => Promise<void> | void;

export interface UsageRecorder {
	record(event: UsageEvent): Promise<void>;
}

export interface UsageLoggerOptions {
	writer?: UsageLogWriter;
	logDirectory?: string;
	fileName?: string;
}

export class UsageLogger implements UsageRecorder {
	private readonly write: UsageLogWriter;
	private readonly directory?: string;
	private ensuredDirectory = false;

	constructor(options: UsageLoggerOptions) {
		if (options.writer) {
			this.write = options.writer;
			return;
		}

		const directory = options.logDirectory;
		if (!directory) {
			throw new TypeError("UsageLogger requires either a writer or logDirectory");
		}

		const filePath = path.join(directory, options.fileName ?? DEFAULT_FILE_NAME);
		this.directory = directory;
		this.write = async (event) => {
			await this.ensureDirectory();
			await appendFile(filePath, `${JSON.stringify(event)}\n`, "utf-8");
		};
	}

	async record(event: UsageEvent): Promise<void> {
		await this.write(sanitizeUsageEvent(event));
	}

	private async ensureDirectory(): Promise<void> {
		if (this.ensuredDirectory || !this.directory) {
			return;
		}

		await mkdir(this.directory, { recursive: true, mode: DIRECTORY_MODE });
		this.ensuredDirectory = true;
	}
}

export function createUsageLogger(options: UsageLoggerOptions): UsageLogger {
	return new UsageLogger(options);
}

/**
 * Records an event without letting a logging failure reach the caller.
 */
export async function recordUsage(recorder: UsageRecorder | null | undefined, event: UsageEvent): Promise<void> {
	if (!recorder) {
		return;
	}

	try {
		await recorder.record(event);
	} catch (error) {
		console.warn("Failed to record usage event", error);
	}
}

export function sanitizeUsageEvent<T extends UsageEvent>(event: T): T {
	const clone: T = structuredClone(event);
	scrub(clone);
	return clone;
}

function scrub(value: unknown): void {
	if (value === null || typeof value !== "object") {
		return;
	}

	if (Array.isArray(value)) {
		for (const entry of value) {
			scrub(entry);
		}
		return;
	}

	for (const [key, inner] of Object.entries(value)) {
		if (OMITTED_KEYS.has(key)) {
			Reflect.deleteProperty(value, key);
			continue;
		}

		if (HOSTNAME_KEYS.has(key) && typeof inner === "string") {
			Reflect.set(value, key, extractHostname(inner));
			continue;
		}

		if (TRUNCATED_KEYS.has(key) && typeof inner === "string") {
			Reflect.set(value, key, truncate(inner));
			continue;
		}

		scrub(inner);
	}
}

export function extractHostname(candidate: string): string {
	const trimmed = candidate.trim();
	if (trimmed.length === 0) {
		return trimmed;
	}

	const attempts = [trimmed];
	if (!/^\w+:\/\//u.test(trimmed)) {
		attempts.push(`https://${trimmed}`);
	}

	for (const attempt of attempts) {
		try {
			const url = new URL(attempt);
			if (url.hostname) {
				return url.hostname;
			}
		} catch {
			continue;
		}
	}

	const withoutScheme = trimmed.replace(/^\w+:\/\//u, "");
	const host = withoutScheme.split(/[/?#]/u)[0] ?? "";
	return host.replace(/:\d+$/u, "");
}

function truncate(value: string): string {
	if (value.length <= MAX_MESSAGE_LENGTH) {
		return value;
	}

	const sliceLength = Math.max(0, MAX_MESSAGE_LENGTH - TRUNCATION_SUFFIX.length);
	return `${value.slice(0, sliceLength)}${TRUNCATION_SUFFIX}`;
}
