import type { SpeechRequest } from "@read-along/shared/proxy";
import { DEFAULT_VOICE_ID } from "@read-along/shared/proxy";
import { createHash } from "node:crypto";

import type { LruCache } from "../../infra/cache/lru-cache.js";
import { recordUsage, type CredentialSource, type UsageRecorder } from "../../infra/logging/index.js";
import { resolveSpeechLanguage, type ElevenLabsClient } from "../providers/elevenlabs.client.js";
import type { CredentialResolver } from "./credentials.js";
import { describeProxyFailure } from "./proxy-failure.js";

export type SpeechCache = LruCache<string, Record<string, unknown>>;

export interface SpeechProxyServiceOptions {
	client: ElevenLabsClient;
	credentials: CredentialResolver;
	cache: SpeechCache;
	usageRecorder?: UsageRecorder | null;
	now?: () => number;
}

export interface SpeechProxyResult {
	body: Record<string, unknown>;
	cached: boolean;
}

export function createSpeechCacheKey(text: string, languageCode: string, voiceId: string): string {
	return createHash("sha256").update(`${text}${languageCode}|${voiceId}`, "utf8").digest("hex");
}

export class SpeechProxyService {
	private readonly client: ElevenLabsClient;
	private readonly credentials: CredentialResolver;
	private readonly cache: SpeechCache;
	private readonly usageRecorder: UsageRecorder | null;
	private readonly now: () => number;

	constructor(options: SpeechProxyServiceOptions) {
		this.client = options.client;
		this.credentials = options.credentials;
		this.cache = options.cache;
		this.usageRecorder = options.usageRecorder ?? null;
		this.now = options.now ?? Date.now;
	}

	async synthesize(request: SpeechRequest, authorization?: string): Promise<SpeechProxyResult> {
		const credential = this.credentials.resolveSpeech({
			authorization,
			apiKey: request.apiKey,
			sessionCode: request.sessionCode
		});

		const voiceId = request.voiceId ?? credential.sessionVoiceId ?? DEFAULT_VOICE_ID;
		const languageCode = resolveSpeechLanguage(request.languageCode);
		const cacheKey = createSpeechCacheKey(request.text, languageCode, voiceId);

		const hit = this.cache.get(cacheKey);
		if (hit) {
			await this.record({ source: credential.source, cached: true, latencyMs: 0 });
			return { body: hit, cached: true };
		}

		try {
			const result = await this.client.synthesizeWithTimestamps({
				apiKey: credential.apiKey,
				text: request.text,
				voiceId,
				modelId: request.modelId,
				languageCode
			});

			this.cache.set(cacheKey, result.body);
			await this.record({ source: credential.source, cached: false, latencyMs: result.latencyMs });
			return { body: result.body, cached: false };
		} catch (error) {
			await recordUsage(this.usageRecorder, {
				type: "proxy_request",
				endpoint: "tts",
				provider: "elevenlabs",
				credentialSource: credential.source,
				status: "error",
				cached: false,
				latencyMs: null,
				...describeProxyFailure(error),
				timestamp: this.now()
			});
			throw error;
		}
	}

	private async record(outcome: { source: CredentialSource; cached: boolean; latencyMs: number }): Promise<void> {
		await recordUsage(this.usageRecorder, {
			type: "proxy_request",
			endpoint: "tts",
			provider: "elevenlabs",
			credentialSource: outcome.source,
			status: "success",
			cached: outcome.cached,
			latencyMs: outcome.latencyMs,
			timestamp: this.now()
		});
	}
}
