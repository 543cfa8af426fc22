import {
	DEFAULT_LANGUAGE_CODE,
	DEFAULT_SPEECH_MODEL_ID,
	DEFAULT_VOICE_ID
} from "@read-along/shared/proxy";

import { isRecord, UpstreamResponseFormatError, type ProviderTransport } from "./provider-transport.js";

// eleven_multilingual_v2 has no voice for these; Russian is the closest it offers.
const LANGUAGE_FALLBACKS: Readonly<Record<string, string>> = Object.freeze({
	uk: "ru",
	bg: "ru"
});

const VOICE_SETTINGS = Object.freeze({
	stability: 0.5,
	similarity_boost: 0.75
});

export interface SpeechSynthesisInput {
	apiKey: string;
	text: string;
	voiceId?: string;
	modelId?: string;
	languageCode?: string;
}

export interface SpeechSynthesisResult {
	voiceId: string;
	languageCode: string;
	/** `{audio_base64, alignment, normalized_alignment}` as ElevenLabs sent it. */
	body: Record<string, unknown>;
	latencyMs: number;
}

export interface ElevenLabsClientOptions {
	transport: ProviderTransport;
	baseUrl: string;
}

export function resolveSpeechLanguage(languageCode: string | undefined): string {
	const normalized = languageCode?.trim().toLowerCase() || DEFAULT_LANGUAGE_CODE;
	return LANGUAGE_FALLBACKS[normalized] ?? normalized;
}

export class ElevenLabsClient {
	private readonly transport: ProviderTransport;
	private readonly baseUrl: string;

	constructor(options: ElevenLabsClientOptions) {
		this.transport = options.transport;
		this.baseUrl = options.baseUrl;
	}

	async synthesizeWithTimestamps(input: SpeechSynthesisInput): Promise<SpeechSynthesisResult> {
		const voiceId = input.voiceId ?? DEFAULT_VOICE_ID;
		const languageCode = resolveSpeechLanguage(input.languageCode);

		const response = await this.transport.postJson({
			provider: "elevenlabs",
			url: new URL(
				`${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(voiceId)}/with-timestamps`
			),
			headers: {
				"content-type": "application/json",
				accept: "application/json",
				"xi-api-key": input.apiKey
			},
			body: {
				text: input.text,
				model_id: input.modelId ?? DEFAULT_SPEECH_MODEL_ID,
				language_code: languageCode,
				voice_settings: VOICE_SETTINGS
			}
		});

		if (!isRecord(response.json)) {
			throw new UpstreamResponseFormatError("elevenlabs", response.rawBody);
		}

		return {
			voiceId,
			languageCode,
			body: response.json,
			latencyMs: response.latencyMs
		};
	}
}
