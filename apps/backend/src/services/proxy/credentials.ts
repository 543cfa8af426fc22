import type { LlmProvider } from "@read-along/shared/proxy";

import type { CredentialSource } from "../../infra/logging/index.js";
import type { ClassroomSession, SessionRegistry } from "../sessions/session-registry.js";

export class MissingCredentialsError extends Error {
	readonly code = "MISSING_CREDENTIALS" as const;

	constructor(message = "Provide an API key via Authorization header, apiKey field, or sessionCode") {
		super(message);
		this.name = "MissingCredentialsError";
	}
}

export interface CredentialCarrier {
	authorization?: string;
	apiKey?: string;
	sessionCode?: string;
}

export interface ResolvedSpeechCredential {
	apiKey: string;
	source: CredentialSource;
	/** Voice registered with the session, when the key came from one. */
	sessionVoiceId: string | null;
}

export interface ResolvedLlmCredential {
	apiKey: string;
	provider: LlmProvider;
	source: CredentialSource;
}

const BEARER_PATTERN = /^Bearer\s+(.+)$/iu;

export function readBearerToken(header: string | undefined): string | null {
	if (!header) {
		return null;
	}

	const match = BEARER_PATTERN.exec(header.trim());
	const token = match?.[1]?.trim();
	return token ? token : null;
}

/**
 * Finds the key a proxy call runs with: bearer header, then the body's
 * `apiKey`, then the keys the teacher registered for `sessionCode`.
 * A session key only ever goes to the provider it was registered for.
 */
export class CredentialResolver {
	constructor(private readonly sessions: SessionRegistry) {}

	resolveSpeech(carrier: CredentialCarrier): ResolvedSpeechCredential {
		const direct = this.readDirect(carrier);
		if (direct) {
			return { apiKey: direct.apiKey, source: direct.source, sessionVoiceId: null };
		}

		const session = this.requireSession(carrier);
		if (!session.keys.elevenlabsKey) {
			throw new MissingCredentialsError("No ElevenLabs key is registered for this session");
		}

		return {
			apiKey: session.keys.elevenlabsKey,
			source: "session",
			sessionVoiceId: session.keys.voiceId
		};
	}

	resolveLlm(carrier: CredentialCarrier, provider?: LlmProvider): ResolvedLlmCredential {
		const direct = this.readDirect(carrier);
		if (direct) {
			return { apiKey: direct.apiKey, provider: provider ?? "openai", source: direct.source };
		}

		const session = this.requireSession(carrier);
		return this.resolveSessionLlm(session);
	}

	resolveSessionLlm(session: ClassroomSession): ResolvedLlmCredential {
		if (!session.keys.aiKey) {
			throw new MissingCredentialsError("No AI key is registered for this session");
		}

		return {
			apiKey: session.keys.aiKey,
			provider: session.keys.aiProvider,
			source: "session"
		};
	}

	private readDirect(carrier: CredentialCarrier): { apiKey: string; source: CredentialSource } | null {
		const bearer = readBearerToken(carrier.authorization);
		if (bearer) {
			return { apiKey: bearer, source: "header" };
		}

		const bodyKey = carrier.apiKey?.trim();
		if (bodyKey) {
			return { apiKey: bodyKey, source: "body" };
		}

		return null;
	}

	private requireSession(carrier: CredentialCarrier): ClassroomSession {
		const code = carrier.sessionCode?.trim();
		if (!code) {
			throw new MissingCredentialsError();
		}

		return this.sessions.require(code);
	}
}
