import {
	DEFAULT_LANGUAGE_CODE,
	WordInfoSchema,
	type CompletionRequest,
	type GenerateTasksRequest,
	type LlmProvider,
	type SimplificationLevel,
	type SimplifyTextRequest,
	type TranslateRequest,
	type WordInfo,
	type WordInfoRequest
} from "@read-along/shared/proxy";
import { ComprehensionTaskSchema, type ComprehensionTask } from "@read-along/shared/tasks";
import { createHash } from "node:crypto";

import type { LruCache } from "../../infra/cache/lru-cache.js";
import {
	recordUsage,
	type ProxyEndpoint,
	type UsageRecorder
} from "../../infra/logging/index.js";
import type { LlmClient, LlmCompletionInput, LlmCompletionResult } from "../providers/llm.client.js";
import type { ClassroomSession, SessionRegistry } from "../sessions/session-registry.js";
import type { CredentialResolver, ResolvedLlmCredential } from "./credentials.js";
import {
	buildSimplificationPrompt,
	buildTaskGenerationPrompt,
	buildTranslationSystemPrompt,
	buildWordInfoPrompt,
	extractJsonBlock
} from "./prompts.js";
import { describeProxyFailure } from "./proxy-failure.js";

const TASK_TEMPERATURE = 0.7;
const TASK_MAX_TOKENS = 2000;
const MAX_RELEASABLE_TASKS = 20;
const FACTUAL_TEMPERATURE = 0.3;
const WORD_INFO_MAX_TOKENS = 1000;
const WORD_PATTERN = /[^\p{L}\p{N}_\s-]/gu;
const NO_AI_KEY_EXPLANATION = "No explanation available (no AI key configured)";

export class TaskGenerationError extends Error {
	readonly code = "TASK_GENERATION_FAILED" as const;

	constructor(readonly provider: LlmProvider, readonly rawText: string) {
		super("The model did not return any usable comprehension tasks");
		this.name = "TaskGenerationError";
	}
}

export class SimplificationDisabledError extends Error {
	readonly code = "SIMPLIFICATION_DISABLED" as const;

	constructor(readonly sessionCode: string) {
		super(`Text simplification is not enabled for session ${sessionCode}`);
		this.name = "SimplificationDisabledError";
	}
}

export class InvalidWordError extends Error {
	readonly code = "INVALID_WORD" as const;

	constructor(readonly word: string) {
		super("The word contains no letters or digits");
		this.name = "InvalidWordError";
	}
}

export interface CompletionResponse {
	provider: LlmProvider;
	model: string;
	text: string;
	response: unknown;
}

export interface TranslationResponse {
	translatedText: string;
	cached: boolean;
}

export interface SimplificationResponse {
	originalText: string;
	simplifiedText: string;
	level: SimplificationLevel;
}

export interface WordInfoResponse extends WordInfo {
	word: string;
	originalWord: string;
}

export type TranslationCache = LruCache<string, string>;

export interface TextAssistServiceOptions {
	client: LlmClient;
	credentials: CredentialResolver;
	sessions: SessionRegistry;
	translationCache: TranslationCache;
	usageRecorder?: UsageRecorder | null;
	now?: () => number;
}

export function createTranslationCacheKey(text: string, targetLanguage: string): string {
	return createHash("sha256").update(`${text}|${targetLanguage}`, "utf8").digest("hex");
}

export function cleanWord(word: string): string {
	return word.replace(WORD_PATTERN, "").trim();
}

/**
 * Keeps every array entry that is a valid task and drops the rest.
 */
export function parseGeneratedTasks(text: string): ComprehensionTask[] {
	const candidate = extractJsonBlock(text, "[", "]");
	if (!Array.isArray(candidate)) {
		return [];
	}

	const tasks: ComprehensionTask[] = [];
	for (const entry of candidate) {
		const parsed = ComprehensionTaskSchema.safeParse(entry);
		if (parsed.success) {
			tasks.push(parsed.data);
		}
	}
	return tasks;
}

/**
 * LLM-backed helpers for the reading view: raw completions, comprehension
 * tasks, translation, level simplification and word explanations.
 */
export class TextAssistService {
	private readonly client: LlmClient;
	private readonly credentials: CredentialResolver;
	private readonly sessions: SessionRegistry;
	private readonly translationCache: TranslationCache;
	private readonly usageRecorder: UsageRecorder | null;
	private readonly now: () => number;

	constructor(options: TextAssistServiceOptions) {
		this.client = options.client;
		this.credentials = options.credentials;
		this.sessions = options.sessions;
		this.translationCache = options.translationCache;
		this.usageRecorder = options.usageRecorder ?? null;
		this.now = options.now ?? Date.now;
	}

	async complete(request: CompletionRequest, authorization?: string): Promise<CompletionResponse> {
		const credential = this.credentials.resolveLlm(
			{ authorization, apiKey: request.apiKey, sessionCode: request.sessionCode },
			request.provider
		);

		// A model named for another provider would not exist on the session's one.
		const model = request.provider && request.provider !== credential.provider ? undefined : request.model;
		const result = await this.run("complete", credential, {
			prompt: request.prompt,
			system: request.system,
			model,
			temperature: request.temperature,
			maxTokens: request.maxTokens
		});

		return {
			provider: result.provider,
			model: result.model,
			text: result.text,
			response: result.response
		};
	}

	async generateTasks(
		request: GenerateTasksRequest,
		authorization?: string
	): Promise<{ tasks: ComprehensionTask[] }> {
		const credential = this.credentials.resolveLlm(
			{ authorization, apiKey: request.apiKey, sessionCode: request.sessionCode },
			request.provider
		);

		const result = await this.run("generate-tasks", credential, {
			prompt: buildTaskGenerationPrompt(request.text),
			temperature: TASK_TEMPERATURE,
			maxTokens: TASK_MAX_TOKENS
		});

		const tasks = parseGeneratedTasks(result.text);
		if (tasks.length === 0) {
			throw new TaskGenerationError(credential.provider, result.text);
		}

		return { tasks: tasks.slice(0, MAX_RELEASABLE_TASKS) };
	}

	async translate(request: TranslateRequest, authorization?: string): Promise<TranslationResponse> {
		if (request.targetLanguage === DEFAULT_LANGUAGE_CODE) {
			return { translatedText: request.text, cached: false };
		}

		const credential = this.credentials.resolveLlm(
			{ authorization, apiKey: request.apiKey, sessionCode: request.sessionCode },
			request.provider
		);

		return this.translateWith(credential, request.text, request.targetLanguage);
	}

	/**
	 * Translates a session's shared text with the teacher's registered key.
	 */
	async translateForSession(session: ClassroomSession, targetLanguage: string): Promise<string> {
		if (targetLanguage === DEFAULT_LANGUAGE_CODE) {
			return session.text;
		}

		const credential = this.credentials.resolveSessionLlm(session);
		const result = await this.translateWith(credential, session.text, targetLanguage);
		return result.translatedText;
	}

	async simplify(request: SimplifyTextRequest): Promise<SimplificationResponse> {
		const session = this.sessions.require(request.sessionCode);
		if (!session.simplificationEnabled) {
			throw new SimplificationDisabledError(session.code);
		}

		const credential = this.credentials.resolveSessionLlm(session);
		const result = await this.run("simplify-text", credential, {
			prompt: buildSimplificationPrompt(request.text, request.level),
			temperature: FACTUAL_TEMPERATURE
		});

		return {
			originalText: request.text,
			simplifiedText: result.text,
			level: request.level
		};
	}

	async wordInfo(request: WordInfoRequest): Promise<WordInfoResponse> {
		const word = cleanWord(request.word);
		if (!word) {
			throw new InvalidWordError(request.word);
		}

		const base: WordInfoResponse = { word, originalWord: request.word };
		// An unknown or expired session gets the same fallback as no session.
		const session = request.sessionCode ? this.sessions.get(request.sessionCode) : null;

		if (!session?.keys.aiKey) {
			return {
				...base,
				article: "",
				wordType: "",
				simpleExplanation: NO_AI_KEY_EXPLANATION
			};
		}

		const credential = this.credentials.resolveSessionLlm(session);
		const result = await this.run("word-info", credential, {
			prompt: buildWordInfoPrompt(word, request.targetLanguage || undefined),
			temperature: FACTUAL_TEMPERATURE,
			maxTokens: WORD_INFO_MAX_TOKENS
		});

		const parsed = WordInfoSchema.safeParse(extractJsonBlock(result.text, "{", "}"));
		return parsed.success ? { ...parsed.data, ...base } : base;
	}

	private async translateWith(
		credential: ResolvedLlmCredential,
		text: string,
		targetLanguage: string
	): Promise<TranslationResponse> {
		const cacheKey = createTranslationCacheKey(text, targetLanguage);
		const hit = this.translationCache.get(cacheKey);
		if (hit !== undefined) {
			await recordUsage(this.usageRecorder, {
				type: "proxy_request",
				endpoint: "translate",
				provider: credential.provider,
				credentialSource: credential.source,
				status: "success",
				cached: true,
				latencyMs: 0,
				timestamp: this.now()
			});
			return { translatedText: hit, cached: true };
		}

		const result = await this.run("translate", credential, {
			prompt: text,
			system: buildTranslationSystemPrompt(targetLanguage),
			temperature: FACTUAL_TEMPERATURE
		});

		this.translationCache.set(cacheKey, result.text);
		return { translatedText: result.text, cached: false };
	}

	private async run(
		endpoint: ProxyEndpoint,
		credential: ResolvedLlmCredential,
		input: Omit<LlmCompletionInput, "provider" | "apiKey">
	): Promise<LlmCompletionResult> {
		try {
			const result = await this.client.complete({
				...input,
				provider: credential.provider,
				apiKey: credential.apiKey
			});

			await recordUsage(this.usageRecorder, {
				type: "proxy_request",
				endpoint,
				provider: credential.provider,
				credentialSource: credential.source,
				status: "success",
				cached: false,
				latencyMs: result.latencyMs,
				timestamp: this.now()
			});

			return result;
		} catch (error) {
			await recordUsage(this.usageRecorder, {
				type: "proxy_request",
				endpoint,
				provider: credential.provider,
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
}
