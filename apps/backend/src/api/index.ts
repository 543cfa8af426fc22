import fastifyStatic from "@fastify/static";
import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import path from "node:path";
import type { Server } from "socket.io";

import { loadServerConfig, type ServerConfig } from "../config/server.js";
import { LruCache } from "../infra/cache/lru-cache.js";
import { createHttpFetch } from "../infra/http/http-fetch.js";
import {
  createLoggerOptions,
  createUsageLogger,
  type UsageRecorder
} from "../infra/logging/index.js";
import { ElevenLabsClient } from "../services/providers/elevenlabs.client.js";
import { LlmClient } from "../services/providers/llm.client.js";
import { ProviderTransport } from "../services/providers/provider-transport.js";
import { CredentialResolver } from "../services/proxy/credentials.js";
import { SpeechProxyService } from "../services/proxy/speech-proxy.service.js";
import { TextAssistService } from "../services/proxy/text-assist.service.js";
import type { RelayHub } from "../services/relay/relay-hub.js";
import { SessionRegistry } from "../services/sessions/session-registry.js";
import { registerErrorHandling } from "./errors.js";
import { registerProxyRoutes } from "./proxy/routes.js";
import { attachSocketGateway } from "./relay/socket-gateway.js";
import { registerSessionRoutes } from "./sessions/routes.js";

export interface ReadAlongAppOptions {
  /** Overrides applied on top of the environment-derived config. */
  config?: Partial<ServerConfig>;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  /** `null` disables usage logging even when USAGE_LOG_DIR is set. */
  usageRecorder?: UsageRecorder | null;
  logStream?: NodeJS.WritableStream;
  now?: () => number;
  random?: () => number;
  retryDelayMs?: number;
}

export interface ReadAlongApp {
  app: FastifyInstance;
  io: Server;
  relay: RelayHub;
  sessions: SessionRegistry;
  config: ServerConfig;
}

function resolveUsageRecorder(options: ReadAlongAppOptions, config: ServerConfig): UsageRecorder | null {
  if (options.usageRecorder !== undefined) {
    return options.usageRecorder;
  }
  return config.usageLogDir ? createUsageLogger({ logDirectory: config.usageLogDir }) : null;
}

export async function createReadAlongApp(options: ReadAlongAppOptions = {}): Promise<ReadAlongApp> {
  const config: ServerConfig = { ...loadServerConfig(options.env), ...options.config };
  const now = options.now ?? Date.now;
  const usageRecorder = resolveUsageRecorder(options, config);

  const app = Fastify({
    logger: createLoggerOptions({ level: config.logLevel, stream: options.logStream })
  });
  registerErrorHandling(app);

  const sessions = new SessionRegistry({
    timeoutMs: config.sessionTimeoutHours * 60 * 60 * 1000,
    now,
    random: options.random
  });

  const transport = new ProviderTransport({
    fetchImpl: options.fetchImpl ?? createHttpFetch(),
    timeoutMs: config.proxyTimeoutMs,
    maxRetries: config.proxyMaxRetries,
    retryDelayMs: options.retryDelayMs
  });
  const credentials = new CredentialResolver(sessions);
  const ttsCache = new LruCache<string, Record<string, unknown>>(Math.max(1, Math.floor(config.ttsCacheSize)));
  const translationCache = new LruCache<string, string>(Math.max(1, Math.floor(config.translationCacheSize)));

  const speechProxy = new SpeechProxyService({
    client: new ElevenLabsClient({ transport, baseUrl: config.providerBaseUrls.elevenlabs }),
    credentials,
    cache: ttsCache,
    usageRecorder,
    now
  });
  const textAssist = new TextAssistService({
    client: new LlmClient({ transport, baseUrls: config.providerBaseUrls }),
    credentials,
    sessions,
    translationCache,
    usageRecorder,
    now
  });

  const { io, relay } = attachSocketGateway(app, {
    corsOrigin: config.corsOrigin,
    sessions,
    translator: textAssist,
    usageRecorder,
    now
  });

  registerProxyRoutes(app, { speechProxy, textAssist });
  registerSessionRoutes(app, {
    sessions,
    relay,
    now,
    cacheStats: () => ({
      ttsCache: ttsCache.stats(),
      translationCache: translationCache.stats()
    })
  });

  if (config.publicDir) {
    await app.register(fastifyStatic, {
      root: path.resolve(config.publicDir),
      prefix: "/"
    });
  }

  sessions.startSweep(config.sessionCleanupIntervalSeconds * 1000);
  app.addHook("onClose", async () => {
    sessions.stopSweep();
  });

  return { app, io, relay, sessions, config };
}
