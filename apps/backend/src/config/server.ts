export interface ProviderBaseUrls {
  elevenlabs: string;
  openai: string;
  anthropic: string;
  google: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: string;
  sessionTimeoutHours: number;
  sessionCleanupIntervalSeconds: number;
  ttsCacheSize: number;
  translationCacheSize: number;
  proxyTimeoutMs: number;
  proxyMaxRetries: number;
  publicDir: string | null;
  usageLogDir: string | null;
  providerBaseUrls: ProviderBaseUrls;
}

const DEFAULT_PORT = 5000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_LOG_LEVEL = "info";
const DEFAULT_SESSION_TIMEOUT_HOURS = 3;
const DEFAULT_CLEANUP_INTERVAL_SECONDS = 300;
const DEFAULT_TTS_CACHE_SIZE = 500;
const DEFAULT_TRANSLATION_CACHE_SIZE = 1000;
const DEFAULT_PROXY_TIMEOUT_MS = 60_000;
const DEFAULT_PROXY_MAX_RETRIES = 1;

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const DEFAULT_PROVIDER_BASE_URLS: ProviderBaseUrls = Object.freeze({
  elevenlabs: "https://api.elevenlabs.io",
  openai: "https://api.openai.com",
  anthropic: "https://api.anthropic.com",
  google: "https://generativelanguage.googleapis.com"
});

function parseNumber(envValue: string | undefined, fallback: number): number {
  if (!envValue) {
    return fallback;
  }

  const parsed = Number(envValue);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Zero is a meaningful retry count, so it gets its own parser.
function parseCount(envValue: string | undefined, fallback: number): number {
  if (!envValue) {
    return fallback;
  }

  const parsed = Number.parseInt(envValue, 10);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseBaseUrl(envValue: string | undefined, fallback: string): string {
  const trimmed = envValue?.trim();
  if (!trimmed) {
    return fallback;
  }

  try {
    return new URL(trimmed).toString().replace(/\/+$/, "");
  } catch {
    return fallback;
  }
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() ?? "";

  return {
    port: parseNumber(env.PORT, DEFAULT_PORT),
    host: env.HOST?.trim() || DEFAULT_HOST,
    logLevel: LOG_LEVELS.has(logLevel) ? logLevel : DEFAULT_LOG_LEVEL,
    corsOrigin: env.CORS_ORIGIN?.trim() || "*",
    sessionTimeoutHours: parseNumber(env.SESSION_TIMEOUT_HOURS, DEFAULT_SESSION_TIMEOUT_HOURS),
    sessionCleanupIntervalSeconds: parseNumber(
      env.SESSION_CLEANUP_INTERVAL_SECONDS,
      DEFAULT_CLEANUP_INTERVAL_SECONDS
    ),
    ttsCacheSize: parseNumber(env.TTS_CACHE_SIZE, DEFAULT_TTS_CACHE_SIZE),
    translationCacheSize: parseNumber(env.TRANSLATION_CACHE_SIZE, DEFAULT_TRANSLATION_CACHE_SIZE),
    proxyTimeoutMs: parseNumber(env.PROXY_TIMEOUT_MS, DEFAULT_PROXY_TIMEOUT_MS),
    proxyMaxRetries: parseCount(env.PROXY_MAX_RETRIES, DEFAULT_PROXY_MAX_RETRIES),
    publicDir: env.PUBLIC_DIR?.trim() || null,
    usageLogDir: env.USAGE_LOG_DIR?.trim() || null,
    providerBaseUrls: {
      elevenlabs: parseBaseUrl(env.ELEVENLABS_BASE_URL, DEFAULT_PROVIDER_BASE_URLS.elevenlabs),
      openai: parseBaseUrl(env.OPENAI_BASE_URL, DEFAULT_PROVIDER_BASE_URLS.openai),
      anthropic: parseBaseUrl(env.ANTHROPIC_BASE_URL, DEFAULT_PROVIDER_BASE_URLS.anthropic),
      google: parseBaseUrl(env.GOOGLE_AI_BASE_URL, DEFAULT_PROVIDER_BASE_URLS.google)
    }
  };
}
