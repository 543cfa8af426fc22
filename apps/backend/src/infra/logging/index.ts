export {
	UsageLogger,
	createUsageLogger,
	extractHostname,
	recordUsage,
	sanitizeUsageEvent,
	USAGE_EVENTS_FILE_NAME
} from "./usage-logger.js";

export type {
	CredentialSource,
	ProxyEndpoint,
	ProxyRequestUsageEvent,
	SessionCreatedUsageEvent,
	SessionEndedUsageEvent,
	SessionExpiredUsageEvent,
	UsageEvent,
	UsageLoggerOptions,
	UsageLogWriter,
	UsageRecorder
} from "./usage-logger.js";

export { createLoggerOptions, REDACTED_PATHS } from "./request-logger.js";
