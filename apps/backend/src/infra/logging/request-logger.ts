import type { FastifyServerOptions } from "fastify";

// Credential-bearing headers and body fields never reach the request log.
export const REDACTED_PATHS = [
	"req.headers.authorization",
	'req.headers["xi-api-key"]',
	'req.headers["x-api-key"]',
	'req.headers["x-goog-api-key"]',
	"apiKey",
	"elevenlabsKey",
	"aiKey",
	"*.apiKey",
	"*.elevenlabsKey",
	"*.aiKey"
];

export interface RequestLoggerOptions {
	level: string;
	/** Destination for log lines; defaults to stdout. */
	stream?: NodeJS.WritableStream;
}

export function createLoggerOptions(options: RequestLoggerOptions): FastifyServerOptions["logger"] {
	return {
		level: options.level,
		redact: {
			paths: REDACTED_PATHS,
			censor: "[redacted]"
		},
		...(options.stream ? { stream: options.stream } : {})
	};
}
