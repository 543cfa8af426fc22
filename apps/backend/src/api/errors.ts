import type { FastifyError, FastifyInstance, FastifyReply } from "fastify";
import { ZodError } from "zod";

import { ProviderHttpError } from "../services/providers/provider-transport.js";

const STATUS_BY_CODE: Readonly<Record<string, number>> = Object.freeze({
  VALIDATION_ERROR: 400,
  INVALID_JSON: 400,
  INVALID_WORD: 400,
  MISSING_CREDENTIALS: 400,
  SIMPLIFICATION_DISABLED: 403,
  SESSION_NOT_FOUND: 404,
  UPSTREAM_INVALID_RESPONSE: 502,
  UPSTREAM_UNREACHABLE: 502,
  TASK_GENERATION_FAILED: 502,
  SESSION_CODE_EXHAUSTED: 503,
  UPSTREAM_TIMEOUT: 504
});

const JSON_BODY_ERROR_CODES = new Set(["FST_ERR_CTP_EMPTY_JSON_BODY", "FST_ERR_CTP_INVALID_JSON_BODY"]);

export interface ErrorEnvelope {
  success: false;
  error: string;
  message: string;
  timestamp: number;
  provider?: string;
  upstream?: unknown;
  details?: Array<{ path: string; message: string }>;
}

export interface ErrorResponse {
  statusCode: number;
  body: ErrorEnvelope;
}

export function errorEnvelope(error: string, message: string): ErrorEnvelope {
  return { success: false, error, message, timestamp: Date.now() };
}

function readCode(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

function isBodyParseError(error: unknown): boolean {
  if (error instanceof SyntaxError) {
    return true;
  }

  const code = readCode(error);
  return code !== null && JSON_BODY_ERROR_CODES.has(code);
}

export function formatZodIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ZodError) {
    const details = formatZodIssues(error);
    const first = details[0];
    return {
      statusCode: 400,
      body: {
        ...errorEnvelope(
          "VALIDATION_ERROR",
          first ? `${first.path || "body"}: ${first.message}` : "Request validation failed"
        ),
        details
      }
    };
  }

  if (error instanceof ProviderHttpError) {
    return {
      statusCode: error.status,
      body: {
        ...errorEnvelope(error.code, error.message),
        provider: error.provider,
        upstream: error.upstream
      }
    };
  }

  if (isBodyParseError(error)) {
    return {
      statusCode: 400,
      body: errorEnvelope("INVALID_JSON", "Request body is not valid JSON")
    };
  }

  const code = readCode(error);
  const message = error instanceof Error && error.message ? error.message : "Internal server error";
  if (code !== null) {
    const statusCode = STATUS_BY_CODE[code];
    if (statusCode !== undefined) {
      return { statusCode, body: errorEnvelope(code, message) };
    }
  }

  return { statusCode: 500, body: errorEnvelope("INTERNAL_ERROR", message) };
}

export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  const { statusCode, body } = toErrorResponse(error);
  if (statusCode >= 500 && body.error === "INTERNAL_ERROR") {
    reply.log.error({ err: error }, "Unhandled request error");
  }
  return reply.code(statusCode).send(body);
}

/**
 * Catches what never reaches a route handler, such as bodies that fail to parse.
 */
export function registerErrorHandling(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const clientStatus = error.statusCode;
    const response =
      clientStatus !== undefined && clientStatus >= 400 && clientStatus < 500 && !isBodyParseError(error)
        ? { statusCode: clientStatus, body: errorEnvelope(error.code || "BAD_REQUEST", error.message) }
        : toErrorResponse(error);

    if (response.statusCode >= 500) {
      reply.log.error({ err: error }, "Unhandled request error");
    }
    return reply.code(response.statusCode).send(response.body);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .code(404)
      .send(errorEnvelope("NOT_FOUND", `Route ${request.method} ${request.url} not found`));
  });
}
