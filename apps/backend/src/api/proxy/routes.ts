import {
  CompletionRequestSchema,
  GenerateTasksRequestSchema,
  SimplifyTextRequestSchema,
  SpeechRequestSchema,
  TranslateRequestSchema,
  WordInfoRequestSchema
} from "@read-along/shared/proxy";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import type { SpeechProxyService } from "../../services/proxy/speech-proxy.service.js";
import type { TextAssistService } from "../../services/proxy/text-assist.service.js";
import { sendError } from "../errors.js";

export interface ProxyRoutesOptions {
  speechProxy: SpeechProxyService;
  textAssist: TextAssistService;
}

/**
 * Provider proxy endpoints. Keys arrive per request and are never stored.
 */
export function registerProxyRoutes(app: FastifyInstance, options: ProxyRoutesOptions): void {
  const { speechProxy, textAssist } = options;

  // POST /api/tts - ElevenLabs speech with word timestamps
  app.post("/api/tts", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = SpeechRequestSchema.parse(request.body);
      const result = await speechProxy.synthesize(body, request.headers.authorization);

      return reply
        .code(200)
        .header("x-cache", result.cached ? "HIT" : "MISS")
        .send(result.body);
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  // POST /api/llm/complete - raw chat completion
  app.post("/api/llm/complete", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = CompletionRequestSchema.parse(request.body);
      const result = await textAssist.complete(body, request.headers.authorization);
      return reply.code(200).send(result);
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  // POST /api/generate-tasks - comprehension tasks for a text
  app.post("/api/generate-tasks", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = GenerateTasksRequestSchema.parse(request.body);
      const result = await textAssist.generateTasks(body, request.headers.authorization);
      return reply.code(200).send(result);
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post("/api/translate", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = TranslateRequestSchema.parse(request.body);
      const result = await textAssist.translate(body, request.headers.authorization);
      return reply.code(200).send(result);
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  // POST /api/simplify-text - session key only, gated by the teacher's switch
  app.post("/api/simplify-text", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = SimplifyTextRequestSchema.parse(request.body);
      const result = await textAssist.simplify(body);
      return reply.code(200).send(result);
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post("/api/word-info", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = WordInfoRequestSchema.parse(request.body);
      const result = await textAssist.wordInfo(body);
      return reply.code(200).send(result);
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });
}
