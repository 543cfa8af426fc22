import {
  CreateSessionPayloadSchema,
  SessionCodePayloadSchema,
  SessionCodeSchema,
  SetTextPayloadSchema
} from "@read-along/shared/relay";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import type { CacheStats } from "../../infra/cache/lru-cache.js";
import type { RelayHub } from "../../services/relay/relay-hub.js";
import { SessionNotFoundError, type SessionRegistry } from "../../services/sessions/session-registry.js";
import { sendError } from "../errors.js";

export interface SessionRoutesOptions {
  sessions: SessionRegistry;
  relay: RelayHub;
  cacheStats: () => { ttsCache: CacheStats; translationCache: CacheStats };
  startedAt?: number;
  now?: () => number;
}

type CodeParams = { Params: { code: string } };

export function registerSessionRoutes(app: FastifyInstance, options: SessionRoutesOptions): void {
  const { sessions, relay } = options;
  const now = options.now ?? Date.now;
  const startedAt = options.startedAt ?? now();

  app.post("/api/session/create", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = CreateSessionPayloadSchema.parse(request.body);
      const created = relay.createSession(body, null, "http");

      return reply.code(201).send({
        success: true,
        code: created.code,
        expiresAt: created.expiresAt
      });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post("/api/session/join", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const { code } = SessionCodePayloadSchema.parse(request.body);
      const session = sessions.require(code);

      return reply.code(200).send({
        success: true,
        code: session.code,
        studentCount: session.students.size
      });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post("/api/session/end", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const { code } = SessionCodePayloadSchema.parse(request.body);
      if (!relay.endSession(code)) {
        throw new SessionNotFoundError(code);
      }

      return reply.code(200).send({ success: true });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.get("/api/session/status/:code", async (request: FastifyRequest<CodeParams>, reply: FastifyReply) => {
    try {
      const session = sessions.require(SessionCodeSchema.parse(request.params.code));

      return reply.code(200).send({
        success: true,
        code: session.code,
        studentCount: session.students.size,
        createdAt: session.createdAt.toISOString(),
        expiresAt: session.expiresAt.toISOString(),
        hasText: session.text.length > 0,
        hasTeacher: session.teacherConnectionId !== null
      });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  // Student modules read this; it must never expose the keys themselves.
  app.get("/api/session/settings/:code", async (request: FastifyRequest<CodeParams>, reply: FastifyReply) => {
    try {
      const session = sessions.require(SessionCodeSchema.parse(request.params.code));

      return reply.code(200).send({
        success: true,
        code: session.code,
        sttProvider: session.keys.sttProvider,
        voiceId: session.keys.voiceId,
        hasElevenlabs: session.keys.elevenlabsKey.length > 0,
        hasAi: session.keys.aiKey !== null,
        settings: session.settings,
        simplificationEnabled: session.simplificationEnabled
      });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.post("/api/session/set-text", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const { code, text } = SetTextPayloadSchema.parse(request.body);
      if (!relay.updateText(code, text)) {
        throw new SessionNotFoundError(code);
      }

      return reply.code(200).send({ success: true });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.get("/api/session/get-text/:code", async (request: FastifyRequest<CodeParams>, reply: FastifyReply) => {
    try {
      const session = sessions.require(SessionCodeSchema.parse(request.params.code));
      return reply.code(200).send({ success: true, text: session.text });
    } catch (error: unknown) {
      return sendError(reply, error);
    }
  });

  app.get("/api/health", async (_request: FastifyRequest, reply: FastifyReply) => {
    sessions.sweepExpired();
    return reply.code(200).send({
      status: "ok",
      activeSessions: sessions.size,
      uptimeSeconds: Math.max(0, Math.floor((now() - startedAt) / 1000))
    });
  });

  app.get("/api/cache-stats", async (_request: FastifyRequest, reply: FastifyReply) => {
    sessions.sweepExpired();
    const stats = options.cacheStats();
    return reply.code(200).send({
      ttsCache: stats.ttsCache,
      translationCache: stats.translationCache,
      activeSessions: sessions.size
    });
  });
}
