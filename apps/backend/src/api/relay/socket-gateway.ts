import type { FastifyInstance } from "fastify";
import { Server, type Socket } from "socket.io";

import {
  RELAY_INBOUND_EVENTS,
  RelayHub,
  type RelayHubOptions
} from "../../services/relay/relay-hub.js";

export interface SocketGatewayOptions extends Omit<RelayHubOptions, "deliver" | "logger"> {
  corsOrigin: string;
}

export interface SocketGateway {
  io: Server;
  relay: RelayHub;
}

function parseCorsOrigin(value: string): string | string[] {
  if (value === "*") {
    return value;
  }
  const origins = value.split(",").map((origin) => origin.trim()).filter(Boolean);
  return origins.length === 1 ? origins[0] ?? value : origins;
}

/**
 * Attaches Socket.IO to the Fastify HTTP server and routes every relay event
 * into a RelayHub. Each socket is addressed through its own id room.
 */
export function attachSocketGateway(app: FastifyInstance, options: SocketGatewayOptions): SocketGateway {
  const io = new Server(app.server, {
    cors: { origin: parseCorsOrigin(options.corsOrigin) },
    serveClient: false
  });

  const relay = new RelayHub({
    ...options,
    logger: app.log,
    deliver: (connectionId, event, payload) => {
      io.to(connectionId).emit(event, payload);
    }
  });

  io.on("connection", (socket: Socket) => {
    app.log.debug({ socketId: socket.id }, "Relay client connected");

    for (const event of RELAY_INBOUND_EVENTS) {
      socket.on(event, (payload: unknown) => {
        relay.handle(socket.id, event, payload).catch((error: unknown) => {
          app.log.error({ err: error, event, socketId: socket.id }, "Relay handler failed");
          socket.emit("session_error", { error: "Internal relay error" });
        });
      });
    }

    socket.on("disconnect", (reason) => {
      app.log.debug({ socketId: socket.id, reason }, "Relay client disconnected");
      relay.disconnect(socket.id);
    });
  });

  // Open websockets would otherwise hold the HTTP server open during close.
  app.addHook("preClose", async () => {
    io.disconnectSockets(true);
    io.engine.close();
  });

  app.addHook("onClose", async () => {
    relay.close();
  });

  return { io, relay };
}
