import Fastify, { type FastifyInstance } from "fastify";
import fastifyStatic from "@fastify/static";
import { fileURLToPath } from "node:url";
import type { Clock, OperationCoordinator } from "@cabin-calendar/core";
import { isBookingError, systemClock } from "@cabin-calendar/core";
import { errorBody, httpStatusFor } from "./routes/errors.js";
import { registerReservationRoutes } from "./routes/reservations.js";
import { registerCalendarRoutes } from "./routes/calendar.js";
import { registerChannelRoutes } from "./routes/channels.js";
import { registerChatRoutes } from "./routes/chat.js";
import type { ChannelManager } from "./channels/index.js";
import type { OperatorConsole } from "./operator/operator-console.js";

export interface ServerOptions {
  coordinator: OperationCoordinator;
  operatorConsole: OperatorConsole;
  channelManager?: ChannelManager | null;
  calendarName?: string;
  clock?: Clock;
  /** pino level for the request logger; false disables it */
  logLevel?: string | false;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    coordinator: OperationCoordinator;
    operatorConsole: OperatorConsole;
    channelManager: ChannelManager | null;
    calendarName: string | undefined;
    clock: Clock;
  }
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const logLevel = options.logLevel ?? "info";
  const fastify = Fastify({
    logger:
      logLevel === false
        ? false
        : {
            level: logLevel,
            transport: {
              target: "pino-pretty",
              options: {
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            },
          },
  });

  // Serve the web UI from public/
  const publicDir = fileURLToPath(new URL("../public", import.meta.url));
  await fastify.register(fastifyStatic, {
    root: publicDir,
    prefix: "/",
  });

  fastify.decorate("coordinator", options.coordinator);
  fastify.decorate("operatorConsole", options.operatorConsole);
  fastify.decorate("channelManager", options.channelManager ?? null);
  fastify.decorate("calendarName", options.calendarName);
  fastify.decorate("clock", options.clock ?? systemClock);

  // Booking errors thrown by readers (a corrupt store) keep their kind
  fastify.setErrorHandler((err, request, reply) => {
    if (isBookingError(err)) {
      request.log.warn({ kind: err.kind, err: err.message }, "Request failed");
      return reply.code(httpStatusFor(err)).send(errorBody(err));
    }
    request.log.error({ err }, "Unhandled request error");
    return reply.code(err.statusCode ?? 500).send({ error: err.message });
  });

  await registerReservationRoutes(fastify);
  await registerCalendarRoutes(fastify);
  await registerChatRoutes(fastify);
  await registerChannelRoutes(fastify);

  // GET /api/health - liveness plus a glance at the store and channels
  fastify.get("/api/health", async (_request, reply) => {
    try {
      const list = await fastify.coordinator.list();
      return reply.send({
        status: "ok",
        reservations: list.length,
        channels: fastify.channelManager?.getChannelInfos().map((c) => ({ id: c.id, status: c.status })) ?? [],
      });
    } catch (err) {
      return reply.code(503).send({
        status: "degraded",
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return fastify;
}
