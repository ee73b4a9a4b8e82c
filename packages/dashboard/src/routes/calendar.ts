/**
 * Calendar Routes
 *
 * The current artifact as rendered from the store, and a manual
 * re-publish for when the remote was unreachable.
 */

import type { FastifyInstance } from "fastify";
import { renderCalendar } from "@cabin-calendar/core";
import { errorBody, httpStatusFor, sendResult } from "./errors.js";

export async function registerCalendarRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /calendar.ics - same bytes the publisher would push right now
  fastify.get("/calendar.ics", async (_request, reply) => {
    try {
      const list = await fastify.coordinator.list();
      const ics = renderCalendar(list, { stamp: fastify.clock(), calendarName: fastify.calendarName });
      return reply.type("text/calendar; charset=utf-8").send(ics);
    } catch (err) {
      return reply.code(httpStatusFor(err)).send(errorBody(err));
    }
  });

  // POST /api/publish/sync - re-render and push anything pending
  fastify.post("/api/publish/sync", async (_request, reply) => {
    const result = await fastify.coordinator.sync();
    return sendResult(reply, result);
  });
}
