import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { upcomingReservations } from "@cabin-calendar/core";
import { sendResult } from "./errors.js";

const draftSchema = z
  .object({
    guestName: z.string(),
    checkInDate: z.string(),
    totalNights: z.number(),
    totalPrice: z.number(),
    cabin: z.string(),
    deposit: z.number().optional(),
    phone: z.string().optional(),
    notes: z.string().optional(),
  })
  .strict();

const patchSchema = draftSchema.partial().strict();

function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`).join("; ");
}

export async function registerReservationRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/reservations - all records, store order
  fastify.get("/api/reservations", async () => {
    return fastify.coordinator.list();
  });

  // GET /api/reservations/upcoming - not yet checked out, soonest first
  fastify.get("/api/reservations/upcoming", async () => {
    const list = await fastify.coordinator.list();
    return upcomingReservations(list, fastify.clock());
  });

  // POST /api/reservations - create
  fastify.post("/api/reservations", async (request, reply) => {
    const parsed = draftSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: `Invalid reservation: ${issuesOf(parsed.error)}` });
    }
    const result = await fastify.coordinator.create(parsed.data);
    return sendResult(reply, result, 201);
  });

  // PATCH /api/reservations/:guestName - modify
  fastify.patch<{ Params: { guestName: string } }>(
    "/api/reservations/:guestName",
    async (request, reply) => {
      const parsed = patchSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: `Invalid changes: ${issuesOf(parsed.error)}` });
      }
      if (Object.keys(parsed.data).length === 0) {
        return reply.code(400).send({ error: "No changes given" });
      }
      const result = await fastify.coordinator.modify(request.params.guestName, parsed.data);
      return sendResult(reply, result);
    },
  );

  // DELETE /api/reservations/:guestName
  fastify.delete<{ Params: { guestName: string } }>(
    "/api/reservations/:guestName",
    async (request, reply) => {
      const result = await fastify.coordinator.delete(request.params.guestName);
      return sendResult(reply, result);
    },
  );
}
