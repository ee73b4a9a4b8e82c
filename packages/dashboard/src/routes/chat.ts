import type { FastifyInstance } from "fastify";
import { rejectKind } from "@cabin-calendar/core";
import { z } from "zod";

const chatSchema = z.object({ text: z.string() });

export async function registerChatRoutes(fastify: FastifyInstance): Promise<void> {
  // POST /api/chat - the web UI's operator console
  fastify.post("/api/chat", async (request, reply) => {
    const parsed = chatSchema.safeParse(request.body);
    if (!parsed.success || !parsed.data.text.trim()) {
      return reply.code(400).send({ error: "Missing required field: text" });
    }

    const result = await fastify.operatorConsole.handle({ text: parsed.data.text, sender: "web" });
    const intent = result.intent;
    return reply.send({
      reply: result.text,
      intent: intent?.kind ?? null,
      rejected: intent?.kind === "reject" ? rejectKind(intent) : null,
      publication: result.result?.publication?.state ?? null,
    });
  });
}
