import type { FastifyInstance } from "fastify";

export async function registerChannelRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/channels - all channels with status
  fastify.get("/api/channels", async (_request, reply) => {
    const channelManager = fastify.channelManager;
    if (!channelManager) {
      return reply.send([]);
    }
    return reply.send(channelManager.getChannelInfos());
  });

  // GET /api/channels/:id/status - single channel status
  fastify.get<{ Params: { id: string } }>("/api/channels/:id/status", async (request, reply) => {
    const info = fastify.channelManager?.getChannelInfo(request.params.id);
    if (!info) {
      return reply.code(404).send({ error: "Channel not found" });
    }
    return reply.send(info);
  });
}
