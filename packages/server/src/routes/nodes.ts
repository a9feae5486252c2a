// Node catalog routes for the canvas palette
import type { FastifyPluginAsync } from 'fastify';

export const nodeRoutes: FastifyPluginAsync = async (fastify) => {
  // All node types with metadata
  fastify.get('/v1/nodes', async () => {
    return { nodes: fastify.factory.describeAll() };
  });

  // Single node type
  fastify.get<{ Params: { type: string } }>('/v1/nodes/:type', async (request, reply) => {
    const meta = fastify.factory.describe(request.params.type);
    if (!meta) {
      return reply.status(404).send({ error: `Unknown node type: ${request.params.type}` });
    }
    return meta;
  });
};
