// Dynamic node definition routes
import type { FastifyPluginAsync } from 'fastify';
import { DefinitionError, isRecord, type NodeLogicDefinition } from '@nodeflow/core';

export const definitionRoutes: FastifyPluginAsync = async (fastify) => {
  const definitions = fastify.definitions;

  /**
   * GET /api/v1/definitions - List definitions (normalized)
   */
  fastify.get('/v1/definitions', async () => {
    return { definitions: definitions.list() };
  });

  /**
   * PUT /api/v1/definitions/:name - Create or replace a definition and persist the file
   * Body: { inputs?, outputs?, logic, form?, description?, properties? }
   */
  fastify.put<{
    Params: { name: string };
  }>('/v1/definitions/:name', async (request, reply) => {
    const { name } = request.params;
    const body = request.body;

    if (!isRecord(body)) {
      return reply.status(400).send({ error: 'Request body must be a definition object' });
    }

    let definition: NodeLogicDefinition;
    try {
      definition = definitions.upsert({ ...body, name });
    } catch (error) {
      if (error instanceof DefinitionError) {
        return reply.status(400).send({ error: 'Invalid definition', message: error.message });
      }
      throw error;
    }

    await definitions.save();
    return { success: true, definition };
  });

  /**
   * DELETE /api/v1/definitions/:name - Remove a definition and persist the file
   */
  fastify.delete<{
    Params: { name: string };
  }>('/v1/definitions/:name', async (request, reply) => {
    const { name } = request.params;

    if (!definitions.remove(name)) {
      return reply.status(404).send({ error: `Definition not found: ${name}` });
    }

    await definitions.save();
    return { success: true, name };
  });
};
