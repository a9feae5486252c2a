// Services plugin: node factory and definitions registry shared by every route
import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { DefinitionRegistry, NodeFactory, getLogger, type Logger } from '@nodeflow/core';

declare module 'fastify' {
  interface FastifyInstance {
    factory: NodeFactory;
    definitions: DefinitionRegistry;
    engineLog: Logger;
  }
}

export interface ServicesPluginOptions {
  definitionsPath: string;
  scriptTimeoutMs: number;
  logger: Logger;
}

/**
 * Loads the definitions file once at startup and decorates the instance with
 * the factory built over it.
 */
const servicesPlugin: FastifyPluginAsync<ServicesPluginOptions> = async (fastify, options) => {
  const definitions = new DefinitionRegistry({
    path: options.definitionsPath,
    logger: getLogger('definitions', options.logger),
  });
  await definitions.load();

  const factory = new NodeFactory({
    definitions,
    logger: getLogger('factory', options.logger),
    scriptTimeoutMs: options.scriptTimeoutMs,
  });

  fastify.decorate('definitions', definitions);
  fastify.decorate('factory', factory);
  fastify.decorate('engineLog', options.logger);

  fastify.log.info({ definitions: definitions.size, path: definitions.path }, 'Node definitions loaded');
};

export const services = fp(servicesPlugin, {
  name: 'nodeflow-services',
  fastify: '5.x',
});
