// Fastify application factory
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createLogger } from '@nodeflow/core';
import { loadServerConfig, type ServerConfig } from './config.js';
import { services } from './plugins/services.js';
import { nodeRoutes } from './routes/nodes.js';
import { pipelineRoutes } from './routes/pipelines.js';
import { definitionRoutes } from './routes/definitions.js';

export async function createServer(config: ServerConfig = loadServerConfig()): Promise<FastifyInstance> {
  const app = Fastify({ logger: { level: config.logLevel } });

  // Register plugins
  await app.register(cors, {
    origin: true,
    credentials: true,
  });
  await app.register(services, {
    definitionsPath: config.definitionsPath,
    scriptTimeoutMs: config.scriptTimeoutMs,
    logger: createLogger({ level: config.logLevel }),
  });

  // Register REST routes
  await app.register(nodeRoutes, { prefix: '/api' });
  await app.register(pipelineRoutes, { prefix: '/api' });
  await app.register(definitionRoutes, { prefix: '/api' });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  return app;
}
