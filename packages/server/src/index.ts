// @nodeflow/server - Fastify HTTP surface over the pipeline engine
import 'dotenv/config';
import { createServer } from './app.js';
import { loadServerConfig } from './config.js';

export { createServer } from './app.js';
export { loadServerConfig, type ServerConfig } from './config.js';

async function main() {
  const config = loadServerConfig();
  const app = await createServer(config);

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
