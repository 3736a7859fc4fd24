// Household spending agent API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './server.js';
import { env, logConfiguration } from './env.js';
import { logger } from './utils/logger.js';
import { createDefaultAgentServices } from './services/agent.js';

const server = await buildServer({ services: createDefaultAgentServices(logger) });

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  logger.info(`Spending agent listening on http://${env.HOST}:${env.PORT}`);
  logConfiguration(message => logger.info(message));
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
