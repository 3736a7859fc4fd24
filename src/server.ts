// Fastify application: CORS, health check and agent routes

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { loggerOptions } from './utils/logger.js';
import { agentRoutes } from './routes/agent.js';
import type { AgentServices } from './services/agent.js';

export interface ServerOptions {
  services: AgentServices;
  /** Request log level; false disables request logging (tests). */
  logLevel?: string | false;
}

export async function buildServer({ services, logLevel = env.LOG_LEVEL }: ServerOptions) {
  const server = Fastify({
    logger: logLevel === false ? false : loggerOptions(logLevel),
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      model: services.model.label,
    };
  });

  await server.register(agentRoutes, { prefix: '/v1', services });

  return server;
}
