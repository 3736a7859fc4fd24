// Agent routes
// POST /v1/agent/ask runs one question-answering session

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AgentServices } from '../services/agent.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const AskRequestSchema = z.object({
  question: z.string().trim().min(1).max(2000),
  mode: z.enum(['react', 'baseline']).default('react'),
  max_iterations: z.number().int().min(1).max(20).optional(),
});

export interface AgentRouteOptions {
  services: AgentServices;
}

export const agentRoutes: FastifyPluginAsync<AgentRouteOptions> = async (server, { services }) => {
  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      request.log.warn({ err: error }, 'Agent request failed');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      const badRequest = AppError.badRequest(error.message);
      return reply.code(badRequest.statusCode).send(formatErrorResponse(badRequest));
    }

    request.log.error({ err: error }, 'Unhandled agent error');
    const internal = AppError.internal();
    return reply.code(internal.statusCode).send(formatErrorResponse(internal));
  });

  // POST /v1/agent/ask - Answer a spending question
  server.post('/agent/ask', async (request, reply) => {
    const parsed = AskRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.flatten());
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    const { question, mode, max_iterations } = parsed.data;

    if (mode === 'baseline') {
      return services.baseline.run(question);
    }

    const agent = services.createReactAgent(max_iterations);
    return agent.run(question);
  });

  // GET /v1/agent/tools - Tools the agent may call
  server.get('/agent/tools', async () => {
    return {
      model: services.model.label,
      tools: services.registry.list().map(tool => ({
        name: tool.name,
        aliases: tool.aliases,
        description: tool.description,
        parameters: tool.parameters.map(p => ({
          name: p.name,
          description: p.description,
          required: p.default === undefined,
          ...(p.default !== undefined ? { default: p.default } : {}),
        })),
      })),
    };
  });
};
