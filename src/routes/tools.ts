// Tool routes - the local request/response channel of a tool host
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ToolRegistry } from '../services/tools/registry.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const InvokeBodySchema = z.object({
  arguments: z.record(z.unknown()),
});

export interface ToolRoutesOptions {
  registry: ToolRegistry;
}

export async function toolRoutes(server: FastifyInstance, options: ToolRoutesOptions) {
  const { registry } = options;

  // GET /v1/tools - Operation descriptors in registration order
  server.get('/tools', async () => {
    return { tools: registry.toDescriptors() };
  });

  // POST /v1/tools/:name/invoke - Run one operation; failures are results, not errors
  server.post<{ Params: { name: string } }>('/tools/:name/invoke', async (request, reply) => {
    const { name } = request.params;

    if (!registry.has(name)) {
      return reply.code(404).send(formatErrorResponse(AppError.notFound(`Tool "${name}" not found`)));
    }

    const parsed = InvokeBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(
        formatErrorResponse(AppError.validationError('Body must be an object with an "arguments" object')),
      );
    }

    request.log.info({ tool: name, arguments: parsed.data.arguments }, 'Invoking tool');
    const result = await registry.invoke(name, parsed.data.arguments);
    request.log.info({ tool: name, success: result.success }, 'Tool finished');

    return result;
  });
}
