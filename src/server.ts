// Tool host server
// Serves one tool registry over HTTP on the loopback interface

import Fastify from 'fastify';
import { toolRoutes } from './routes/tools.js';
import type { ToolRegistry } from './services/tools/registry.js';
import { loggerOptions } from './utils/logger.js';

export interface ToolHostOptions {
  name: string;
  registry: ToolRegistry;
  logger?: boolean;
}

export async function buildToolHost(options: ToolHostOptions) {
  const server = Fastify({
    logger: options.logger === false ? false : loggerOptions(),
  });

  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      host: options.name,
      timestamp: new Date().toISOString(),
    };
  });

  await server.register(toolRoutes, { prefix: '/v1', registry: options.registry });
  await server.ready();

  return server;
}

export type ToolHostServer = Awaited<ReturnType<typeof buildToolHost>>;

/** Listens and resolves to the base URL the orchestrator should use. */
export async function startToolHost(server: ToolHostServer, host: string, port: number): Promise<string> {
  await server.listen({ port, host });
  const address = server.server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  return `http://${host}:${boundPort}`;
}
