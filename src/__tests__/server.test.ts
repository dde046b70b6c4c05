import { describe, it, expect } from 'vitest';
import { buildToolHost } from '../server.js';
import { ToolRegistry } from '../services/tools/registry.js';

describe('Tool host server', () => {
  it('should report health with the host name', async () => {
    const server = await buildToolHost({ name: 'keynote', registry: new ToolRegistry(), logger: false });

    const response = await server.inject({ method: 'GET', url: '/v1/health' });
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(body.status).toBe('ok');
    expect(body.host).toBe('keynote');
    expect(typeof body.timestamp).toBe('string');

    await server.close();
  });

  it('should serve the registry under /v1', async () => {
    const registry = new ToolRegistry();
    registry.register({
      name: 'noop',
      description: 'Does nothing',
      parameters: [],
      execute: async () => ({ success: true, content: 'nothing done' }),
    });
    const server = await buildToolHost({ name: 'test', registry, logger: false });

    const response = await server.inject({ method: 'POST', url: '/v1/tools/noop/invoke', payload: { arguments: {} } });

    expect(JSON.parse(response.body)).toEqual({ tool: 'noop', success: true, content: 'nothing done' });
    await server.close();
  });
});
