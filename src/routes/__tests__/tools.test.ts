import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import Fastify from 'fastify';
import { toolRoutes } from '../tools.js';
import { ToolRegistry } from '../../services/tools/registry.js';

describe('Tool Routes', () => {
  const app = Fastify();
  const registry = new ToolRegistry();
  const execute = vi.fn(async (args: Record<string, string | number>) => ({
    success: true,
    content: `Added ${Number(args.a) + Number(args.b)}`,
  }));

  registry.register({
    name: 'add',
    description: 'Adds two integers',
    parameters: [
      { name: 'a', type: 'integer', description: 'First', min: 0, max: 100 },
      { name: 'b', type: 'integer', description: 'Second', min: 0, max: 100 },
    ],
    execute,
  });

  beforeAll(async () => {
    await app.register(toolRoutes, { prefix: '/v1', registry });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /v1/tools', () => {
    it('should list tool descriptors', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/tools' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        tools: [{
          name: 'add',
          description: 'Adds two integers',
          parameters: [
            { name: 'a', type: 'integer', description: 'First', min: 0, max: 100 },
            { name: 'b', type: 'integer', description: 'Second', min: 0, max: 100 },
          ],
        }],
      });
    });
  });

  describe('POST /v1/tools/:name/invoke', () => {
    it('should invoke the tool', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/tools/add/invoke',
        payload: { arguments: { a: 2, b: 3 } },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ tool: 'add', success: true, content: 'Added 5' });
    });

    it('should return a failure result for out-of-range arguments', async () => {
      execute.mockClear();
      const response = await app.inject({
        method: 'POST',
        url: '/v1/tools/add/invoke',
        payload: { arguments: { a: 2, b: 300 } },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        tool: 'add',
        success: false,
        content: 'Error: Invalid arguments for add: b: b must be <= 100',
      });
      expect(execute).not.toHaveBeenCalled();
    });

    it('should return 404 for an unknown tool', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/tools/subtract/invoke',
        payload: { arguments: {} },
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        error: 'not_found',
        message: 'Tool "subtract" not found',
        statusCode: 404,
      });
    });

    it('should reject a body without arguments', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/tools/add/invoke',
        payload: { a: 2, b: 3 },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('validation_error');
    });
  });
});
