// Tool channel - how an orchestrator reaches its tool host
// Contract: operation name + typed arguments in, textual result out

import { z } from 'zod';
import type { InvocationResult, ToolArguments, ToolDescriptor } from '../tools/types.js';
import { AppError, errorMessage } from '../../utils/errors.js';

export interface ToolChannel {
  listTools(): Promise<ToolDescriptor[]>;
  callTool(name: string, args: ToolArguments): Promise<InvocationResult>;
}

const ToolParameterSchema = z.object({
  name: z.string(),
  type: z.enum(['string', 'integer']),
  description: z.string(),
  min: z.number().optional(),
  max: z.number().optional(),
});

const ToolListSchema = z.object({
  tools: z.array(z.object({
    name: z.string(),
    description: z.string(),
    parameters: z.array(ToolParameterSchema),
  })),
});

const InvocationResultSchema = z.object({
  tool: z.string(),
  success: z.boolean(),
  content: z.string(),
});

const ErrorBodySchema = z.object({ message: z.string() });

export class HttpToolChannel implements ToolChannel {
  private baseUrl: string;

  constructor(baseUrl: string, private fetchImpl: typeof fetch = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  private async request(path: string, init?: RequestInit): Promise<unknown> {
    const fetchImpl = this.fetchImpl;
    let response: Response;
    try {
      response = await fetchImpl(`${this.baseUrl}${path}`, init);
    } catch (error) {
      throw AppError.externalCall(`Tool host unreachable at ${this.baseUrl}: ${errorMessage(error)}`);
    }

    const text = await response.text();
    let body: unknown = null;
    try {
      body = text ? JSON.parse(text) : null;
    } catch {
      body = null;
    }

    if (!response.ok) {
      const parsed = ErrorBodySchema.safeParse(body);
      const detail = parsed.success ? parsed.data.message : text;
      if (response.status === 404) {
        throw AppError.notFound(detail);
      }
      throw AppError.externalCall(`Tool host error ${response.status}: ${detail}`);
    }

    return body;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const body = await this.request('/v1/tools');
    const parsed = ToolListSchema.safeParse(body);
    if (!parsed.success) {
      throw AppError.externalCall('Tool host returned a malformed tool list');
    }
    return parsed.data.tools;
  }

  async callTool(name: string, args: ToolArguments): Promise<InvocationResult> {
    const body = await this.request(`/v1/tools/${encodeURIComponent(name)}/invoke`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ arguments: args }),
    });
    const parsed = InvocationResultSchema.safeParse(body);
    if (!parsed.success) {
      throw AppError.externalCall(`Tool host returned a malformed result for ${name}`);
    }
    return parsed.data;
  }
}
