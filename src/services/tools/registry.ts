// Tool Registry - the operation catalog of one tool host
// Tools are registered at startup; order of registration is the advertised order

import type {
  InvocationResult,
  ToolDefinition,
  ToolDescriptor,
  ToolParameter,
} from './types.js';
import { validateArguments } from './schema.js';
import { errorMessage } from '../../utils/errors.js';
import { componentLogger } from '../../utils/logger.js';

const log = componentLogger('tool-registry');

export type FunctionParameterSchema = {
  type: 'object';
  properties: Record<string, { type: 'string' | 'integer'; description: string }>;
  required: string[];
};

export interface FunctionDef {
  name: string;
  description: string;
  parameters: FunctionParameterSchema;
}

export function parametersToSchema(params: ToolParameter[]): FunctionParameterSchema {
  const properties: FunctionParameterSchema['properties'] = {};

  for (const param of params) {
    properties[param.name] = {
      type: param.type,
      description: param.description,
    };
  }

  return {
    type: 'object',
    properties,
    required: params.map(p => p.name),
  };
}

export function describeTool(tool: ToolDescriptor): FunctionDef {
  return {
    name: tool.name,
    description: tool.description,
    parameters: parametersToSchema(tool.parameters),
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  toDescriptors(): ToolDescriptor[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters.map(p => ({ ...p })),
    }));
  }

  toFunctionDefs(): FunctionDef[] {
    return this.toDescriptors().map(describeTool);
  }

  /**
   * Validates and runs one operation. Never throws: bad arguments and
   * handler exceptions both come back as failure results.
   */
  async invoke(name: string, input: unknown): Promise<InvocationResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { tool: name, success: false, content: `Error: Unknown tool "${name}"` };
    }

    const check = validateArguments(tool.parameters, input);
    if (!check.ok) {
      log.warn({ tool: name, error: check.error }, 'Rejected invalid arguments');
      return { tool: name, success: false, content: `Error: Invalid arguments for ${name}: ${check.error}` };
    }

    const startedAt = Date.now();
    try {
      const result = await tool.execute(check.args);
      log.info({ tool: name, success: result.success, durationMs: Date.now() - startedAt }, 'Tool executed');
      return { tool: name, ...result };
    } catch (error) {
      log.error({ tool: name, err: error }, 'Tool threw');
      return { tool: name, success: false, content: `Error: ${errorMessage(error)}` };
    }
  }
}
