// Decision Parser
// Maps a model answer onto validated tool call requests.
// Native function calls are preferred; text answers must use FUNCTION_CALL lines.

import type { ProviderResponse } from '../../providers/types.js';
import type { ToolArguments, ToolDescriptor, ToolParameter } from '../tools/types.js';
import { coercePositionalArguments, validateArguments } from '../tools/schema.js';
import { AppError } from '../../utils/errors.js';
import type { ToolCallRequest } from './types.js';

const FUNCTION_CALL_LINE = /^FUNCTION_CALL:\s*(.*)$/;
const CODE_FENCE_LINE = /^```[\w-]*$/;
const INTEGER_TEXT = /^-?\d+$/;

export interface TextFunctionCall {
  name: string;
  values: string[];
}

export function stripCodeFences(text: string): string {
  return text
    .split(/\r?\n/)
    .filter(line => !CODE_FENCE_LINE.test(line.trim()))
    .join('\n');
}

/**
 * Parses `FUNCTION_CALL: name|arg1|arg2` lines. Blank lines and markdown
 * fences are ignored; anything else is a model-output error.
 */
export function parseFunctionCallLines(text: string): TextFunctionCall[] {
  const calls: TextFunctionCall[] = [];

  for (const rawLine of stripCodeFences(text).split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const match = FUNCTION_CALL_LINE.exec(line);
    if (!match) {
      throw AppError.modelOutput(`Unexpected line in model answer: "${line}"`);
    }

    const [name, ...values] = match[1].split('|').map(part => part.trim());
    if (!name) {
      throw AppError.modelOutput(`FUNCTION_CALL line without an operation name: "${line}"`);
    }
    calls.push({ name, values });
  }

  return calls;
}

// Range checks belong to the host; the orchestrator only checks shape.
function shapeOnly(params: ToolParameter[]): ToolParameter[] {
  return params.map(({ name, type, description }) => ({ name, type, description }));
}

function findTool(catalog: ToolDescriptor[], name: string): ToolDescriptor {
  const tool = catalog.find(t => t.name === name);
  if (!tool) {
    throw AppError.modelOutput(`Model requested unknown tool "${name}"`);
  }
  return tool;
}

function parseArgumentObject(name: string, raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw AppError.modelOutput(`Arguments for ${name} are not valid JSON`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw AppError.modelOutput(`Arguments for ${name} must be an object`);
  }
  return { ...parsed };
}

// Some models quote integers in function arguments
function coerceIntegerStrings(params: ToolParameter[], input: Record<string, unknown>): Record<string, unknown> {
  const output = { ...input };
  for (const param of params) {
    const value = output[param.name];
    if (param.type === 'integer' && typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
      output[param.name] = parseInt(value, 10);
    }
  }
  return output;
}

function checkedArguments(tool: ToolDescriptor, input: Record<string, unknown>): ToolArguments {
  const params = shapeOnly(tool.parameters);
  const check = validateArguments(params, coerceIntegerStrings(params, input));
  if (!check.ok) {
    throw AppError.modelOutput(`Invalid arguments for ${tool.name}: ${check.error}`);
  }
  return check.args;
}

export function parseDecision(
  response: Pick<ProviderResponse, 'content' | 'toolCalls'>,
  catalog: ToolDescriptor[],
): ToolCallRequest[] {
  let calls: ToolCallRequest[];

  if (response.toolCalls.length > 0) {
    calls = response.toolCalls.map(call => {
      const tool = findTool(catalog, call.name);
      return { tool: tool.name, args: checkedArguments(tool, parseArgumentObject(call.name, call.arguments)) };
    });
  } else {
    calls = parseFunctionCallLines(response.content).map(call => {
      const tool = findTool(catalog, call.name);
      const check = coercePositionalArguments(shapeOnly(tool.parameters), call.values);
      if (!check.ok) {
        throw AppError.modelOutput(`Invalid arguments for ${tool.name}: ${check.error}`);
      }
      return { tool: tool.name, args: check.args };
    });
  }

  if (calls.length === 0) {
    throw AppError.modelOutput('Model answer contained no function calls');
  }
  return calls;
}
