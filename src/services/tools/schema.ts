// Argument schemas derived from tool parameter lists
// Used by the host before executing and by the orchestrator before relaying

import { z } from 'zod';
import type { ToolArguments, ToolParameter } from './types.js';

function parameterSchema(param: ToolParameter): z.ZodTypeAny {
  if (param.type === 'integer') {
    let schema = z.number({ invalid_type_error: `${param.name} must be an integer` }).int(`${param.name} must be an integer`);
    if (param.min !== undefined) schema = schema.min(param.min, `${param.name} must be >= ${param.min}`);
    if (param.max !== undefined) schema = schema.max(param.max, `${param.name} must be <= ${param.max}`);
    return schema;
  }

  let schema = z.string({ invalid_type_error: `${param.name} must be a string` });
  if (param.min !== undefined) schema = schema.min(param.min, `${param.name} must not be empty`);
  if (param.max !== undefined) schema = schema.max(param.max, `${param.name} is too long`);
  return schema;
}

export function buildArgumentSchema(params: ToolParameter[]) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of params) {
    shape[param.name] = parameterSchema(param);
  }
  return z.object(shape).strict();
}

export type ArgumentCheck =
  | { ok: true; args: ToolArguments }
  | { ok: false; error: string };

function isArgumentValue(value: unknown): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

export function validateArguments(params: ToolParameter[], input: unknown): ArgumentCheck {
  const parsed = buildArgumentSchema(params).safeParse(input);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { ok: false, error };
  }

  const args: ToolArguments = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (isArgumentValue(value)) {
      args[key] = value;
    }
  }
  return { ok: true, args };
}

const INTEGER_TEXT = /^-?\d+$/;

/**
 * Maps positional text arguments onto a parameter list, converting integer
 * parameters. Returns an error when the count or a conversion does not fit.
 */
export function coercePositionalArguments(params: ToolParameter[], values: string[]): ArgumentCheck {
  if (values.length !== params.length) {
    const expected = params.map(p => p.name).join(', ') || 'none';
    return {
      ok: false,
      error: `expected ${params.length} argument(s) (${expected}), got ${values.length}`,
    };
  }

  const args: ToolArguments = {};
  for (let i = 0; i < params.length; i++) {
    const param = params[i];
    const raw = values[i];
    if (param.type === 'integer') {
      if (!INTEGER_TEXT.test(raw)) {
        return { ok: false, error: `${param.name}: could not convert "${raw}" to integer` };
      }
      args[param.name] = parseInt(raw, 10);
    } else {
      args[param.name] = raw;
    }
  }
  return validateArguments(params, args);
}
