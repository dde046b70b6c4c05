import { describe, it, expect } from 'vitest';
import { coercePositionalArguments, validateArguments } from '../schema.js';
import type { ToolParameter } from '../types.js';

const params: ToolParameter[] = [
  { name: 'label', type: 'string', description: 'Label', min: 1 },
  { name: 'x', type: 'integer', description: 'X', min: -10, max: 10 },
];

describe('validateArguments', () => {
  it('should accept arguments that fit the parameters', () => {
    expect(validateArguments(params, { label: 'a', x: -10 })).toEqual({ ok: true, args: { label: 'a', x: -10 } });
  });

  it('should reject fractional integers', () => {
    expect(validateArguments(params, { label: 'a', x: 1.5 })).toEqual({ ok: false, error: 'x: x must be an integer' });
  });

  it('should reject empty strings when a minimum length is set', () => {
    expect(validateArguments(params, { label: '', x: 0 })).toEqual({ ok: false, error: 'label: label must not be empty' });
  });

  it('should reject unexpected keys', () => {
    const check = validateArguments(params, { label: 'a', x: 0, extra: 1 });
    expect(check.ok).toBe(false);
  });

  it('should reject missing keys', () => {
    const check = validateArguments(params, { label: 'a' });
    expect(check.ok).toBe(false);
  });

  it('should reject input that is not an object', () => {
    expect(validateArguments([], 'text').ok).toBe(false);
    expect(validateArguments([], {})).toEqual({ ok: true, args: {} });
  });
});

describe('coercePositionalArguments', () => {
  it('should map values in parameter order and convert integers', () => {
    expect(coercePositionalArguments(params, ['hello', '-7'])).toEqual({ ok: true, args: { label: 'hello', x: -7 } });
  });

  it('should report a count mismatch', () => {
    expect(coercePositionalArguments(params, ['hello'])).toEqual({
      ok: false,
      error: 'expected 2 argument(s) (label, x), got 1',
    });
    expect(coercePositionalArguments([], ['extra'])).toEqual({
      ok: false,
      error: 'expected 0 argument(s) (none), got 1',
    });
  });

  it('should refuse non-integral text for integer parameters', () => {
    expect(coercePositionalArguments(params, ['hello', '3.5'])).toEqual({
      ok: false,
      error: 'x: could not convert "3.5" to integer',
    });
  });

  it('should still apply bounds after conversion', () => {
    expect(coercePositionalArguments(params, ['hello', '11'])).toEqual({ ok: false, error: 'x: x must be <= 10' });
  });
});
