import { describe, it, expect, afterEach } from 'vitest';
import { getProvider } from '../index.js';
import { toChatTool, toProviderResponse } from '../gemini.js';
import { describeConfiguration, env } from '../../env.js';
import { ErrorCode } from '../../utils/errors.js';
import { describeTool } from '../../services/tools/registry.js';

describe('Provider registry', () => {
  const saved = { GEMINI_API_KEY: env.GEMINI_API_KEY, VERTEX_PROJECT_ID: env.VERTEX_PROJECT_ID };

  afterEach(() => {
    env.GEMINI_API_KEY = saved.GEMINI_API_KEY;
    env.VERTEX_PROJECT_ID = saved.VERTEX_PROJECT_ID;
  });

  it('should refuse an unknown provider', () => {
    expect(() => getProvider('mystery')).toThrow('Unknown LLM provider "mystery" (expected one of: gemini, vertex)');
  });

  it('should refuse a provider without credentials', () => {
    env.VERTEX_PROJECT_ID = '';
    try {
      getProvider('vertex');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.CONFIGURATION_ERROR, message: 'Provider "vertex" is not configured' });
    }
  });

  it('should report only configured providers', () => {
    env.GEMINI_API_KEY = 'test-key';
    env.VERTEX_PROJECT_ID = '';
    expect(describeConfiguration().configuredProviders).toEqual(['gemini']);
  });
});

describe('Gemini mapping', () => {
  it('should declare tools as functions', () => {
    const def = describeTool({
      name: 'send_email',
      description: 'Sends mail',
      parameters: [{ name: 'to', type: 'string', description: 'Recipient' }],
    });

    expect(toChatTool(def)).toEqual({
      type: 'function',
      function: {
        name: 'send_email',
        description: 'Sends mail',
        parameters: {
          type: 'object',
          properties: { to: { type: 'string', description: 'Recipient' } },
          required: ['to'],
        },
      },
    });
  });

  it('should map tool calls and usage from a completion', () => {
    const response = toProviderResponse({
      id: 'chatcmpl-1',
      object: 'chat.completion',
      created: 0,
      model: 'gemini-2.0-flash',
      choices: [{
        index: 0,
        finish_reason: 'tool_calls',
        logprobs: null,
        message: {
          role: 'assistant',
          content: null,
          refusal: null,
          tool_calls: [{
            id: 'call_0',
            type: 'function',
            function: { name: 'open_keynote', arguments: '{}' },
          }],
        },
      }],
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    });

    expect(response).toEqual({
      content: '',
      toolCalls: [{ id: 'call_0', name: 'open_keynote', arguments: '{}' }],
      usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
    });
  });

  it('should tolerate a completion without choices or usage', () => {
    expect(toProviderResponse({
      id: 'chatcmpl-2',
      object: 'chat.completion',
      created: 0,
      model: 'gemini-2.0-flash',
      choices: [],
    })).toEqual({ content: '', toolCalls: [], usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 } });
  });
});
