// Gemini Provider
// Uses the OpenAI-compatible Gemini endpoint, which supports function calling

import OpenAI from 'openai';
import { env } from '../env.js';
import type { FunctionDef } from '../services/tools/registry.js';
import { AppError, errorMessage } from '../utils/errors.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;
type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatCompletionTool = OpenAI.Chat.Completions.ChatCompletionTool;

function toChatMessage(message: ProviderMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

export function toChatTool(def: FunctionDef): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: def.name,
      description: def.description,
      parameters: def.parameters,
    },
  };
}

export function toProviderResponse(completion: ChatCompletion): ProviderResponse {
  const message = completion.choices[0]?.message;
  const toolCalls = (message?.tool_calls ?? []).map(call => ({
    id: call.id,
    name: call.function.name,
    arguments: call.function.arguments,
  }));

  return {
    content: message?.content ?? '',
    toolCalls,
    usage: {
      promptTokens: completion.usage?.prompt_tokens || 0,
      completionTokens: completion.usage?.completion_tokens || 0,
      totalTokens: completion.usage?.total_tokens || 0,
    },
  };
}

export class GeminiProvider implements Provider {
  name = 'gemini';
  supportsToolCalling = true;
  private client: OpenAI;

  constructor(client?: OpenAI) {
    if (!client && !env.GEMINI_API_KEY) {
      throw AppError.configuration('GEMINI_API_KEY not configured');
    }
    this.client = client ?? new OpenAI({
      apiKey: env.GEMINI_API_KEY,
      baseURL: env.GEMINI_BASE_URL,
      timeout: env.LLM_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const tools = options.tools && options.tools.length > 0 ? options.tools.map(toChatTool) : undefined;

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: options.model,
        messages: messages.map(toChatMessage),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        tools,
        tool_choice: tools ? options.toolChoice : undefined,
      });
    } catch (error) {
      throw AppError.externalCall(`Gemini API error: ${errorMessage(error)}`);
    }

    return toProviderResponse(completion);
  }
}
