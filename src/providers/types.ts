// Provider Interface
// Common interface that all model providers implement

import type { FunctionDef } from '../services/tools/registry.js';

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface ProviderOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  tools?: FunctionDef[];
  toolChoice?: 'auto' | 'required' | 'none';
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderResponse {
  content: string;
  toolCalls: ToolCall[];
  usage: ProviderUsage;
}

export interface Provider {
  name: string;
  /** Whether `options.tools` is honoured; otherwise calls come back as text. */
  supportsToolCalling: boolean;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
}
