// Provider Registry
// Resolves the configured model provider

import type { Provider } from './types.js';
import { GeminiProvider } from './gemini.js';
import { VertexProvider } from './vertex.js';
import { isProviderConfigured } from '../env.js';
import { AppError } from '../utils/errors.js';

const KNOWN_PROVIDERS = ['gemini', 'vertex'];

// Provider instances (lazy initialization)
const providers: Map<string, Provider> = new Map();

function createProvider(name: string): Provider {
  switch (name) {
    case 'gemini':
      return new GeminiProvider();
    case 'vertex':
      return new VertexProvider();
    default:
      throw AppError.configuration(
        `Unknown LLM provider "${name}" (expected one of: ${KNOWN_PROVIDERS.join(', ')})`,
      );
  }
}

export function getProvider(name: string): Provider {
  const cached = providers.get(name);
  if (cached) return cached;

  if (KNOWN_PROVIDERS.includes(name) && !isProviderConfigured(name)) {
    throw AppError.configuration(`Provider "${name}" is not configured`);
  }

  const provider = createProvider(name);
  providers.set(name, provider);
  return provider;
}

export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from './types.js';
