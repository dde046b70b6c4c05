// Environment configuration for the relay agents
// Read once at startup; secrets are never logged

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

const NODE_ENV = process.env.NODE_ENV || 'development';

export const env = {
  NODE_ENV,

  // Tool host
  HOST: strEnv(process.env.HOST, '127.0.0.1'),
  PORT: parsePort(process.env.PORT, 3747),
  TOOL_HOST_URL: strEnv(process.env.TOOL_HOST_URL),

  // Model
  LLM_PROVIDER: strEnv(process.env.LLM_PROVIDER, 'gemini'),
  LLM_MODEL: strEnv(process.env.LLM_MODEL, 'gemini-2.0-flash'),
  LLM_TIMEOUT_MS: parsePositiveInt(process.env.LLM_TIMEOUT_MS, 45000, 'LLM_TIMEOUT_MS'),

  // Gemini (OpenAI-compatible endpoint)
  GEMINI_API_KEY: strEnv(process.env.GEMINI_API_KEY),
  GEMINI_BASE_URL: strEnv(
    process.env.GEMINI_BASE_URL,
    'https://generativelanguage.googleapis.com/v1beta/openai/',
  ),

  // Google Vertex AI
  VERTEX_PROJECT_ID: strEnv(process.env.VERTEX_PROJECT_ID),
  VERTEX_LOCATION: strEnv(process.env.VERTEX_LOCATION, 'us-central1'),

  // Gmail
  GMAIL_CREDENTIALS_PATH: strEnv(process.env.GMAIL_CREDENTIALS_PATH, 'credentials.json'),
  GMAIL_TOKEN_PATH: strEnv(process.env.GMAIL_TOKEN_PATH, 'token.json'),
  GMAIL_RECIPIENT: strEnv(process.env.GMAIL_RECIPIENT, 'your_email@example.com'),

  // Logging
  LOG_LEVEL: strEnv(process.env.LOG_LEVEL, NODE_ENV === 'test' ? 'silent' : 'info'),
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'gemini':
      return !!env.GEMINI_API_KEY;
    case 'vertex':
      return !!env.VERTEX_PROJECT_ID;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['gemini', 'vertex'];
  return providers.filter(isProviderConfigured);
}

export function describeConfiguration(): Record<string, unknown> {
  return {
    environment: env.NODE_ENV,
    provider: env.LLM_PROVIDER,
    model: env.LLM_MODEL,
    configuredProviders: listConfiguredProviders(),
    toolHost: env.TOOL_HOST_URL || `in-process (${env.HOST})`,
  };
}
