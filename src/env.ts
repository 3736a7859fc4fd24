// Environment configuration for the spending agent
// Load provider credentials, agent limits and data-source settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim() || fallback;

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseYear(value: string | undefined, defaultYear: string): string {
  const trimmed = strEnv(value);
  if (!trimmed) return defaultYear;
  if (!/^\d{4}$/.test(trimmed)) {
    console.error(`Invalid AGENT_DEFAULT_YEAR "${trimmed}", using default ${defaultYear}`);
    return defaultYear;
  }
  return trimmed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Agent
  AGENT_MODEL: strEnv(process.env.AGENT_MODEL, 'ollama:llama3.2'),
  AGENT_MAX_ITERATIONS: parsePositiveInt(process.env.AGENT_MAX_ITERATIONS, 5, 'AGENT_MAX_ITERATIONS'),
  // Most recent year published in SSB Table 10235
  AGENT_DEFAULT_YEAR: parseYear(process.env.AGENT_DEFAULT_YEAR, '2012'),
  MODEL_TIMEOUT_MS: parsePositiveInt(process.env.MODEL_TIMEOUT_MS, 120000, 'MODEL_TIMEOUT_MS'),
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),

  // Ollama (local, no key needed)
  OLLAMA_BASE_URL: strEnv(process.env.OLLAMA_BASE_URL, 'http://127.0.0.1:11434'),

  // OpenAI or any OpenAI-compatible endpoint
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),

  // Statistics Norway
  SSB_BASE_URL: strEnv(process.env.SSB_BASE_URL, 'https://data.ssb.no/api/v0'),
  SSB_CACHE_TTL_MS: parsePositiveInt(process.env.SSB_CACHE_TTL_MS, 24 * 60 * 60 * 1000, 'SSB_CACHE_TTL_MS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'ollama':
      return !!env.OLLAMA_BASE_URL;
    case 'openai':
      return !!env.OPENAI_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['ollama', 'openai'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (secrets are never printed)
export function logConfiguration(log: (message: string) => void): void {
  const configured = listConfiguredProviders();
  log('Spending agent configuration:');
  log(`  Environment: ${env.NODE_ENV}`);
  log(`  Server: ${env.HOST}:${env.PORT}`);
  log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  log(`  Agent model: ${env.AGENT_MODEL}`);
  log(`  Max iterations: ${env.AGENT_MAX_ITERATIONS}`);
  log(`  Default data year: ${env.AGENT_DEFAULT_YEAR}`);
  log(`  SSB endpoint: ${env.SSB_BASE_URL}`);
  log(`  SSB cache TTL ms: ${env.SSB_CACHE_TTL_MS}`);
}
