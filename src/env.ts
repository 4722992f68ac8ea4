// Environment configuration for Crewline API
// Provider credentials, tool gateway and workflow limits come from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

export type DispatchMode = 'first' | 'all';

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

/** Largest delay setTimeout honors; longer delays fire immediately */
export const MAX_TIMER_MS = 2147483647;

export function parsePositiveInt(
  value: string | undefined,
  defaultValue: number,
  name: string,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > max) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseTemperature(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 2) {
    console.error(`Invalid AGENT_TEMPERATURE "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseDispatchMode(value: string | undefined): DispatchMode {
  const mode = strEnv(value, 'first').toLowerCase();
  if (mode === 'first' || mode === 'all') return mode;
  console.error(`Invalid WORKFLOW_DISPATCH_MODE "${value}", using default first`);
  return 'first';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3838),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Agent model binding
  AGENT_PROVIDER: strEnv(process.env.AGENT_PROVIDER, 'anthropic'),
  AGENT_MODEL: strEnv(process.env.AGENT_MODEL, 'claude-3-5-sonnet-20241022'),
  AGENT_MAX_TOKENS: parsePositiveInt(process.env.AGENT_MAX_TOKENS, 4096, 'AGENT_MAX_TOKENS'),
  AGENT_TEMPERATURE: parseTemperature(process.env.AGENT_TEMPERATURE, 0),
  AGENT_TIMEOUT_MS: parsePositiveInt(process.env.AGENT_TIMEOUT_MS, 120000, 'AGENT_TIMEOUT_MS', MAX_TIMER_MS),

  // Anthropic
  ANTHROPIC_API_KEY: strEnv(process.env.ANTHROPIC_API_KEY),

  // DeepSeek (OpenAI-compatible function calling)
  DEEPSEEK_API_KEY: strEnv(process.env.DEEPSEEK_API_KEY),
  DEEPSEEK_BASE_URL: strEnv(process.env.DEEPSEEK_BASE_URL, 'https://api.deepseek.com'),

  // Remote tool gateway (empty = routing tools only)
  TOOL_GATEWAY_URL: strEnv(process.env.TOOL_GATEWAY_URL),
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS', MAX_TIMER_MS),

  // Workflow
  WORKFLOW_MAX_STEPS: parsePositiveInt(process.env.WORKFLOW_MAX_STEPS, 50, 'WORKFLOW_MAX_STEPS'),
  WORKFLOW_DISPATCH_MODE: parseDispatchMode(process.env.WORKFLOW_DISPATCH_MODE),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'anthropic':
      return !!env.ANTHROPIC_API_KEY;
    case 'deepseek':
      return !!env.DEEPSEEK_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['anthropic', 'deepseek'];
  return providers.filter(isProviderConfigured);
}

// Configuration summary for startup logs (no secrets)
export function describeConfiguration(): Record<string, unknown> {
  return {
    environment: env.NODE_ENV,
    server: `${env.HOST}:${env.PORT}`,
    configuredProviders: listConfiguredProviders(),
    agentProvider: env.AGENT_PROVIDER,
    agentModel: env.AGENT_MODEL,
    toolGateway: env.TOOL_GATEWAY_URL || 'disabled',
    maxSteps: env.WORKFLOW_MAX_STEPS,
    dispatchMode: env.WORKFLOW_DISPATCH_MODE,
    agentTimeoutMs: env.AGENT_TIMEOUT_MS,
    toolTimeoutMs: env.TOOL_TIMEOUT_MS,
  };
}
