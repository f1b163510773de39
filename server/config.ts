/**
 * Environment-driven configuration. Fails fast on missing keys and on numbers that
 * would otherwise turn into NaN timeouts or zero-length intervals.
 */

export type Env = Record<string, string | undefined>;

export type LlmConfig =
  | { provider: 'mock'; response?: string }
  | { provider: 'openai'; apiKey: string; model: string; baseUrl: string }
  | { provider: 'anthropic'; apiKey: string; model: string; baseUrl: string };

export type StoreConfig =
  | { kind: 'file'; path: string }
  | { kind: 'postgres'; databaseUrl: string; key: string }
  | { kind: 'memory' };

export interface AppConfig {
  llm: LlmConfig;
  llmTimeoutMs: number;
  llmMaxRetries: number;
  store: StoreConfig;
  plannerMaxDays: number;
  stallThreshold: number;
  scheduler: { enabled: boolean; checkIntervalMs: number };
  userGoal?: string;
  port: number;
  host: string;
}

export const DEFAULT_STATE_PATH = 'data/agent_memory.json';

export function loadConfig(env: Env = process.env): AppConfig {
  const userGoal = env.USER_GOAL?.trim();
  return {
    llm: loadLlmConfig(env),
    llmTimeoutMs: positiveNumber(env, 'LLM_TIMEOUT_MS', 30_000),
    llmMaxRetries: nonNegativeInteger(env, 'LLM_MAX_RETRIES', 3),
    store: loadStoreConfig(env),
    plannerMaxDays: positiveInteger(env, 'PLANNER_MAX_DAYS', 10),
    stallThreshold: positiveInteger(env, 'STALL_THRESHOLD', 3),
    scheduler: {
      enabled: flag(env, 'SCHEDULER_ENABLED', false),
      checkIntervalMs: positiveNumber(env, 'SCHEDULER_CHECK_INTERVAL_MS', 60_000)
    },
    userGoal: userGoal || undefined,
    port: port(env),
    host: env.HOST || '0.0.0.0'
  };
}

function loadLlmConfig(env: Env): LlmConfig {
  const provider = (env.LLM_PROVIDER ?? 'mock').toLowerCase();

  if (provider === 'openai') {
    return {
      provider,
      apiKey: requireEnv(env, 'OPENAI_API_KEY'),
      model: env.OPENAI_MODEL || 'gpt-4o',
      baseUrl: env.OPENAI_BASE_URL || 'https://api.openai.com/v1'
    };
  }

  if (provider === 'anthropic') {
    return {
      provider,
      apiKey: requireEnv(env, 'ANTHROPIC_API_KEY'),
      model: requireEnv(env, 'ANTHROPIC_MODEL'),
      baseUrl: env.ANTHROPIC_BASE_URL || 'https://api.anthropic.com/v1'
    };
  }

  if (provider === 'mock') {
    return { provider, response: env.MOCK_LLM_RESPONSE || undefined };
  }

  throw new Error(`Unsupported LLM_PROVIDER: ${provider}`);
}

function loadStoreConfig(env: Env): StoreConfig {
  const kind = (env.STATE_STORE ?? (env.DATABASE_URL ? 'postgres' : 'file')).toLowerCase();

  if (kind === 'file') {
    return { kind, path: env.AGENT_STATE_PATH || DEFAULT_STATE_PATH };
  }
  if (kind === 'postgres') {
    return { kind, databaseUrl: requireEnv(env, 'DATABASE_URL'), key: env.AGENT_STATE_KEY || 'default' };
  }
  if (kind === 'memory') {
    return { kind };
  }

  throw new Error(`Unsupported STATE_STORE: ${kind}`);
}

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

function positiveNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  const value = Number(raw ?? fallback);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a positive number.`);
  }
  return value;
}

function positiveInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  const value = Number(raw ?? fallback);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a positive integer.`);
  }
  return value;
}

function nonNegativeInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  const value = Number(raw ?? fallback);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a non-negative integer.`);
  }
  return value;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (['true', '1', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(raw)) {
    return false;
  }
  throw new Error(`Invalid ${name}: ${env[name]}. Must be true or false.`);
}

function port(env: Env): number {
  const raw = env.PORT;
  const value = Number(raw ?? 3000);
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`Invalid PORT: ${raw}. Must be an integer between 0 and 65535.`);
  }
  return value;
}
