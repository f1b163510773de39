import { Pool } from 'pg';
import { GoalAgent } from '../core/agent/goal-agent';
import type { LLMAdapter, PromptRequest } from '../core/contracts/llm';
import { LlmPlanner } from '../goals/planner';
import { ProgressEngine } from '../goals/progress-engine';
import { AnthropicAdapter } from '../llm/adapters/anthropic-adapter';
import { OpenAIAdapter } from '../llm/adapters/openai-adapter';
import { MockLLMAdapter } from '../llm/mock-adapter';
import { ModelGateway } from '../llm/model-gateway';
import { DEFAULT_LOCK_TIMEOUT_MS, DEFAULT_STALE_LOCK_MS, FileStateStore } from '../memory/repositories/file-state-store';
import { InMemoryStateStore } from '../memory/repositories/in-memory-state-store';
import { PostgresStateStore } from '../memory/repositories/postgres-state-store';
import type { StateStore } from '../memory/state-store';
import { DailyScheduler } from '../runtime/daily-scheduler';
import { ConsoleAuditLogger, StructuredAuditLogger, type AuditLogger } from '../security/audit-logger';
import { loadConfig, type AppConfig, type Env, type LlmConfig, type StoreConfig } from './config';

export interface ContainerContext {
  config: AppConfig;
  agent: GoalAgent;
  store: StateStore;
  auditLogger: StructuredAuditLogger;
  /** Present when SCHEDULER_ENABLED is set; not started until the caller starts it. */
  scheduler?: DailyScheduler;
  /**
   * Stops the scheduler and closes database connections.
   * Should be called when the container is no longer needed (e.g., in test teardown).
   */
  cleanup(): Promise<void>;
}

export interface BuildContainerOptions {
  env?: Env;
  /** Replaces the configured provider; used by tests and local runs. */
  llmAdapter?: LLMAdapter;
  /** Replaces the configured backend. */
  store?: StateStore;
  auditSink?: AuditLogger;
}

export const MOCK_PLAN_RESPONSE = JSON.stringify({
  estimatedDays: 3,
  subtasks: ['Outline the work', 'Do the core of the work', 'Review and wrap up']
});

export const MOCK_REVIEW_RESPONSE = "Completed today's subtask.";

export async function buildContainer(options: BuildContainerOptions = {}): Promise<ContainerContext> {
  const config = loadConfig(options.env ?? process.env);
  const auditLogger = new StructuredAuditLogger(options.auditSink ?? new ConsoleAuditLogger());

  const adapter = options.llmAdapter ?? buildLlmAdapter(config.llm, config.llmTimeoutMs);
  const gateway = new ModelGateway({
    adapter,
    timeoutMs: config.llmTimeoutMs,
    maxRetries: config.llmMaxRetries,
    auditLogger
  });

  const { store, pool } = options.store
    ? { store: options.store, pool: undefined }
    : await buildStore(config.store, gateway.worstCaseDurationMs);
  console.log(`[INFO] Agent state store: ${store.description}`);

  const agent = new GoalAgent({
    store,
    planner: new LlmPlanner(gateway, { maxDays: config.plannerMaxDays }),
    engine: new ProgressEngine({ gateway, stallThreshold: config.stallThreshold }),
    auditLogger
  });

  const scheduler = config.scheduler.enabled
    ? new DailyScheduler({ agent, checkIntervalMs: config.scheduler.checkIntervalMs, auditLogger })
    : undefined;

  return {
    config,
    agent,
    store,
    auditLogger,
    scheduler,
    async cleanup() {
      scheduler?.stop();
      if (pool) {
        await pool.end();
      }
    }
  };
}

function buildLlmAdapter(config: LlmConfig, timeoutMs: number): LLMAdapter {
  switch (config.provider) {
    case 'openai':
      return new OpenAIAdapter({ apiKey: config.apiKey, model: config.model, baseUrl: config.baseUrl, timeoutMs });
    case 'anthropic':
      return new AnthropicAdapter({ apiKey: config.apiKey, model: config.model, baseUrl: config.baseUrl, timeoutMs });
    case 'mock':
      return new MockLLMAdapter({ generateFn: (input) => mockReply(input, config.response) });
  }
}

/** Planning prompts get a fixed three-day plan; every other prompt gets the review reply. */
function mockReply(input: PromptRequest, response = MOCK_REVIEW_RESPONSE): string {
  const asksForPlan = input.messages.some((message) => message.content.includes('"estimatedDays"'));
  return asksForPlan ? MOCK_PLAN_RESPONSE : response;
}

/**
 * The file lock is held for a whole tick, model call included, so waiting on it and
 * declaring it stale must both outlast the gateway's worst case.
 */
export function fileLockTimings(gatewayBudgetMs: number): { lockTimeoutMs: number; staleLockMs: number } {
  return {
    lockTimeoutMs: Math.max(DEFAULT_LOCK_TIMEOUT_MS, 2 * gatewayBudgetMs),
    staleLockMs: Math.max(DEFAULT_STALE_LOCK_MS, 2 * gatewayBudgetMs)
  };
}

async function buildStore(config: StoreConfig, gatewayBudgetMs: number): Promise<{ store: StateStore; pool?: Pool }> {
  switch (config.kind) {
    case 'postgres': {
      const pool = new Pool({ connectionString: config.databaseUrl });
      const store = new PostgresStateStore(pool, { key: config.key });
      try {
        await store.ensureSchema();
      } catch (error) {
        await pool.end();
        throw error;
      }
      return { store, pool };
    }
    case 'memory':
      return { store: new InMemoryStateStore() };
    case 'file':
      return { store: new FileStateStore({ path: config.path, ...fileLockTimings(gatewayBudgetMs) }) };
  }
}
