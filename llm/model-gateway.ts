/**
 * ModelGateway turns an LLMAdapter into the single capability the agent core needs:
 * `complete(prompt) -> non-empty text`. Each attempt runs under a hard timeout;
 * transient failures are retried with exponential backoff, permanent ones are not.
 */

import { LLMRequestError, type LLMAdapter } from '../core/contracts/llm';
import { GatewayError, errorMessage } from '../core/contracts/errors';
import type { StructuredAuditLogger } from '../security/audit-logger';

export interface CompleteOptions {
  /** Overrides the gateway default for this call. */
  maxRetries?: number;
}

export interface CompletionGateway {
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export interface ModelGatewayOptions {
  adapter: LLMAdapter;
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  auditLogger?: StructuredAuditLogger;
  /** Injected for tests; defaults to a setTimeout-based sleep. */
  sleep?: (ms: number) => Promise<void>;
  getTime?: () => number;
}

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

export class ModelGateway implements CompletionGateway {
  private readonly adapter: LLMAdapter;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly maxTokens?: number;
  private readonly temperature?: number;
  private readonly systemPrompt?: string;
  private readonly auditLogger?: StructuredAuditLogger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly getTime: () => number;

  constructor(options: ModelGatewayOptions) {
    this.adapter = options.adapter;
    this.timeoutMs = requirePositive('timeoutMs', options.timeoutMs ?? 30_000);
    this.maxRetries = requireNonNegativeInteger('maxRetries', options.maxRetries ?? 3);
    this.baseDelayMs = requireNonNegativeInteger('baseDelayMs', options.baseDelayMs ?? 500);
    this.maxDelayMs = requireNonNegativeInteger('maxDelayMs', options.maxDelayMs ?? 8_000);
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.systemPrompt = options.systemPrompt;
    this.auditLogger = options.auditLogger;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.getTime = options.getTime ?? (() => Date.now());
  }

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    if (!prompt.trim()) {
      throw new GatewayError('permanent', 'Prompt is empty');
    }
    const maxRetries = requireNonNegativeInteger('maxRetries', options.maxRetries ?? this.maxRetries);

    for (let attempt = 0; ; attempt += 1) {
      const startedAt = this.getTime();
      try {
        const { content, tokensUsed } = await this.attempt(prompt);
        await this.auditLogger?.logLLMRequest({
          provider: this.adapter.provider,
          model: this.adapter.model,
          attempt: attempt + 1,
          durationMs: this.getTime() - startedAt,
          tokensUsed,
          success: true
        });
        return content;
      } catch (error) {
        const classified = classifyError(error).withAttempts(attempt + 1);
        await this.auditLogger?.logLLMRequest({
          provider: this.adapter.provider,
          model: this.adapter.model,
          attempt: attempt + 1,
          durationMs: this.getTime() - startedAt,
          success: false,
          error: classified.message
        });

        if (classified.kind === 'permanent' || attempt >= maxRetries) {
          throw classified;
        }
        await this.sleep(this.backoffDelay(attempt));
      }
    }
  }

  /** Longest a `complete` call can take with the default retries: every attempt timing out plus all backoff. */
  get worstCaseDurationMs(): number {
    let total = this.timeoutMs * (this.maxRetries + 1);
    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      total += this.backoffDelay(attempt);
    }
    return total;
  }

  backoffDelay(attempt: number): number {
    return Math.min(this.baseDelayMs * 2 ** attempt, this.maxDelayMs);
  }

  private async attempt(prompt: string): Promise<{ content: string; tokensUsed: number }> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new GatewayError('transient', `Model call timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    const messages = this.systemPrompt
      ? [{ role: 'system' as const, content: this.systemPrompt }, { role: 'user' as const, content: prompt }]
      : [{ role: 'user' as const, content: prompt }];

    try {
      const response = await Promise.race([
        this.adapter.generate({
          messages,
          maxTokens: this.maxTokens,
          temperature: this.temperature,
          signal: controller.signal
        }),
        timeout
      ]);
      const content = response.content.trim();
      if (!content) {
        throw new GatewayError('transient', `${this.adapter.provider} returned an empty completion`);
      }
      return { content, tokensUsed: response.tokensUsed };
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Transient: timeouts, network failures, 408/409/425/429 and 5xx, or an adapter's
 * explicit `retryable` hint. Everything else (auth, malformed request) is permanent.
 */
export function classifyError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  if (error instanceof LLMRequestError) {
    const transient = error.retryable ?? (error.status !== undefined && isTransientStatus(error.status));
    return new GatewayError(transient ? 'transient' : 'permanent', error.message, { cause: error });
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError' || error instanceof TypeError)) {
    // fetch rejects with TypeError on network failure
    return new GatewayError('transient', `Model request failed: ${error.message}`, { cause: error });
  }

  return new GatewayError('permanent', `Model request failed: ${errorMessage(error)}`, { cause: error });
}

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a finite positive number. Got: ${value}`);
  }
  return value;
}

function requireNonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer. Got: ${value}`);
  }
  return value;
}
