export type PromptRole = 'system' | 'user' | 'assistant';

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface PromptRequest {
  messages: PromptMessage[];
  maxTokens?: number;
  temperature?: number;
  /** Aborts the underlying request (used by the gateway's hard timeout). */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  tokensUsed: number;
  raw?: unknown;
}

export interface LLMAdapter {
  readonly provider: string;
  readonly model: string;
  generate(input: PromptRequest): Promise<LLMResponse>;
}

export const DEFAULT_MAX_TOKENS = 1024;

/**
 * Raised by HTTP adapters. `status` is the response status when there was one;
 * `retryable` overrides status-based classification (e.g. an empty completion).
 */
export class LLMRequestError extends Error {
  readonly status?: number;
  readonly retryable?: boolean;

  constructor(message: string, options: { status?: number; retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LLMRequestError';
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

export function countApproxTokens(text: string): number {
  if (!text) {
    return 0;
  }

  return Math.ceil(text.trim().split(/\s+/u).length * 1.3);
}
