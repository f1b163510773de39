import { z } from 'zod';
import { LLMRequestError, DEFAULT_MAX_TOKENS, countApproxTokens } from '../../core/contracts/llm';
import type { LLMAdapter, LLMResponse, PromptRequest } from '../../core/contracts/llm';
import { assertHttpUrl, postJson, trimSlash } from './http';

interface OpenAIAdapterOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  organization?: string;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
        text: z.string().optional()
      })
    )
    .optional(),
  usage: z.object({ total_tokens: z.number().optional() }).optional()
});

export class OpenAIAdapter implements LLMAdapter {
  readonly provider = 'openai';
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly organization?: string;

  constructor(options: OpenAIAdapterOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key required');
    }
    this.apiKey = options.apiKey;
    this.model = options.model ?? 'gpt-4o';
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.organization = options.organization;

    assertHttpUrl(this.baseUrl, 'OpenAI');
  }

  async generate(input: PromptRequest): Promise<LLMResponse> {
    if (!input.messages.length) {
      throw new Error('Prompt messages are required');
    }

    const payload = {
      model: this.model,
      messages: input.messages.map((message) => ({ role: message.role, content: message.content })),
      max_tokens: input.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: input.temperature ?? 0.2
    };

    const raw = await postJson(
      'OpenAI',
      `${trimSlash(this.baseUrl)}/chat/completions`,
      buildHeaders(this.apiKey, this.organization),
      payload,
      this.timeoutMs,
      input.signal
    );

    const parsed = chatCompletionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMRequestError('OpenAI response has an unexpected shape', { retryable: false });
    }

    const choice = parsed.data.choices?.[0];
    const content = choice?.message?.content ?? choice?.text;
    if (!content) {
      throw new LLMRequestError('OpenAI response missing content', { retryable: true });
    }

    return {
      content,
      tokensUsed: parsed.data.usage?.total_tokens ?? countApproxTokens(content),
      raw
    };
  }
}

function buildHeaders(apiKey: string, organization?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json'
  };

  if (organization) {
    headers['OpenAI-Organization'] = organization;
  }

  return headers;
}
