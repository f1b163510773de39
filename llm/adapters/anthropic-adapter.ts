import { z } from 'zod';
import { LLMRequestError, DEFAULT_MAX_TOKENS, countApproxTokens } from '../../core/contracts/llm';
import type { LLMAdapter, LLMResponse, PromptMessage, PromptRequest } from '../../core/contracts/llm';
import { assertHttpUrl, postJson, trimSlash } from './http';

interface AnthropicAdapterOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  anthropicVersion?: string;
}

const messagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
  usage: z.object({ input_tokens: z.number().optional(), output_tokens: z.number().optional() }).optional()
});

export class AnthropicAdapter implements LLMAdapter {
  readonly provider = 'anthropic';
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly anthropicVersion: string;

  constructor(options: AnthropicAdapterOptions) {
    if (!options.apiKey) {
      throw new Error('Anthropic API key required');
    }
    if (!options.model) {
      throw new Error('Anthropic model required');
    }

    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? 'https://api.anthropic.com/v1';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.anthropicVersion = options.anthropicVersion ?? '2023-06-01';

    assertHttpUrl(this.baseUrl, 'Anthropic');
  }

  async generate(input: PromptRequest): Promise<LLMResponse> {
    if (!input.messages.length) {
      throw new Error('Prompt messages are required');
    }

    const { system, messages } = splitMessages(input.messages);
    const payload = {
      model: this.model,
      max_tokens: input.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: input.temperature,
      messages,
      system
    };

    const raw = await postJson(
      'Anthropic',
      `${trimSlash(this.baseUrl)}/messages`,
      {
        'x-api-key': this.apiKey,
        'anthropic-version': this.anthropicVersion,
        'Content-Type': 'application/json'
      },
      payload,
      this.timeoutMs,
      input.signal
    );

    const parsed = messagesResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMRequestError('Anthropic response has an unexpected shape', { retryable: false });
    }

    const content = (parsed.data.content ?? [])
      .map((part) => part.text)
      .filter((text): text is string => typeof text === 'string')
      .join('');
    if (!content) {
      throw new LLMRequestError('Anthropic response missing content', { retryable: true });
    }

    const usage = parsed.data.usage;
    const tokensUsed = usage ? (usage.input_tokens ?? 0) + (usage.output_tokens ?? 0) : countApproxTokens(content);

    return { content, tokensUsed, raw };
  }
}

/** Anthropic takes the system prompt as a top-level field, not as a message. */
function splitMessages(messages: PromptMessage[]): {
  system?: string;
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
} {
  const systemParts = messages.filter((message) => message.role === 'system').map((message) => message.content);
  const rest = messages
    .filter((message) => message.role !== 'system')
    .map((message) => ({ role: message.role === 'assistant' ? ('assistant' as const) : ('user' as const), content: message.content }));

  return {
    system: systemParts.length ? systemParts.join('\n\n') : undefined,
    messages: rest
  };
}
