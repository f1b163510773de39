import { countApproxTokens, DEFAULT_MAX_TOKENS, type LLMAdapter, type LLMResponse, type PromptRequest } from '../core/contracts/llm';

type MockReply = (input: PromptRequest) => string | Promise<string>;

interface MockAdapterOptions {
  /** Fixed reply, used when no generateFn or scripted replies remain. */
  response?: string;
  /** Replies consumed in order, one per call; an Error entry is thrown instead. */
  script?: Array<string | Error>;
  generateFn?: MockReply;
  maxInputLength?: number;
  model?: string;
}

export class MockLLMAdapter implements LLMAdapter {
  readonly provider = 'mock';
  readonly model: string;
  private readonly response: string;
  private readonly script: Array<string | Error>;
  private readonly generateFn?: MockReply;
  private readonly maxInputLength: number;
  private calls = 0;

  constructor(options: MockAdapterOptions = {}) {
    this.response = options.response ?? 'mock-response';
    this.script = [...(options.script ?? [])];
    this.generateFn = options.generateFn;
    this.maxInputLength = options.maxInputLength ?? 10_000;
    this.model = options.model ?? 'mock-model';
  }

  get callCount(): number {
    return this.calls;
  }

  async generate(input: PromptRequest): Promise<LLMResponse> {
    if (!input.messages.length) {
      throw new Error('Prompt messages are required');
    }

    const combined = input.messages.map((message) => message.content).join('\n');
    if (combined.length > this.maxInputLength) {
      throw new Error('Prompt exceeds maximum length');
    }

    this.calls += 1;
    const content = await this.nextReply(input);

    return {
      content,
      tokensUsed: Math.min(countApproxTokens(content), input.maxTokens ?? DEFAULT_MAX_TOKENS)
    };
  }

  private async nextReply(input: PromptRequest): Promise<string> {
    const scripted = this.script.shift();
    if (scripted instanceof Error) {
      throw scripted;
    }
    if (scripted !== undefined) {
      return scripted;
    }
    if (this.generateFn) {
      return this.generateFn(input);
    }
    return this.response;
  }
}
