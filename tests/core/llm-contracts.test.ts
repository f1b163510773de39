import { countApproxTokens, DEFAULT_MAX_TOKENS, LLMRequestError } from '../../core/contracts/llm';

describe('llm contracts', () => {
  it('countApproxTokens returns 0 for empty string', () => {
    expect(countApproxTokens('')).toBe(0);
  });

  it('countApproxTokens approximates tokens for text', () => {
    expect(countApproxTokens('one two three')).toBe(4);
  });

  it('DEFAULT_MAX_TOKENS is defined', () => {
    expect(DEFAULT_MAX_TOKENS).toBe(1024);
  });

  it('LLMRequestError carries status and retry hint', () => {
    const error = new LLMRequestError('OpenAI API error: 429', { status: 429 });

    expect(error.name).toBe('LLMRequestError');
    expect(error.status).toBe(429);
    expect(error.retryable).toBeUndefined();
  });
});
