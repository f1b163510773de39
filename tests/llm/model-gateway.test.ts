import { GatewayError } from '../../core/contracts/errors';
import { LLMRequestError, type LLMAdapter } from '../../core/contracts/llm';
import { MockLLMAdapter, ModelGateway, classifyError, isTransientStatus } from '../../llm';
import { InMemoryAuditLogger, StructuredAuditLogger } from '../../security/audit-logger';
import { captureError } from '../support/fixtures';

function gatewayFor(adapter: LLMAdapter, options: { maxRetries?: number; timeoutMs?: number } = {}) {
  const delays: number[] = [];
  const sink = new InMemoryAuditLogger();
  const gateway = new ModelGateway({
    adapter,
    maxRetries: options.maxRetries,
    timeoutMs: options.timeoutMs,
    auditLogger: new StructuredAuditLogger(sink),
    sleep: async (ms) => {
      delays.push(ms);
    }
  });
  return { gateway, delays, sink };
}

describe('ModelGateway', () => {
  it('returns trimmed completion text', async () => {
    const { gateway } = gatewayFor(new MockLLMAdapter({ response: '  Ran 2km today.  ' }));

    await expect(gateway.complete('How did it go?')).resolves.toBe('Ran 2km today.');
  });

  it('retries transient failures with exponential backoff', async () => {
    const adapter = new MockLLMAdapter({
      script: [
        new LLMRequestError('OpenAI API error: 503', { status: 503 }),
        new LLMRequestError('OpenAI API error: 429', { status: 429 }),
        'done'
      ]
    });
    const { gateway, delays, sink } = gatewayFor(adapter);

    await expect(gateway.complete('prompt')).resolves.toBe('done');
    expect(adapter.callCount).toBe(3);
    expect(delays).toEqual([500, 1000]);
    expect(sink.ofType('llm_request').map((entry) => entry.data.success)).toEqual([false, false, true]);
    expect(sink.ofType('llm_request').map((entry) => entry.data.attempt)).toEqual([1, 2, 3]);
  });

  it('reports its worst-case duration from timeout, retries and backoff', () => {
    const adapter = new MockLLMAdapter({ response: 'ok' });

    expect(new ModelGateway({ adapter }).worstCaseDurationMs).toBe(4 * 30_000 + 500 + 1_000 + 2_000);
    expect(new ModelGateway({ adapter, maxRetries: 0, timeoutMs: 5_000 }).worstCaseDurationMs).toBe(5_000);
  });

  it('does not retry permanent failures', async () => {
    const adapter = new MockLLMAdapter({ script: [new LLMRequestError('OpenAI API error: 401', { status: 401 })] });
    const { gateway, delays } = gatewayFor(adapter);

    const error = await captureError(() => gateway.complete('prompt'));

    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toMatchObject({ kind: 'permanent', attempts: 1, message: 'OpenAI API error: 401' });
    expect(adapter.callCount).toBe(1);
    expect(delays).toEqual([]);
  });

  it('gives up after maxRetries transient failures', async () => {
    const failure = () => new LLMRequestError('Anthropic API error: 500', { status: 500 });
    const adapter = new MockLLMAdapter({ script: [failure(), failure(), failure(), 'too late'] });
    const { gateway, delays } = gatewayFor(adapter, { maxRetries: 2 });

    const error = await captureError(() => gateway.complete('prompt'));

    expect(error).toMatchObject({ kind: 'transient', attempts: 3 });
    expect(adapter.callCount).toBe(3);
    expect(delays).toEqual([500, 1000]);
  });

  it('lets a call lower the retry budget', async () => {
    const adapter = new MockLLMAdapter({ script: [new LLMRequestError('busy', { status: 503 }), 'ok'] });
    const { gateway } = gatewayFor(adapter);

    await expect(gateway.complete('prompt', { maxRetries: 0 })).rejects.toMatchObject({ kind: 'transient' });
    expect(adapter.callCount).toBe(1);
  });

  it('treats an empty completion as transient', async () => {
    const adapter = new MockLLMAdapter({ script: ['   ', 'Second try worked.'] });
    const { gateway } = gatewayFor(adapter);

    await expect(gateway.complete('prompt')).resolves.toBe('Second try worked.');
    expect(adapter.callCount).toBe(2);
  });

  it('rejects an empty prompt without calling the model', async () => {
    const adapter = new MockLLMAdapter();
    const { gateway } = gatewayFor(adapter);

    await expect(gateway.complete('  ')).rejects.toMatchObject({ kind: 'permanent', message: 'Prompt is empty' });
    expect(adapter.callCount).toBe(0);
  });

  it('aborts a call that exceeds the timeout', async () => {
    let aborted = false;
    const hanging: LLMAdapter = {
      provider: 'slow',
      model: 'slow-model',
      generate: (input) =>
        new Promise((_, reject) => {
          input.signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new Error('aborted'));
          });
        })
    };
    const { gateway } = gatewayFor(hanging, { maxRetries: 0, timeoutMs: 20 });

    const error = await captureError(() => gateway.complete('prompt'));

    expect(error).toMatchObject({ kind: 'transient', message: 'Model call timed out after 20ms' });
    expect(aborted).toBe(true);
  });

  it('computes capped backoff delays', () => {
    const gateway = new ModelGateway({ adapter: new MockLLMAdapter(), baseDelayMs: 100, maxDelayMs: 350 });

    expect([0, 1, 2, 3].map((attempt) => gateway.backoffDelay(attempt))).toEqual([100, 200, 350, 350]);
  });

  it('validates its options', () => {
    expect(() => new ModelGateway({ adapter: new MockLLMAdapter(), timeoutMs: 0 })).toThrow(
      'timeoutMs must be a finite positive number. Got: 0'
    );
  });
});

describe('classifyError', () => {
  it('classifies by status and hint', () => {
    expect(classifyError(new LLMRequestError('x', { status: 429 })).kind).toBe('transient');
    expect(classifyError(new LLMRequestError('x', { status: 400 })).kind).toBe('permanent');
    expect(classifyError(new LLMRequestError('x', { retryable: true })).kind).toBe('transient');
    expect(classifyError(new LLMRequestError('x', { status: 503, retryable: false })).kind).toBe('permanent');
  });

  it('treats network failures as transient', () => {
    expect(classifyError(new TypeError('fetch failed')).kind).toBe('transient');
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(classifyError(abort).kind).toBe('transient');
  });

  it('treats anything else as permanent', () => {
    expect(classifyError(new Error('Prompt exceeds maximum length'))).toMatchObject({
      kind: 'permanent',
      message: 'Model request failed: Prompt exceeds maximum length'
    });
  });

  it('knows which statuses are worth retrying', () => {
    expect([408, 409, 425, 429, 500, 502, 503].every(isTransientStatus)).toBe(true);
    expect([400, 401, 403, 404, 422].some(isTransientStatus)).toBe(false);
  });
});
