import { describe, it, expect, vi, afterEach } from 'vitest';
import { runStep } from './run-step.js';
import { Client } from '../client/client.js';
import { resetDefaultClient, setDefaultClient } from '../client/default-client.js';
import {
  ConfigurationError,
  EmptyResponseError,
  RateLimitError,
  userMessage,
  type ExecutionResult,
  type ProviderAdapter,
} from '../types/index.js';

function adapterReturning(result: () => Promise<string>): ProviderAdapter {
  return {
    name: 'test-provider',
    send: vi.fn<ProviderAdapter['send']>().mockImplementation(result),
  };
}

describe('runStep', () => {
  afterEach(() => {
    resetDefaultClient();
  });

  it('records returned text as a successful step', async () => {
    const result = await runStep({
      stepType: 'llm',
      messages: [userMessage('hi')],
      adapter: adapterReturning(() => Promise.resolve('hello')),
    });

    expect(result).toEqual({ stepType: 'llm', output: 'hello', success: true });
  });

  it('counts empty text as success without inspecting it', async () => {
    const result = await runStep({
      stepType: 'llm',
      messages: [userMessage('hi')],
      adapter: adapterReturning(() => Promise.resolve('')),
    });

    expect(result.success).toBe(true);
    expect(result.output).toBe('');
  });

  it('records a provider failure with its message as output', async () => {
    const result = await runStep({
      stepType: 'summarize',
      messages: [userMessage('hi')],
      adapter: adapterReturning(() =>
        Promise.reject(new RateLimitError('openai rate limit exceeded: slow down', 'openai', 429, 'slow down')),
      ),
    });

    expect(result).toEqual({
      stepType: 'summarize',
      output: 'openai rate limit exceeded: slow down',
      success: false,
    });
  });

  it('rethrows errors outside the provider taxonomy', async () => {
    await expect(
      runStep({
        stepType: 'llm',
        messages: [userMessage('hi')],
        adapter: adapterReturning(() => Promise.reject(new TypeError('bug'))),
      }),
    ).rejects.toThrow(TypeError);
  });

  it('routes through an explicit client and provider name', async () => {
    const openai = adapterReturning(() => Promise.resolve('from openai'));
    const anthropic = adapterReturning(() =>
      Promise.reject(new EmptyResponseError('anthropic response contained no content', 'anthropic')),
    );
    const client = new Client({ providers: { openai, anthropic }, defaultProvider: 'openai' });

    const result = await runStep({
      stepType: 'llm',
      messages: [userMessage('hi')],
      client,
      provider: 'anthropic',
    });

    expect(result).toEqual({
      stepType: 'llm',
      output: 'anthropic response contained no content',
      success: false,
    });
  });

  it('falls back to the default client', async () => {
    setDefaultClient(new Client({ providers: { openai: adapterReturning(() => Promise.resolve('default')) } }));

    const result = await runStep({ stepType: 'llm', messages: [userMessage('hi')] });

    expect(result.output).toBe('default');
  });

  it('rethrows configuration errors from the client', async () => {
    setDefaultClient(new Client({ providers: {} }));

    await expect(runStep({ stepType: 'llm', messages: [userMessage('hi')] })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('produces records an executor can aggregate', async () => {
    const steps = await Promise.all([
      runStep({ stepType: 'a', messages: [], adapter: adapterReturning(() => Promise.resolve('one')) }),
      runStep({ stepType: 'b', messages: [], adapter: adapterReturning(() => Promise.resolve('two')) }),
    ]);

    const execution: ExecutionResult = {
      success: steps.every((step) => step.success),
      finalResponse: steps[steps.length - 1]?.output ?? '',
      stepResults: steps,
    };

    expect(execution).toEqual({
      success: true,
      finalResponse: 'two',
      stepResults: [
        { stepType: 'a', output: 'one', success: true },
        { stepType: 'b', output: 'two', success: true },
      ],
    });
  });
});
