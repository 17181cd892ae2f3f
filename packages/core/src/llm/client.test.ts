import { describe, it, expect, beforeEach, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { ClaudeClient, HAIKU_MODEL, createHaikuClient, haikuUsage, isRetryableApiError } from './client.js';

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => {
  class APIError extends Error {
    constructor(
      readonly status: number | undefined,
      _error: unknown,
      message: string | undefined
    ) {
      super(message);
      this.name = 'APIError';
    }
  }
  class AuthenticationError extends APIError {}

  const AnthropicMock = Object.assign(
    vi.fn().mockImplementation(() => ({ messages: { create: mockCreate } })),
    { APIError, AuthenticationError }
  );
  return { default: AnthropicMock, APIError, AuthenticationError };
});

function message(text: string) {
  return {
    id: 'msg_1',
    type: 'message',
    role: 'assistant',
    model: HAIKU_MODEL,
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
    usage: { input_tokens: 200, output_tokens: 50 },
  };
}

describe('ClaudeClient', () => {
  let sleep: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
    sleep = vi.fn().mockResolvedValue(undefined);
  });

  function createClient() {
    return new ClaudeClient(
      { apiKey: 'test-secret', model: HAIKU_MODEL, maxTokens: 256, temperature: 0 },
      { attempts: 3, delayMs: 10, sleep }
    );
  }

  it('should leave retries to itself rather than the SDK', () => {
    createClient();
    expect(Anthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', maxRetries: 0 });
  });

  it('should send one user message and return the trimmed text', async () => {
    mockCreate.mockResolvedValueOnce(message('  Velocity holds.  '));

    const result = await createClient().complete('Forecast the sprint.', 'Scenario: scope_creep');

    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: HAIKU_MODEL,
        max_tokens: 256,
        temperature: 0,
        system: 'Forecast the sprint.',
        messages: [{ role: 'user', content: 'Scenario: scope_creep' }],
      },
      undefined
    );
    expect(result).toMatchObject({
      success: true,
      data: 'Velocity holds.',
      stopReason: 'end_turn',
      retriesUsed: 0,
      usage: { inputTokens: 200, outputTokens: 50 },
    });
  });

  it('should pass the timeout and token override per request', async () => {
    mockCreate.mockResolvedValueOnce(message('ok'));

    await createClient().complete('s', 'u', { timeoutMs: 1500, maxTokens: 64 });

    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ max_tokens: 64 }), { timeout: 1500 });
  });

  it('should retry overloaded responses with linear backoff', async () => {
    mockCreate
      .mockRejectedValueOnce(new Anthropic.APIError(529, undefined, 'overloaded', undefined))
      .mockRejectedValueOnce(new Anthropic.APIError(503, undefined, 'unavailable', undefined))
      .mockResolvedValueOnce(message('third time'));

    const result = await createClient().complete('s', 'u');

    expect(sleep.mock.calls).toEqual([[10], [20]]);
    expect(result).toMatchObject({ success: true, data: 'third time', retriesUsed: 2 });
  });

  it('should report exhausted retries as a retryable failure', async () => {
    mockCreate.mockRejectedValue(new Anthropic.APIError(429, undefined, 'slow down', undefined));

    const result = await createClient().complete('s', 'u');

    expect(mockCreate).toHaveBeenCalledTimes(3);
    expect(result).toMatchObject({
      success: false,
      error: 'Claude API error: slow down (status: 429)',
      retryable: true,
      retriesUsed: 2,
      usage: { inputTokens: 0, outputTokens: 0, costUsd: 0 },
    });
  });

  it('should not retry authentication failures', async () => {
    mockCreate.mockRejectedValueOnce(new Anthropic.AuthenticationError(401, undefined, 'bad key', undefined));

    const result = await createClient().complete('s', 'u');

    expect(mockCreate).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ success: false, error: 'Claude API authentication failed', retryable: false });
  });

  it('should report plain errors as they are', async () => {
    mockCreate.mockRejectedValueOnce(new Error('socket hang up'));

    const result = await createClient().complete('s', 'u');

    expect(result).toMatchObject({ success: false, error: 'socket hang up', retriesUsed: 0 });
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('isRetryableApiError', () => {
  it('should accept rate limits and server errors only', () => {
    expect(isRetryableApiError(new Anthropic.APIError(429, undefined, 'x', undefined))).toBe(true);
    expect(isRetryableApiError(new Anthropic.APIError(400, undefined, 'x', undefined))).toBe(false);
    expect(isRetryableApiError(new Anthropic.APIError(undefined, undefined, 'timeout', undefined))).toBe(false);
    expect(isRetryableApiError(new Error('x'))).toBe(false);
  });
});

describe('haikuUsage', () => {
  it('should price tokens at the Haiku rate', () => {
    // 1M input at $0.80 + 0.5M output at $4.00
    expect(haikuUsage({ input_tokens: 1_000_000, output_tokens: 500_000 }).costUsd).toBeCloseTo(2.8, 5);
  });
});

describe('createHaikuClient', () => {
  it('should target Haiku', () => {
    expect(createHaikuClient('test-secret').getModel()).toBe(HAIKU_MODEL);
  });
});
