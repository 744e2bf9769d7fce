import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { ClaudeAdapter, classifyAnthropicError } from '../../adapters/llm/ClaudeAdapter.js';
import { LLMError } from '../../utils/errors.js';

// SDK error constructors differ between releases; only the prototype and fields matter here.
function sdkError(errorClass: { prototype: object }, fields: { status?: number; message: string }): unknown {
  return Object.assign(Object.create(errorClass.prototype), fields);
}

function createAdapter(create: ReturnType<typeof vi.fn>): ClaudeAdapter {
  const client = { messages: { create } } as unknown as Anthropic;
  return new ClaudeAdapter({ apiKey: 'test-key', model: 'test-model' }, client);
}

describe('classifyAnthropicError', () => {
  it('maps SDK errors to failure reasons', () => {
    expect(classifyAnthropicError(sdkError(Anthropic.AuthenticationError, { status: 401, message: 'invalid x-api-key' }))).toBe('AUTH');
    expect(classifyAnthropicError(sdkError(Anthropic.PermissionDeniedError, { status: 403, message: 'denied' }))).toBe('AUTH');
    expect(classifyAnthropicError(sdkError(Anthropic.RateLimitError, { status: 429, message: 'rate limited' }))).toBe('QUOTA');
    expect(
      classifyAnthropicError(
        sdkError(Anthropic.BadRequestError, { status: 400, message: 'Your credit balance is too low' })
      )
    ).toBe('QUOTA');
    expect(classifyAnthropicError(sdkError(Anthropic.InternalServerError, { status: 529, message: 'Overloaded' }))).toBe('NETWORK');
    expect(classifyAnthropicError(new Anthropic.APIConnectionError({ message: 'socket hang up' }))).toBe('NETWORK');
    expect(classifyAnthropicError(sdkError(Anthropic.BadRequestError, { status: 400, message: 'bad' }))).toBe('UNKNOWN');
    expect(classifyAnthropicError(new Error('other'))).toBe('UNKNOWN');
  });
});

describe('ClaudeAdapter', () => {
  it('returns the text and usage of the response', async () => {
    const create = vi.fn().mockResolvedValue({
      content: [{ type: 'text', text: '# Report' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 120, output_tokens: 40 },
    });

    const response = await createAdapter(create).generateText({ prompt: 'logs', maxTokens: 500 });

    expect(response).toEqual({ text: '# Report', usage: { inputTokens: 120, outputTokens: 40 } });
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 500,
      temperature: 0.2,
      messages: [{ role: 'user', content: 'logs' }],
    });
  });

  it('rejects a response without text as malformed', async () => {
    const create = vi.fn().mockResolvedValue({ content: [], stop_reason: 'max_tokens', usage: undefined });

    const error = await createAdapter(create)
      .generateText({ prompt: 'logs' })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(LLMError);
    expect(error instanceof LLMError && error.reason).toBe('MALFORMED_RESPONSE');
  });

  it('wraps SDK failures in a classified LLMError', async () => {
    const create = vi
      .fn()
      .mockRejectedValue(sdkError(Anthropic.AuthenticationError, { status: 401, message: 'invalid x-api-key' }));

    const error = await createAdapter(create)
      .generateText({ prompt: 'logs' })
      .catch((reason: unknown) => reason);

    expect(error instanceof LLMError && error.reason).toBe('AUTH');
    expect(create).toHaveBeenCalledTimes(1);
  });
});
