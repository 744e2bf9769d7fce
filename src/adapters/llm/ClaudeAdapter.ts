import Anthropic from '@anthropic-ai/sdk';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';
import type { SummarizationFailureReason } from '../../utils/errors.js';

export interface ClaudeAdapterOptions {
  apiKey: string;
  model: string;
}

/** Maps SDK failures onto the reasons a user can act on. */
export function classifyAnthropicError(error: unknown): SummarizationFailureReason {
  if (error instanceof Anthropic.APIConnectionError) {
    return 'NETWORK';
  }
  if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
    return 'AUTH';
  }
  if (error instanceof Anthropic.RateLimitError) {
    return 'QUOTA';
  }
  if (error instanceof Anthropic.APIError) {
    // Billing problems come back as 400 with a credit balance message.
    if (error.status === 400 && /credit balance/i.test(error.message)) {
      return 'QUOTA';
    }
    if (typeof error.status === 'number' && error.status >= 500) {
      return 'NETWORK';
    }
  }
  return 'UNKNOWN';
}

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: ClaudeAdapterOptions, client?: Anthropic) {
    // The SDK retries twice by default; a summary run makes exactly one request.
    this.client = client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model;
    this.logger.debug({ model: this.model }, 'Claude adapter initialized');
  }

  async generateText(request: LLMRequest): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateText' });
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens ?? 800,
        temperature: request.temperature ?? 0.2,
        ...(request.systemPrompt?.trim() ? { system: request.systemPrompt } : {}),
        messages: [
          {
            role: 'user',
            content: request.prompt,
          },
        ],
      });
    } catch (error) {
      const reason = classifyAnthropicError(error);
      logger.error({ error, reason }, 'Claude text generation failed');
      throw new LLMError('Claude text generation failed', reason, { cause: error });
    }

    const text = extractText(response);
    if (text === undefined) {
      logger.error({ stopReason: response.stop_reason }, 'Claude response had no text block');
      throw new LLMError('Claude response had no text content', 'MALFORMED_RESPONSE');
    }

    const usage = response.usage
      ? { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens }
      : undefined;
    logger.debug({ usage }, 'Claude generation completed');
    return { text, usage };
  }
}

function extractText(response: Anthropic.Message): string | undefined {
  if (!Array.isArray(response.content)) {
    return undefined;
  }
  const parts = response.content.flatMap((block) => (block.type === 'text' ? [block.text] : []));
  return parts.length > 0 ? parts.join('') : undefined;
}
