import type { LLMPort } from '../../ports/LLMPort.js';
import type { AggregatePayload } from './PayloadAggregator.js';
import { LLMError, SummarizationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export const NOTHING_TO_SUMMARIZE = 'No journal entries found for this period. Nothing to summarize.';

export type SummaryResult =
  | { status: 'empty'; text: string }
  | { status: 'summarized'; text: string };

export interface SummarizerOptions {
  /** Template with {{PERIOD}} and {{LOGS}} placeholders. */
  promptTemplate: string;
  maxTokens: number;
  temperature?: number;
}

export class MonthlySummarizer {
  private readonly logger = createLogger({ service: 'MonthlySummarizer' });

  constructor(
    private readonly llmPort: LLMPort,
    private readonly options: SummarizerOptions
  ) {}

  /** One external call at most, never retried. */
  async summarize(payload: AggregatePayload, periodLabel = 'this period'): Promise<SummaryResult> {
    if (payload.kind === 'empty') {
      this.logger.info({ periodLabel }, 'No entries; skipping analysis');
      return { status: 'empty', text: NOTHING_TO_SUMMARIZE };
    }

    const logger = this.logger.child({ periodLabel, entryCount: payload.entryCount });
    const prompt = this.options.promptTemplate
      .replaceAll('{{PERIOD}}', () => periodLabel)
      .replace('{{LOGS}}', () => payload.text);

    logger.info({ payloadLength: payload.text.length }, 'Sending journal payload for analysis');
    let text: string;
    try {
      const response = await this.llmPort.generateText({
        prompt,
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature ?? 0.4,
      });
      text = response.text;
    } catch (error) {
      const reason = error instanceof LLMError ? error.reason : 'UNKNOWN';
      logger.error({ error, reason }, 'Analysis call failed');
      throw new SummarizationError(reason, `Summarization failed (${reason})`, { cause: error });
    }

    if (!text.trim()) {
      logger.error('Analysis returned an empty report');
      throw new SummarizationError('MALFORMED_RESPONSE', 'Summarization failed (MALFORMED_RESPONSE): empty report');
    }

    logger.info({ reportLength: text.length }, 'Summary generated');
    return { status: 'summarized', text };
  }
}
