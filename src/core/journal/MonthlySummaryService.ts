import type { EntryStore } from '../../ports/JournalPort.js';
import type { ReportWriter } from '../../adapters/report/MarkdownReportWriter.js';
import type { MonthlySelection } from './PeriodSelector.js';
import { selectMonth } from './PeriodSelector.js';
import type { AggregatePayload } from './PayloadAggregator.js';
import { buildPayload } from './PayloadAggregator.js';
import type { MonthlySummarizer, SummaryResult } from './MonthlySummarizer.js';
import { createLogger } from '../../utils/logger.js';

export interface MonthlySummaryOutcome {
  period: MonthlySelection;
  payload: AggregatePayload;
  summary: SummaryResult;
  reportPath?: string;
}

export class MonthlySummaryService {
  private readonly logger = createLogger({ service: 'MonthlySummaryService' });

  constructor(
    private readonly entryStore: EntryStore,
    private readonly summarizer: MonthlySummarizer,
    private readonly reportWriter?: ReportWriter
  ) {}

  /** Selects the month, aggregates its entries and asks for one report. */
  async run(month: number | undefined, referenceDate: string): Promise<MonthlySummaryOutcome> {
    const period = selectMonth(month, referenceDate);
    const logger = this.logger.child({ period: period.label });

    const entries = this.entryStore.entriesInRange(period.startDate, period.endDate, period.kinds);
    const payload = buildPayload(entries);
    logger.info(
      { entryCount: payload.kind === 'entries' ? payload.entryCount : 0 },
      'Aggregated journal entries'
    );

    const summary = await this.summarizer.summarize(payload, period.label);
    if (summary.status === 'empty' || !this.reportWriter) {
      return { period, payload, summary };
    }

    const reportPath = await this.reportWriter.write(period, summary.text);
    return { period, payload, summary, reportPath };
  }
}
