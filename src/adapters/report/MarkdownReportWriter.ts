import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { MonthlySelection } from '../../core/journal/PeriodSelector.js';
import { monthName } from '../../utils/dates.js';
import { ReportWriteError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface ReportWriter {
  write(period: MonthlySelection, report: string): Promise<string>;
}

export function reportFileName(period: Pick<MonthlySelection, 'year' | 'month'>): string {
  return `${period.year}-Progress-${monthName(period.month)}.md`;
}

/** Saves monthly reports as `<year>-Progress-<Month>.md`, overwriting a previous run. */
export class MarkdownReportWriter implements ReportWriter {
  private readonly logger = createLogger({ adapter: 'MarkdownReportWriter' });

  constructor(private readonly reportsDir: string) {}

  async write(period: MonthlySelection, report: string): Promise<string> {
    const filePath = join(this.reportsDir, reportFileName(period));
    try {
      await mkdir(this.reportsDir, { recursive: true });
      await writeFile(filePath, report.endsWith('\n') ? report : `${report}\n`, 'utf8');
    } catch (error) {
      this.logger.error({ error, filePath }, 'Failed to write summary report');
      throw new ReportWriteError(`Could not write summary report to ${filePath}`, { cause: error });
    }
    this.logger.info({ filePath }, 'Summary report saved');
    return filePath;
  }
}
