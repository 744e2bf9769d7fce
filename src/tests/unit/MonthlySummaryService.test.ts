import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { MonthlySummaryService } from '../../core/journal/MonthlySummaryService.js';
import { MonthlySummarizer, NOTHING_TO_SUMMARIZE } from '../../core/journal/MonthlySummarizer.js';
import type { PromptSetCatalog } from '../../core/journal/promptSets.js';
import { closeDatabase, openDatabase } from '../../persistence/database.js';
import { JournalEntryRepository } from '../../persistence/repositories/JournalEntryRepository.js';
import type { ReportWriter } from '../../adapters/report/MarkdownReportWriter.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import { ENTRY_KINDS } from '../../ports/JournalPort.js';
import { InvalidPeriodError, LLMError, SummarizationError } from '../../utils/errors.js';

const catalog: PromptSetCatalog = {
  DAILY: [{ label: 'done' }, { label: 'blocked' }, { label: 'tomorrow' }],
  START_OF_WEEK: [{ label: 'goals' }],
  END_OF_WEEK: [{ label: 'went well' }, { label: 'progress' }],
};

const expectedMayPayload = [
  '--- 2024-05-03 · Daily Log ---',
  '## done',
  'shipped X',
  '## blocked',
  'none',
  '## tomorrow',
  'ship Y',
  '',
  '--- 2024-05-05 · End of Week Review (2024-W18) ---',
  '## went well',
  'demo landed',
  '## progress',
  'N/A',
  '',
].join('\n');

describe('MonthlySummaryService', () => {
  let db: Database.Database;
  let repo: JournalEntryRepository;
  let llmPort: LLMPort;
  let reportWriter: ReportWriter;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repo = new JournalEntryRepository(db, catalog);
    llmPort = { generateText: vi.fn().mockResolvedValue({ text: '# May report' }) };
    reportWriter = { write: vi.fn().mockResolvedValue('/reports/2024-Progress-May.md') };

    repo.append({
      date: '2024-04-30',
      kind: 'DAILY',
      answers: [
        { label: 'done', answer: 'april work' },
        { label: 'blocked', answer: '' },
        { label: 'tomorrow', answer: '' },
      ],
      writtenAt: 1,
    });
    repo.append({
      date: '2024-05-03',
      kind: 'DAILY',
      answers: [
        { label: 'done', answer: 'shipped X' },
        { label: 'blocked', answer: 'none' },
        { label: 'tomorrow', answer: 'ship Y' },
      ],
      writtenAt: 2,
    });
    repo.append({
      date: '2024-05-05',
      kind: 'END_OF_WEEK',
      answers: [
        { label: 'went well', answer: 'demo landed' },
        { label: 'progress', answer: '' },
      ],
      writtenAt: 3,
    });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  function createService(writer?: ReportWriter): MonthlySummaryService {
    const summarizer = new MonthlySummarizer(llmPort, {
      promptTemplate: '{{PERIOD}}\n{{LOGS}}',
      maxTokens: 4000,
    });
    return new MonthlySummaryService(repo, summarizer, writer);
  }

  it('summarizes the requested month with one analysis call', async () => {
    const outcome = await createService().run(5, '2024-06-10');

    expect(outcome.period.label).toBe('May 2024');
    expect(outcome.payload).toEqual({
      kind: 'entries',
      text: expectedMayPayload,
      entryCount: 2,
      startDate: '2024-05-03',
      endDate: '2024-05-05',
    });
    expect(outcome.summary).toEqual({ status: 'summarized', text: '# May report' });
    expect(outcome.reportPath).toBeUndefined();
    expect(llmPort.generateText).toHaveBeenCalledTimes(1);
    expect(llmPort.generateText).toHaveBeenCalledWith(
      expect.objectContaining({ prompt: `May 2024\n${expectedMayPayload}` })
    );
  });

  it('defaults to the previous month and returns the empty result when it has no entries', async () => {
    const outcome = await createService(reportWriter).run(undefined, '2024-01-15');

    expect(outcome.period.startDate).toBe('2023-12-01');
    expect(outcome.period.endDate).toBe('2023-12-31');
    expect(outcome.summary).toEqual({ status: 'empty', text: NOTHING_TO_SUMMARIZE });
    expect(llmPort.generateText).not.toHaveBeenCalled();
    expect(reportWriter.write).not.toHaveBeenCalled();
  });

  it('saves the report when a writer is configured', async () => {
    const outcome = await createService(reportWriter).run(5, '2024-06-10');

    expect(outcome.reportPath).toBe('/reports/2024-Progress-May.md');
    expect(reportWriter.write).toHaveBeenCalledWith(outcome.period, '# May report');
  });

  it('surfaces an authentication failure and leaves the store unmodified', async () => {
    llmPort.generateText = vi.fn().mockRejectedValue(new LLMError('Claude text generation failed', 'AUTH'));
    const before = [...repo.entriesInRange('2024-01-01', '2024-12-31', ENTRY_KINDS)];

    const error = await createService(reportWriter)
      .run(5, '2024-06-10')
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(SummarizationError);
    expect(error instanceof SummarizationError && error.reason).toBe('AUTH');
    expect([...repo.entriesInRange('2024-01-01', '2024-12-31', ENTRY_KINDS)]).toEqual(before);
    expect(reportWriter.write).not.toHaveBeenCalled();
  });

  it('fails on an invalid month before reading or calling anything', async () => {
    const entriesInRange = vi.spyOn(repo, 'entriesInRange');

    await expect(createService().run(13, '2024-06-10')).rejects.toThrow(InvalidPeriodError);
    expect(entriesInRange).not.toHaveBeenCalled();
    expect(llmPort.generateText).not.toHaveBeenCalled();
  });
});
