import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MarkdownReportWriter, reportFileName } from '../../adapters/report/MarkdownReportWriter.js';
import { selectMonth } from '../../core/journal/PeriodSelector.js';
import { ReportWriteError } from '../../utils/errors.js';

describe('MarkdownReportWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'journal-reports-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names reports by year and month', () => {
    expect(reportFileName({ year: 2024, month: 5 })).toBe('2024-Progress-May.md');
  });

  it('writes the report into the reports directory', async () => {
    const reportsDir = join(dir, 'reports');
    const writer = new MarkdownReportWriter(reportsDir);

    const path = await writer.write(selectMonth(5, '2024-06-10'), '# May report');

    expect(path).toBe(join(reportsDir, '2024-Progress-May.md'));
    expect(readFileSync(path, 'utf8')).toBe('# May report\n');
  });

  it('overwrites the report of an earlier run', async () => {
    const writer = new MarkdownReportWriter(dir);
    const period = selectMonth(5, '2024-06-10');

    await writer.write(period, 'first\n');
    const path = await writer.write(period, 'second\n');

    expect(readFileSync(path, 'utf8')).toBe('second\n');
  });

  it('raises ReportWriteError when the directory cannot be created', async () => {
    const blocker = join(dir, 'file');
    writeFileSync(blocker, 'x');
    const writer = new MarkdownReportWriter(join(blocker, 'reports'));

    await expect(writer.write(selectMonth(5, '2024-06-10'), 'report')).rejects.toThrow(ReportWriteError);
  });
});
