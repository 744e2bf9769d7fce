import { Command, InvalidArgumentError, Option } from 'commander';
import type { Config } from '../config/index.js';
import { loadConfig, requireAnthropicApiKey } from '../config/index.js';
import type { EntryStore } from '../ports/JournalPort.js';
import { ENTRY_KINDS } from '../ports/JournalPort.js';
import type { LLMPort } from '../ports/LLMPort.js';
import type { PromptSource } from '../ports/PromptPort.js';
import { ClaudeAdapter } from '../adapters/llm/ClaudeAdapter.js';
import { ClackPromptAdapter } from '../adapters/prompt/ClackPromptAdapter.js';
import type { ReportWriter } from '../adapters/report/MarkdownReportWriter.js';
import { MarkdownReportWriter } from '../adapters/report/MarkdownReportWriter.js';
import type { OpenDatabaseOptions } from '../persistence/database.js';
import { closeDatabase, openDatabase } from '../persistence/database.js';
import { JournalEntryRepository } from '../persistence/repositories/JournalEntryRepository.js';
import { CaptureService } from '../core/journal/CaptureService.js';
import type { CaptureRequestType } from '../core/journal/PeriodSelector.js';
import { isValidMonth } from '../core/journal/PeriodSelector.js';
import { MonthlySummarizer } from '../core/journal/MonthlySummarizer.js';
import { MonthlySummaryService } from '../core/journal/MonthlySummaryService.js';
import { buildPayload, renderEntrySection } from '../core/journal/PayloadAggregator.js';
import { formatIsoDate, parseIsoDate, todayIn } from '../utils/dates.js';
import { JournalError, SummarizationError } from '../utils/errors.js';
import type { SummarizationFailureReason } from '../utils/errors.js';
import { MONTHLY_SUMMARY_PROMPT, loadPrompt } from '../utils/prompts.js';

export interface StoreHandle {
  store: EntryStore;
  close(): void;
}

/** Everything a command touches outside its own process memory. */
export interface CliRuntime {
  loadConfig(): Config;
  openStore(databasePath: string, options: OpenDatabaseOptions): StoreHandle;
  createPromptSource(): PromptSource;
  createLLM(config: Config): LLMPort;
  createReportWriter(reportsDir: string): ReportWriter;
  loadSummaryPrompt(): Promise<string>;
  now(): Date;
  print(text: string): void;
}

export const defaultRuntime: CliRuntime = {
  loadConfig: () => loadConfig(),
  openStore: (databasePath, options) => {
    const db = openDatabase(databasePath, options);
    return { store: new JournalEntryRepository(db), close: () => closeDatabase(db) };
  },
  createPromptSource: () => new ClackPromptAdapter(),
  createLLM: (config) =>
    new ClaudeAdapter({ apiKey: requireAnthropicApiKey(config), model: config.llmSummaryModel }),
  createReportWriter: (reportsDir) => new MarkdownReportWriter(reportsDir),
  loadSummaryPrompt: () => loadPrompt(MONTHLY_SUMMARY_PROMPT),
  now: () => new Date(),
  print: (text) => {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  },
};

export const NO_ENTRIES_IN_RANGE = 'No journal entries found for this range.';

const REASON_HINTS: Readonly<Record<SummarizationFailureReason, string>> = {
  AUTH: 'Check that ANTHROPIC_API_KEY is set to a valid key.',
  NETWORK: 'The analysis service could not be reached. Try again later.',
  QUOTA: 'Rate limit or quota reached. Try again later or check your plan.',
  MALFORMED_RESPONSE: 'The analysis service returned something unexpected.',
  UNKNOWN: 'See the log output for details.',
};

export function formatCliError(error: unknown): string {
  if (error instanceof SummarizationError) {
    return `Error [${error.reason}]: ${error.message}\n${REASON_HINTS[error.reason]}`;
  }
  if (error instanceof JournalError) {
    return `Error: ${error.message}`;
  }
  return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
}

export function parseMonthArgument(value: string): number {
  const month = Number(value);
  if (!/^\d+$/.test(value.trim()) || !isValidMonth(month)) {
    throw new InvalidArgumentError(
      `Invalid month number "${value}". Please provide a number between 1 and 12.`
    );
  }
  return month;
}

function parseDateOption(value: string): string {
  try {
    return formatIsoDate(parseIsoDate(value));
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(value));
  }
}

interface GlobalOptions {
  db?: string;
}

// Only capture commands write; summary and show open the store read-only.
const READ_ONLY: OpenDatabaseOptions = { readonly: true };
const WRITABLE: OpenDatabaseOptions = { readonly: false };

function withStore<T>(
  runtime: CliRuntime,
  config: Config,
  dbPath: string | undefined,
  access: OpenDatabaseOptions,
  fn: (store: EntryStore) => T
): T {
  const handle = runtime.openStore(dbPath ?? config.databasePath, access);
  try {
    return fn(handle.store);
  } finally {
    handle.close();
  }
}

async function withStoreAsync<T>(
  runtime: CliRuntime,
  config: Config,
  dbPath: string | undefined,
  access: OpenDatabaseOptions,
  fn: (store: EntryStore) => Promise<T>
): Promise<T> {
  const handle = runtime.openStore(dbPath ?? config.databasePath, access);
  try {
    return await fn(handle.store);
  } finally {
    handle.close();
  }
}

export function createProgram(runtime: CliRuntime = defaultRuntime): Command {
  const program = new Command();

  program
    .name('journal')
    .description('Structured work journal with monthly AI summaries')
    .version('0.1.0')
    .option('--db <path>', 'Journal database file (overrides DATABASE_PATH)');

  const captureCommands: Array<{ name: string; type: CaptureRequestType; description: string }> = [
    { name: 'daily', type: 'DAILY', description: 'Answer the daily log questions' },
    { name: 'sow', type: 'WEEK_START', description: 'Answer the start of week planning questions' },
    { name: 'eow', type: 'WEEK_END', description: 'Answer the end of week review questions' },
  ];

  for (const { name, type, description } of captureCommands) {
    program
      .command(name)
      .description(description)
      .option('-d, --date <date>', 'Day the entry is about (YYYY-MM-DD, default today)', parseDateOption)
      .action(async (options: { date?: string }) => {
        const globals = program.opts<GlobalOptions>();
        const config = runtime.loadConfig();
        const date = options.date ?? todayIn(config.timezone, runtime.now());
        const promptSource = runtime.createPromptSource();
        const entry = await withStoreAsync(runtime, config, globals.db, WRITABLE, (store) =>
          new CaptureService(store, promptSource).capture(type, date)
        );
        runtime.print(`Saved ${entry.kind} entry for ${entry.date}.`);
      });
  }

  program
    .command('summary')
    .description(
      'Summarize a month of entries. Without MONTH, summarizes the previous full month; ' +
        'MONTH (1-12) refers to the current year.'
    )
    .argument('[month]', 'Month number 1-12', parseMonthArgument)
    .option('--no-save', 'Print the report without saving it to REPORTS_DIR')
    .action(async (month: number | undefined, options: { save: boolean }) => {
      const globals = program.opts<GlobalOptions>();
      const config = runtime.loadConfig();
      const llm = runtime.createLLM(config);
      const template = await runtime.loadSummaryPrompt();
      const summarizer = new MonthlySummarizer(llm, {
        promptTemplate: template,
        maxTokens: config.llmSummaryMaxTokens,
      });
      const reportWriter =
        options.save && config.reportsDir ? runtime.createReportWriter(config.reportsDir) : undefined;
      const referenceDate = todayIn(config.timezone, runtime.now());

      const outcome = await withStoreAsync(runtime, config, globals.db, READ_ONLY, (store) =>
        new MonthlySummaryService(store, summarizer, reportWriter).run(month, referenceDate)
      );
      runtime.print(outcome.summary.text);
      if (outcome.reportPath) {
        runtime.print(`Report saved to ${outcome.reportPath}`);
      }
    });

  program
    .command('show')
    .description('Print the entries of a date range as they would be sent for summarization')
    .addOption(new Option('--from <date>', 'First day (YYYY-MM-DD, default today)').argParser(parseDateOption))
    .addOption(new Option('--to <date>', 'Last day (YYYY-MM-DD, default --from)').argParser(parseDateOption))
    .option('--all', 'Include superseded records')
    .action((options: { from?: string; to?: string; all?: boolean }) => {
      const globals = program.opts<GlobalOptions>();
      const config = runtime.loadConfig();
      const from = options.from ?? todayIn(config.timezone, runtime.now());
      const to = options.to ?? from;

      const text = withStore(runtime, config, globals.db, READ_ONLY, (store) => {
        const entries = store.entriesInRange(from, to, ENTRY_KINDS);
        if (options.all) {
          const sections = [...entries].map(
            (entry) => `${renderEntrySection(entry)}\n(written ${new Date(entry.writtenAt).toISOString()})`
          );
          return sections.length > 0 ? sections.join('\n\n') : NO_ENTRIES_IN_RANGE;
        }
        const payload = buildPayload(entries);
        return payload.kind === 'entries' ? payload.text : NO_ENTRIES_IN_RANGE;
      });
      runtime.print(text);
    });

  return program;
}
