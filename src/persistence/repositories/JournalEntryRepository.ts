import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import type {
  EntryKind,
  EntryStore,
  JournalEntry,
  StoredJournalEntry,
} from '../../ports/JournalPort.js';
import { ENTRY_KINDS } from '../../ports/JournalPort.js';
import type { PromptSetCatalog } from '../../core/journal/promptSets.js';
import { DEFAULT_PROMPT_SETS, assertAnswersMatchPromptSet } from '../../core/journal/promptSets.js';
import { formatIsoDate, parseIsoDate } from '../../utils/dates.js';
import { EntryValidationError, StoreReadError, StoreWriteError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const journalEntryRowSchema = z.object({
  id: z.number(),
  date: z.string(),
  kind: z.enum(ENTRY_KINDS),
  answers: z.string(),
  written_at: z.number(),
});

const answersSchema = z.array(z.object({ label: z.string(), answer: z.string() }));

function rowToEntry(value: unknown): StoredJournalEntry {
  const row = journalEntryRowSchema.safeParse(value);
  const answers = row.success ? answersSchema.safeParse(safeJsonParse(row.data.answers)) : undefined;
  if (!row.success || !answers?.success) {
    throw new StoreReadError('Journal database contains a corrupt entry');
  }
  return {
    id: row.data.id,
    date: row.data.date,
    kind: row.data.kind,
    answers: answers.data,
    writtenAt: row.data.written_at,
  };
}

function normalizeEntryDate(value: string): string {
  try {
    return formatIsoDate(parseIsoDate(value));
  } catch (error) {
    throw new EntryValidationError(`Invalid entry date "${value}"`, { cause: error });
  }
}

function safeJsonParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

export class JournalEntryRepository implements EntryStore {
  private readonly logger = createLogger({ repository: 'JournalEntryRepository' });

  constructor(
    private readonly db: Database,
    private readonly promptSets: PromptSetCatalog = DEFAULT_PROMPT_SETS
  ) {}

  append(entry: JournalEntry): StoredJournalEntry {
    const date = normalizeEntryDate(entry.date);
    assertAnswersMatchPromptSet(entry.kind, entry.answers, this.promptSets);
    const answers = entry.answers.map(({ label, answer }) => ({ label, answer }));

    try {
      const result = this.db
        .prepare(
          `INSERT INTO journal_entries (date, kind, answers, written_at) VALUES (?, ?, ?, ?)`
        )
        .run(date, entry.kind, JSON.stringify(answers), entry.writtenAt);
      const stored: StoredJournalEntry = {
        id: Number(result.lastInsertRowid),
        date,
        kind: entry.kind,
        answers,
        writtenAt: entry.writtenAt,
      };
      this.logger.info({ id: stored.id, date, kind: entry.kind }, 'Journal entry appended');
      return stored;
    } catch (error) {
      this.logger.error({ error, date, kind: entry.kind }, 'Failed to append journal entry');
      throw new StoreWriteError(`Could not save ${entry.kind} entry for ${date}`, { cause: error });
    }
  }

  /**
   * Raw history in [startDate, endDate], ordered by date, written_at, id. Every
   * iteration runs the query again, so the result can be walked more than once.
   */
  entriesInRange(
    startDate: string,
    endDate: string,
    kinds: Iterable<EntryKind>
  ): Iterable<StoredJournalEntry> {
    const start = formatIsoDate(parseIsoDate(startDate));
    const end = formatIsoDate(parseIsoDate(endDate));
    const kindList = [...new Set(kinds)];
    const db = this.db;

    return {
      *[Symbol.iterator]() {
        if (kindList.length === 0) {
          return;
        }
        const placeholders = kindList.map(() => '?').join(', ');
        // Rows are stepped lazily, so SQLite errors surface from next() as well.
        try {
          const rows = db
            .prepare(
              `SELECT id, date, kind, answers, written_at FROM journal_entries
               WHERE date >= ? AND date <= ? AND kind IN (${placeholders})
               ORDER BY date ASC, written_at ASC, id ASC`
            )
            .iterate(start, end, ...kindList);
          for (const row of rows) {
            yield rowToEntry(row);
          }
        } catch (error) {
          if (error instanceof StoreReadError) {
            throw error;
          }
          throw new StoreReadError(`Could not read journal entries ${start}..${end}`, {
            cause: error,
          });
        }
      },
    };
  }

  history(date: string, kind: EntryKind): StoredJournalEntry[] {
    return [...this.entriesInRange(date, date, [kind])];
  }
}
