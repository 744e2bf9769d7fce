export const ENTRY_KINDS = ['DAILY', 'START_OF_WEEK', 'END_OF_WEEK'] as const;

export type EntryKind = (typeof ENTRY_KINDS)[number];

export interface PromptAnswer {
  label: string;
  answer: string;
}

export interface JournalEntry {
  date: string; // ISO date (YYYY-MM-DD), the day the entry is about
  kind: EntryKind;
  answers: readonly PromptAnswer[];
  /** Epoch milliseconds. Audit and most-recent-wins ordering only. */
  writtenAt: number;
}

export interface StoredJournalEntry extends JournalEntry {
  id: number;
}

/**
 * Append-only entry storage. Range reads return raw history: several records may
 * share a (date, kind) key and callers decide which one is authoritative.
 */
export interface EntryStore {
  append(entry: JournalEntry): StoredJournalEntry;
  entriesInRange(
    startDate: string,
    endDate: string,
    kinds: Iterable<EntryKind>
  ): Iterable<StoredJournalEntry>;
  history(date: string, kind: EntryKind): StoredJournalEntry[];
}
