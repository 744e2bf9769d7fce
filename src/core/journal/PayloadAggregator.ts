import type { EntryKind, JournalEntry } from '../../ports/JournalPort.js';
import { ENTRY_KINDS } from '../../ports/JournalPort.js';
import { isoWeekLabel } from '../../utils/dates.js';

export type AggregatePayload =
  | { kind: 'empty' }
  | { kind: 'entries'; text: string; entryCount: number; startDate: string; endDate: string };

export const NO_ENTRIES_PAYLOAD: AggregatePayload = Object.freeze({ kind: 'empty' });

const KIND_HEADINGS: Readonly<Record<EntryKind, string>> = {
  DAILY: 'Daily Log',
  START_OF_WEEK: 'Start of Week',
  END_OF_WEEK: 'End of Week Review',
};

/**
 * Most-recent-wins fold over an ordered scan: for each (date, kind) the entry seen
 * last replaces earlier ones, unless it was written strictly earlier.
 */
export function collapseLatest<T extends JournalEntry>(entries: Iterable<T>): T[] {
  const latest = new Map<string, T>();
  for (const entry of entries) {
    const key = `${entry.date}|${entry.kind}`;
    const current = latest.get(key);
    if (!current || entry.writtenAt >= current.writtenAt) {
      latest.set(key, entry);
    }
  }
  return [...latest.values()].sort(compareEntries);
}

function compareEntries(a: JournalEntry, b: JournalEntry): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  return ENTRY_KINDS.indexOf(a.kind) - ENTRY_KINDS.indexOf(b.kind);
}

export function renderEntrySection(entry: JournalEntry): string {
  const heading =
    entry.kind === 'DAILY'
      ? `--- ${entry.date} · ${KIND_HEADINGS[entry.kind]} ---`
      : `--- ${entry.date} · ${KIND_HEADINGS[entry.kind]} (${isoWeekLabel(entry.date)}) ---`;
  const lines = [heading];
  for (const { label, answer } of entry.answers) {
    lines.push(`## ${label}`);
    lines.push(answer.trim() ? answer.trim() : 'N/A');
  }
  return lines.join('\n');
}

export function buildPayload(entries: Iterable<JournalEntry>): AggregatePayload {
  const collapsed = collapseLatest(entries);
  const first = collapsed[0];
  const last = collapsed[collapsed.length - 1];
  if (!first || !last) {
    return NO_ENTRIES_PAYLOAD;
  }
  return {
    kind: 'entries',
    text: collapsed.map(renderEntrySection).join('\n\n') + '\n',
    entryCount: collapsed.length,
    startDate: first.date,
    endDate: last.date,
  };
}
