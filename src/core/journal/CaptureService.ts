import type { EntryStore, StoredJournalEntry } from '../../ports/JournalPort.js';
import type { PromptSource } from '../../ports/PromptPort.js';
import type { CaptureRequestType } from './PeriodSelector.js';
import { captureKind, selectPeriod } from './PeriodSelector.js';
import type { PromptSetCatalog } from './promptSets.js';
import { DEFAULT_PROMPT_SETS, PROMPT_SET_TITLES, pairAnswers } from './promptSets.js';
import { createLogger } from '../../utils/logger.js';

export class CaptureService {
  private readonly logger = createLogger({ service: 'CaptureService' });

  constructor(
    private readonly entryStore: EntryStore,
    private readonly promptSource: PromptSource,
    private readonly promptSets: PromptSetCatalog = DEFAULT_PROMPT_SETS,
    private readonly clock: () => number = Date.now
  ) {}

  /** Asks the kind's prompt set and appends the answers as a new entry for `referenceDate`. */
  async capture(command: CaptureRequestType, referenceDate: string): Promise<StoredJournalEntry> {
    const kind = captureKind(command);
    const date = selectPeriod({ type: command }, referenceDate).startDate;
    const logger = this.logger.child({ kind, date });

    const previous = this.entryStore.history(date, kind);
    if (previous.length > 0) {
      this.promptSource.note(
        `Found ${previous.length} earlier ${PROMPT_SET_TITLES[kind].toLowerCase()} record(s) for ${date}; this one will supersede them.`
      );
    }

    const rawAnswers = await this.promptSource.ask(
      `${PROMPT_SET_TITLES[kind]} · ${date}`,
      this.promptSets[kind]
    );
    const answers = pairAnswers(kind, rawAnswers, this.promptSets);

    const entry = this.entryStore.append({ date, kind, answers, writtenAt: this.clock() });
    logger.info({ id: entry.id, superseded: previous.length }, 'Entry captured');
    return entry;
  }
}
