import type { EntryKind, PromptAnswer } from '../../ports/JournalPort.js';
import type { PromptDefinition } from '../../ports/PromptPort.js';
import { EntryValidationError } from '../../utils/errors.js';

export type PromptSetCatalog = Readonly<Record<EntryKind, readonly PromptDefinition[]>>;

const LIST_HINT = 'Separate items with ";"';

export const DEFAULT_PROMPT_SETS: PromptSetCatalog = {
  DAILY: [
    { label: 'What I did', hint: LIST_HINT },
    { label: "What's next", hint: LIST_HINT },
    { label: 'What broke or got weird', hint: LIST_HINT },
    { label: 'Productivity score (1-5)' },
    { label: 'Quick insights', hint: 'Optional' },
  ],
  START_OF_WEEK: [
    { label: 'My goals for the week', hint: 'One, two or three goals' },
    { label: 'Next steps', hint: LIST_HINT },
    { label: 'Other tasks', hint: LIST_HINT },
  ],
  END_OF_WEEK: [
    { label: 'What went well?' },
    { label: 'What are you happy about?' },
    { label: 'What made you laugh?' },
    { label: 'Progress observed' },
  ],
};

export const PROMPT_SET_TITLES: Readonly<Record<EntryKind, string>> = {
  DAILY: 'Daily log',
  START_OF_WEEK: 'Start of week planning',
  END_OF_WEEK: 'End of week review',
};

/** Pairs raw answers with the kind's labels. Answer count must match exactly. */
export function pairAnswers(
  kind: EntryKind,
  answers: readonly string[],
  catalog: PromptSetCatalog = DEFAULT_PROMPT_SETS
): PromptAnswer[] {
  const prompts = catalog[kind];
  if (answers.length !== prompts.length) {
    throw new EntryValidationError(
      `${kind} expects ${prompts.length} answers, got ${answers.length}`
    );
  }
  return prompts.map((prompt, index) => ({ label: prompt.label, answer: answers[index] ?? '' }));
}

export function assertAnswersMatchPromptSet(
  kind: EntryKind,
  answers: readonly PromptAnswer[],
  catalog: PromptSetCatalog = DEFAULT_PROMPT_SETS
): void {
  const expected = catalog[kind].map((prompt) => prompt.label);
  const actual = answers.map((answer) => answer.label);
  const matches =
    expected.length === actual.length && expected.every((label, index) => label === actual[index]);
  if (!matches) {
    throw new EntryValidationError(
      `${kind} answers must use the labels [${expected.join(', ')}], got [${actual.join(', ')}]`
    );
  }
}
