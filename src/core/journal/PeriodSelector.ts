import type { EntryKind } from '../../ports/JournalPort.js';
import { ENTRY_KINDS } from '../../ports/JournalPort.js';
import { daysInMonth, formatIsoDate, monthName, parseIsoDate } from '../../utils/dates.js';
import { InvalidPeriodError } from '../../utils/errors.js';

export type PeriodRequest =
  | { type: 'DAILY' }
  | { type: 'WEEK_START' }
  | { type: 'WEEK_END' }
  | { type: 'MONTHLY'; month?: number };

export interface PeriodSelection {
  startDate: string;
  endDate: string;
  kinds: readonly EntryKind[];
  /** Human label, e.g. "2024-05-03" or "May 2024". */
  label: string;
}

export interface MonthlySelection extends PeriodSelection {
  year: number;
  month: number;
}

const CAPTURE_KINDS = {
  DAILY: 'DAILY',
  WEEK_START: 'START_OF_WEEK',
  WEEK_END: 'END_OF_WEEK',
} as const satisfies Record<Exclude<PeriodRequest['type'], 'MONTHLY'>, EntryKind>;

export type CaptureRequestType = keyof typeof CAPTURE_KINDS;

export function captureKind(type: CaptureRequestType): EntryKind {
  return CAPTURE_KINDS[type];
}

export function selectPeriod(request: { type: 'MONTHLY'; month?: number }, referenceDate: string): MonthlySelection;
export function selectPeriod(request: PeriodRequest, referenceDate: string): PeriodSelection;
export function selectPeriod(request: PeriodRequest, referenceDate: string): PeriodSelection {
  if (request.type === 'MONTHLY') {
    return selectMonth(request.month, referenceDate);
  }
  const date = formatIsoDate(parseIsoDate(referenceDate));
  return {
    startDate: date,
    endDate: date,
    kinds: [CAPTURE_KINDS[request.type]],
    label: date,
  };
}

/**
 * Without a month: the previous full calendar month. With a month: that month of
 * the reference date's year, even when it lies in the future.
 */
export function selectMonth(month: number | undefined, referenceDate: string): MonthlySelection {
  if (month !== undefined && !isValidMonth(month)) {
    throw new InvalidPeriodError(
      `Invalid month number "${month}". Please provide a number between 1 and 12.`
    );
  }
  const reference = parseIsoDate(referenceDate);

  let year = reference.year;
  let target: number;
  if (month === undefined) {
    target = reference.month === 1 ? 12 : reference.month - 1;
    if (reference.month === 1) {
      year -= 1;
    }
  } else {
    target = month;
  }

  return {
    startDate: formatIsoDate({ year, month: target, day: 1 }),
    endDate: formatIsoDate({ year, month: target, day: daysInMonth(year, target) }),
    kinds: ENTRY_KINDS,
    label: `${monthName(target)} ${year}`,
    year,
    month: target,
  };
}

export function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}
