import {
  addDays,
  daysBetweenInclusive,
  isNextDay,
  parseDayKey,
  toDayKey,
  type CalendarDate
} from './day-key';
import type { BlockOutRecord } from './schemas';

export const FALLBACK_MEMBER_NAME = 'Member';

/** A maximal run of consecutive block-out days for one member and one reason. */
export interface BlockOutSpan {
  startDate: CalendarDate;
  endDate: CalendarDate;
  reason: string;
  userId: string;
  userName: string;
  dayCount: number;
  sourceIds: string[];
}

export type UserNameLookup = ReadonlyMap<string, string>;

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareByUserThenDate(a: BlockOutRecord, b: BlockOutRecord): number {
  return compareCodeUnits(a.userId, b.userId) || compareCodeUnits(a.date, b.date);
}

interface OpenSpan {
  first: BlockOutRecord;
  end: CalendarDate;
  sourceIds: string[];
}

function closeSpan(open: OpenSpan, userNames: UserNameLookup): BlockOutSpan {
  const startDate = parseDayKey(open.first.date);
  return {
    startDate,
    endDate: open.end,
    reason: open.first.reason,
    userId: open.first.userId,
    userName: userNames.get(open.first.userId) ?? FALLBACK_MEMBER_NAME,
    dayCount: daysBetweenInclusive(startDate, open.end),
    sourceIds: open.sourceIds
  };
}

/**
 * Coalesces per-day block-out rows into spans. Rows are sorted by member and
 * date so that each member's streaks are contiguous, then scanned once.
 *
 * Reasons are compared exactly: `"vacation"` and `"vacation "` start separate spans.
 */
export function groupBlockOutsIntoSpans(
  records: readonly BlockOutRecord[],
  userNames: UserNameLookup = new Map()
): BlockOutSpan[] {
  const sorted = [...records].sort(compareByUserThenDate);
  const spans: BlockOutSpan[] = [];
  let open: OpenSpan | null = null;

  for (const record of sorted) {
    const date = parseDayKey(record.date);

    if (
      open &&
      record.userId === open.first.userId &&
      record.reason === open.first.reason &&
      isNextDay(open.end, date)
    ) {
      open.end = date;
      open.sourceIds.push(record.id);
      continue;
    }

    if (open) spans.push(closeSpan(open, userNames));
    open = { first: record, end: date, sourceIds: [record.id] };
  }

  if (open) spans.push(closeSpan(open, userNames));

  return spans;
}

export function isMultiDaySpan(span: BlockOutSpan): boolean {
  return span.dayCount > 1;
}

/** Expands a span back into one record per covered day. */
export function expandSpanToRecords(span: BlockOutSpan, bandId: string): BlockOutRecord[] {
  const records: BlockOutRecord[] = [];

  for (let offset = 0; offset < span.dayCount; offset += 1) {
    const date = toDayKey(addDays(span.startDate, offset));
    records.push({
      id: span.sourceIds[offset] ?? `${span.userId}_${date}`,
      userId: span.userId,
      bandId,
      date,
      reason: span.reason
    });
  }

  return records;
}
