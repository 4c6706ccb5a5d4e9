import type { BlockOutSpan } from './block-out-spans';
import { compareCalendarDates, parseDayKey, toDayKey, type CalendarDate } from './day-key';
import type { CalendarEventKind, Gig, Rehearsal } from './schemas';
import { parseTimeOfDayMinutes } from './time-of-day';

interface CalendarEventBase {
  id: string;
  kind: CalendarEventKind;
  date: CalendarDate;
  /** Empty for block-outs, which last all day. */
  startTime: string;
  endTime: string;
  title: string;
  location: string;
  notes: string | null;
}

export interface GigCalendarEvent extends CalendarEventBase {
  kind: 'GIG';
  gig: Gig;
}

export interface RehearsalCalendarEvent extends CalendarEventBase {
  kind: 'REHEARSAL';
  rehearsal: Rehearsal;
}

export interface BlockOutCalendarEvent extends CalendarEventBase {
  kind: 'BLOCK_OUT';
  blockOutSpan: BlockOutSpan;
}

export type CalendarEvent = GigCalendarEvent | RehearsalCalendarEvent | BlockOutCalendarEvent;

export function calendarEventFromGig(gig: Gig): GigCalendarEvent {
  return {
    id: gig.id,
    kind: 'GIG',
    date: parseDayKey(gig.date),
    startTime: gig.startTime,
    endTime: gig.endTime,
    title: gig.name,
    location: gig.location,
    notes: gig.notes,
    gig
  };
}

export function calendarEventFromRehearsal(rehearsal: Rehearsal): RehearsalCalendarEvent {
  return {
    id: rehearsal.id,
    kind: 'REHEARSAL',
    date: parseDayKey(rehearsal.date),
    startTime: rehearsal.startTime,
    endTime: rehearsal.endTime,
    title: 'Rehearsal',
    location: rehearsal.location,
    notes: rehearsal.notes,
    rehearsal
  };
}

export function calendarEventFromBlockOutSpan(span: BlockOutSpan): BlockOutCalendarEvent {
  return {
    id: `${span.userId}_${toDayKey(span.startDate)}`,
    kind: 'BLOCK_OUT',
    date: span.startDate,
    startTime: '',
    endTime: '',
    title: `${span.userName} Out`,
    location: '',
    notes: span.reason ? span.reason : null,
    blockOutSpan: span
  };
}

export function isGig(event: CalendarEvent): event is GigCalendarEvent {
  return event.kind === 'GIG';
}

export function isRehearsal(event: CalendarEvent): event is RehearsalCalendarEvent {
  return event.kind === 'REHEARSAL';
}

export function isBlockOut(event: CalendarEvent): event is BlockOutCalendarEvent {
  return event.kind === 'BLOCK_OUT';
}

export function isPotentialGig(event: CalendarEvent): boolean {
  return isGig(event) && event.gig.isPotential;
}

/** Last day covered by a multi-day block-out, or `null` for everything else. */
export function eventEndDate(event: CalendarEvent): CalendarDate | null {
  if (!isBlockOut(event)) return null;
  return event.blockOutSpan.dayCount > 1 ? event.blockOutSpan.endDate : null;
}

/**
 * Date ascending, then start time ascending. Events without a parsable start
 * time (block-outs among them) come after the timed events of their day.
 */
export function compareCalendarEvents(a: CalendarEvent, b: CalendarEvent): number {
  const byDate = compareCalendarDates(a.date, b.date);
  if (byDate !== 0) return byDate;

  const aMinutes = parseTimeOfDayMinutes(a.startTime);
  const bMinutes = parseTimeOfDayMinutes(b.startTime);
  if (aMinutes === null && bMinutes === null) return 0;
  if (aMinutes === null) return 1;
  if (bMinutes === null) return -1;
  return aMinutes - bMinutes;
}

export function sortCalendarEvents(events: readonly CalendarEvent[]): CalendarEvent[] {
  return [...events].sort(compareCalendarEvents);
}

export function mergeCalendarEvents(input: {
  gigs: readonly Gig[];
  rehearsals: readonly Rehearsal[];
  blockOutSpans: readonly BlockOutSpan[];
}): CalendarEvent[] {
  return sortCalendarEvents([
    ...input.gigs.map(calendarEventFromGig),
    ...input.rehearsals.map(calendarEventFromRehearsal),
    ...input.blockOutSpans.map(calendarEventFromBlockOutSpan)
  ]);
}
