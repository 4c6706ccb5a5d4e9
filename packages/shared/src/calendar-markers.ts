import {
  addDays,
  calendarDateFromDate,
  compareCalendarDates,
  parseDayKey,
  toDayKey,
  type CalendarDate,
  type DayKey
} from './day-key';

export interface CalendarDayMarkers {
  gig: boolean;
  rehearsal: boolean;
  blockOut: boolean;
  /** Number of block-out ranges covering the day. */
  blockOutCount: number;
}

export type CalendarMarkerMap = Map<DayKey, CalendarDayMarkers>;

/** A block-out from `startDate` through `untilDate` inclusive; a missing end means one day. */
export interface BlockOutRange {
  startDate: DayKey;
  untilDate?: DayKey | null;
}

export interface DatedEntry {
  date: DayKey;
}

export function emptyDayMarkers(): CalendarDayMarkers {
  return { gig: false, rehearsal: false, blockOut: false, blockOutCount: 0 };
}

export function hasAnyMarker(markers: CalendarDayMarkers): boolean {
  return markers.gig || markers.rehearsal || markers.blockOut;
}

export function markerCount(markers: CalendarDayMarkers): number {
  return Number(markers.gig) + Number(markers.rehearsal) + Number(markers.blockOut);
}

export function expandRangeToDayKeys(range: BlockOutRange): DayKey[] {
  const start = parseDayKey(range.startDate);
  if (!range.untilDate) return [toDayKey(start)];

  const end = parseDayKey(range.untilDate);
  const keys: DayKey[] = [];
  for (let current = start; compareCalendarDates(current, end) <= 0; current = addDays(current, 1)) {
    keys.push(toDayKey(current));
  }

  // An end before the start still blocks the start day.
  return keys.length > 0 ? keys : [toDayKey(start)];
}

export function buildCalendarMarkers(input: {
  gigs: readonly DatedEntry[];
  rehearsals: readonly DatedEntry[];
  blockOuts?: readonly BlockOutRange[];
}): CalendarMarkerMap {
  const markers: CalendarMarkerMap = new Map();

  const markersFor = (key: DayKey): CalendarDayMarkers => {
    let entry = markers.get(key);
    if (!entry) {
      entry = emptyDayMarkers();
      markers.set(key, entry);
    }
    return entry;
  };

  for (const gig of input.gigs) {
    markersFor(toDayKey(parseDayKey(gig.date))).gig = true;
  }

  for (const rehearsal of input.rehearsals) {
    markersFor(toDayKey(parseDayKey(rehearsal.date))).rehearsal = true;
  }

  for (const range of input.blockOuts ?? []) {
    for (const key of expandRangeToDayKeys(range)) {
      const entry = markersFor(key);
      entry.blockOut = true;
      entry.blockOutCount += 1;
    }
  }

  return markers;
}

function keyOf(date: CalendarDate | Date): DayKey {
  return toDayKey(date instanceof Date ? calendarDateFromDate(date) : date);
}

/** Markers for a date; a day missing from the map has none. */
export function getMarkersForDate(
  markers: ReadonlyMap<DayKey, CalendarDayMarkers>,
  date: CalendarDate | Date
): CalendarDayMarkers {
  return markers.get(keyOf(date)) ?? emptyDayMarkers();
}

export function hasMarkersForDate(
  markers: ReadonlyMap<DayKey, CalendarDayMarkers>,
  date: CalendarDate | Date
): boolean {
  const entry = markers.get(keyOf(date));
  return entry ? hasAnyMarker(entry) : false;
}

/** Entries whose day falls inside the given month. */
export function markersForMonth(
  markers: ReadonlyMap<DayKey, CalendarDayMarkers>,
  year: number,
  month: number
): Record<DayKey, CalendarDayMarkers> {
  const prefix = toDayKey({ year, month, day: 1 }).slice(0, 8);
  const result: Record<DayKey, CalendarDayMarkers> = {};
  for (const [key, entry] of markers) {
    if (key.startsWith(prefix)) result[key] = entry;
  }
  return result;
}
