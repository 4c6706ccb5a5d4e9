import { groupBlockOutsIntoSpans, type BlockOutSpan } from './block-out-spans';
import { isBlockOut, isGig, isRehearsal, mergeCalendarEvents, type CalendarEvent } from './calendar-events';
import { buildCalendarMarkers, type CalendarMarkerMap } from './calendar-markers';
import { toDayKey } from './day-key';
import { CalendarFetchError, describeError, NoBandSelectedError } from './errors';
import type { BlockOutRecord, Gig, Rehearsal } from './schemas';

/** Remote reads the calendar is built from. */
export interface CalendarDataSource {
  fetchGigsForBand(bandId: string): Promise<Gig[]>;
  fetchRehearsalsForBand(bandId: string): Promise<Rehearsal[]>;
  fetchBlockOutsForBand(bandId: string): Promise<BlockOutRecord[]>;
  /** Best effort; ids missing from the result fall back to "Member". */
  resolveUserDisplayNames(userIds: string[]): Promise<Map<string, string>>;
}

export interface CalendarLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
}

export const silentCalendarLogger: CalendarLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined
};

export interface BandCalendar {
  bandId: string;
  events: CalendarEvent[];
  markers: CalendarMarkerMap;
  counts: {
    gigs: number;
    rehearsals: number;
    blockOuts: number;
    blockOutSpans: number;
  };
}

async function resolveNames(
  source: CalendarDataSource,
  blockOuts: readonly BlockOutRecord[],
  logger: CalendarLogger
): Promise<Map<string, string>> {
  if (blockOuts.length === 0) return new Map();

  const userIds = [...new Set(blockOuts.map((record) => record.userId))];
  try {
    return await source.resolveUserDisplayNames(userIds);
  } catch (error) {
    logger.warn('Failed to resolve block-out member names', { userIds: userIds.length, error: describeError(error) });
    return new Map();
  }
}

/**
 * Fetches a band's gigs, rehearsals and block-outs and derives its calendar.
 * All three fetches must succeed; name lookup may fail without failing the load.
 */
export async function loadBandCalendar(
  source: CalendarDataSource,
  bandId: string,
  options: { logger?: CalendarLogger } = {}
): Promise<BandCalendar> {
  if (!bandId) throw new NoBandSelectedError();
  const logger = options.logger ?? silentCalendarLogger;

  let gigs: Gig[];
  let rehearsals: Rehearsal[];
  let blockOuts: BlockOutRecord[];
  try {
    [gigs, rehearsals, blockOuts] = await Promise.all([
      source.fetchGigsForBand(bandId),
      source.fetchRehearsalsForBand(bandId),
      source.fetchBlockOutsForBand(bandId)
    ]);
  } catch (error) {
    throw new CalendarFetchError(error);
  }

  const userNames = await resolveNames(source, blockOuts, logger);

  // A row the source returned with an unreadable date fails the load like a failed fetch.
  let blockOutSpans: BlockOutSpan[];
  let events: CalendarEvent[];
  let markers: CalendarMarkerMap;
  try {
    blockOutSpans = groupBlockOutsIntoSpans(blockOuts, userNames);
    events = mergeCalendarEvents({ gigs, rehearsals, blockOutSpans });

    // Each stored block-out row is a single day.
    markers = buildCalendarMarkers({
      gigs,
      rehearsals,
      blockOuts: blockOuts.map((record) => ({ startDate: record.date }))
    });
  } catch (error) {
    throw new CalendarFetchError(error);
  }

  logger.debug('Loaded band calendar', {
    bandId,
    gigs: gigs.length,
    rehearsals: rehearsals.length,
    blockOuts: blockOuts.length,
    blockOutSpans: blockOutSpans.length
  });

  return {
    bandId,
    events,
    markers,
    counts: {
      gigs: gigs.length,
      rehearsals: rehearsals.length,
      blockOuts: blockOuts.length,
      blockOutSpans: blockOutSpans.length
    }
  };
}

/**
 * Rebuilds markers from already merged events. Each span counts once on every
 * day it covers, which matches the per-row count because rows are unique per
 * member and day.
 */
export function markersFromEvents(events: readonly CalendarEvent[]): CalendarMarkerMap {
  return buildCalendarMarkers({
    gigs: events.filter(isGig).map((event) => ({ date: toDayKey(event.date) })),
    rehearsals: events.filter(isRehearsal).map((event) => ({ date: toDayKey(event.date) })),
    blockOuts: events.filter(isBlockOut).map((event) => ({
      startDate: toDayKey(event.blockOutSpan.startDate),
      untilDate: toDayKey(event.blockOutSpan.endDate)
    }))
  });
}
