import { Inject, Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import {
  compareCalendarDates,
  getMarkersForDate,
  isBlockOut,
  loadBandCalendar,
  markersForMonth,
  markersFromEvents,
  MonthEventCache,
  parseDayKey,
  sortCalendarEvents,
  toDayKey,
  type BandCalendar,
  type CalendarDate,
  type CalendarDayMarkers,
  type CalendarEvent,
  type DayKey
} from '@gigboard/shared';
import { config } from '../config';
import { requireBand } from '../common/band-input';
import { nestCalendarLogger } from '../common/calendar-logger';
import { MetricsService } from '../metrics/metrics.service';
import { CalendarRepository } from './calendar.repository';

export const MONTH_EVENT_CACHE = Symbol('MONTH_EVENT_CACHE');

export type CalendarSource = 'cache' | 'fresh';

export interface CalendarMonthView {
  bandId: string;
  year: number;
  month: number;
  source: CalendarSource;
  cachedAt: number | null;
  events: CalendarEvent[];
  markers: Record<DayKey, CalendarDayMarkers>;
}

export interface CalendarDayView {
  bandId: string;
  date: DayKey;
  source: CalendarSource;
  events: CalendarEvent[];
  markers: CalendarDayMarkers;
}

export interface CalendarRefreshResult {
  bandId: string;
  invalidatedMonths: number;
  cachedMonths: number;
  counts: BandCalendar['counts'];
}

function coversDay(event: CalendarEvent, day: CalendarDate): boolean {
  if (!isBlockOut(event)) return compareCalendarDates(event.date, day) === 0;
  const span = event.blockOutSpan;
  return compareCalendarDates(span.startDate, day) <= 0 && compareCalendarDates(day, span.endDate) <= 0;
}

@Injectable()
export class CalendarService {
  private readonly logger = new Logger(CalendarService.name);
  private readonly calendarLogger = nestCalendarLogger(this.logger);
  private readonly inFlight = new Map<string, Promise<BandCalendar>>();
  private readonly generations = new Map<string, number>();

  constructor(
    private readonly repository: CalendarRepository,
    private readonly metrics: MetricsService,
    @Inject(MONTH_EVENT_CACHE) private readonly cache: MonthEventCache
  ) {}

  get cachedMonthCount(): number {
    return this.cache.size;
  }

  async getMonth(bandId: string, year: number, month: number): Promise<CalendarMonthView> {
    const band = requireBand(bandId);
    const { events, source } = await this.resolveBandEvents(band, year, month);

    return {
      bandId: band,
      year,
      month,
      source,
      cachedAt: this.cache.get(band, year, month)?.fetchedAt ?? null,
      events: sortCalendarEvents(
        events.filter((event) => event.date.year === year && event.date.month === month)
      ),
      markers: markersForMonth(markersFromEvents(events), year, month)
    };
  }

  /** Events starting on the day, plus block-outs whose span covers it. */
  async getDay(bandId: string, dayKey: DayKey): Promise<CalendarDayView> {
    const band = requireBand(bandId);
    const day = parseDayKey(dayKey);
    const { events, source } = await this.resolveBandEvents(band, day.year, day.month);

    return {
      bandId: band,
      date: toDayKey(day),
      source,
      events: sortCalendarEvents(events.filter((event) => coversDay(event, day))),
      markers: getMarkersForDate(markersFromEvents(events), day)
    };
  }

  async refresh(bandId: string): Promise<CalendarRefreshResult> {
    const band = requireBand(bandId);
    const invalidatedMonths = this.invalidate(band);
    const calendar = await this.loadBand(band);

    return {
      bandId: band,
      invalidatedMonths,
      cachedMonths: this.cache.keys().filter((key) => key.startsWith(`${band}-`)).length,
      counts: calendar.counts
    };
  }

  /** Drops the band's cached months; a load already running for it will not write back. */
  invalidate(bandId: string): number {
    const band = requireBand(bandId);
    const removed = this.cache.invalidate(band);
    this.generations.set(band, this.generationOf(band) + 1);
    this.inFlight.delete(band);
    this.logger.log({ bandId: band, removed }, 'Invalidated cached calendar months');
    return removed;
  }

  @Interval(config.calendar.cachePruneIntervalMs)
  pruneStaleMonths(): number {
    const removed = this.cache.prune();
    if (removed > 0) {
      this.logger.debug({ removed }, 'Pruned stale calendar months');
    }
    return removed;
  }

  private async resolveBandEvents(
    bandId: string,
    year: number,
    month: number
  ): Promise<{ events: CalendarEvent[]; source: CalendarSource }> {
    if (this.cache.get(bandId, year, month)) {
      this.metrics.calendarCacheLookups.inc({ result: 'hit' });
      return { events: this.cache.bandEvents(bandId), source: 'cache' };
    }

    this.metrics.calendarCacheLookups.inc({ result: 'miss' });
    const generation = this.generationOf(bandId);
    const calendar = await this.loadBand(bandId);

    // Cache the requested month even when it is empty, so the next read is a hit.
    if (this.generationOf(bandId) === generation && !this.cache.get(bandId, year, month)) {
      this.cache.put(bandId, [], { months: [{ year, month }] });
    }

    return { events: calendar.events, source: 'fresh' };
  }

  private generationOf(bandId: string): number {
    return this.generations.get(bandId) ?? 0;
  }

  private loadBand(bandId: string): Promise<BandCalendar> {
    const pending = this.inFlight.get(bandId);
    if (pending) return pending;

    const generation = this.generationOf(bandId);
    const stopTimer = this.metrics.calendarLoadDuration.startTimer();

    const load = loadBandCalendar(this.repository, bandId, { logger: this.calendarLogger })
      .then(
        (calendar) => {
          stopTimer({ outcome: 'success' });
          if (this.generationOf(bandId) === generation) {
            this.cache.put(bandId, calendar.events);
          } else {
            this.logger.debug({ bandId, generation }, 'Skipped cache write for superseded load');
          }
          return calendar;
        },
        (error: unknown) => {
          stopTimer({ outcome: 'error' });
          throw error;
        }
      )
      .finally(() => {
        if (this.inFlight.get(bandId) === load) this.inFlight.delete(bandId);
      });

    this.inFlight.set(bandId, load);
    return load;
  }
}
