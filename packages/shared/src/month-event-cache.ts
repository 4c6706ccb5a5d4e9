import type { CalendarEvent } from './calendar-events';
import type { CalendarMonth, Clock } from './day-key';

export const DEFAULT_MONTH_CACHE_TTL_MS = 5 * 60 * 1000;

export interface MonthData {
  events: CalendarEvent[];
  fetchedAt: number;
}

export interface MonthEventCacheOptions {
  ttlMs?: number;
  clock?: Clock;
}

/**
 * Aggregated calendar events per band and month. An entry older than the TTL is
 * treated as absent on read; it is only replaced by a later `put` or removed by
 * `invalidate`, `prune` or `clear`.
 */
export class MonthEventCache {
  private readonly entries = new Map<string, MonthData>();
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(options: MonthEventCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_MONTH_CACHE_TTL_MS;
    this.clock = options.clock ?? Date.now;
  }

  static key(bandId: string, year: number, month: number): string {
    return `${bandId}-${year}-${month}`;
  }

  get size(): number {
    return this.entries.size;
  }

  isStale(entry: MonthData): boolean {
    return this.clock() - entry.fetchedAt > this.ttlMs;
  }

  get(bandId: string, year: number, month: number): MonthData | null {
    const entry = this.entries.get(MonthEventCache.key(bandId, year, month));
    if (!entry || this.isStale(entry)) return null;
    return entry;
  }

  /**
   * Writes one entry per month present in `events`. Months listed in
   * `options.months` are written even when no event falls in them, so an empty
   * month is cached as empty rather than missing.
   */
  put(bandId: string, events: readonly CalendarEvent[], options: { months?: readonly CalendarMonth[] } = {}): void {
    const byMonth = new Map<string, CalendarEvent[]>();
    for (const month of options.months ?? []) {
      byMonth.set(MonthEventCache.key(bandId, month.year, month.month), []);
    }
    for (const event of events) {
      const key = MonthEventCache.key(bandId, event.date.year, event.date.month);
      const bucket = byMonth.get(key);
      if (bucket) {
        bucket.push(event);
      } else {
        byMonth.set(key, [event]);
      }
    }

    const fetchedAt = this.clock();
    for (const [key, monthEvents] of byMonth) {
      this.entries.set(key, { events: monthEvents, fetchedAt });
    }
  }

  /** Events of every fresh month cached for the band, in no particular order. */
  bandEvents(bandId: string): CalendarEvent[] {
    const prefix = `${bandId}-`;
    const events: CalendarEvent[] = [];
    for (const [key, entry] of this.entries) {
      if (key.startsWith(prefix) && !this.isStale(entry)) events.push(...entry.events);
    }
    return events;
  }

  invalidate(bandId: string): number {
    const prefix = `${bandId}-`;
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  prune(): number {
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (this.isStale(entry)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
