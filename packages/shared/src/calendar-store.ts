import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  isGig,
  isRehearsal,
  sortCalendarEvents,
  type CalendarEvent
} from './calendar-events';
import { getMarkersForDate, type CalendarDayMarkers, type CalendarMarkerMap } from './calendar-markers';
import {
  loadBandCalendar,
  silentCalendarLogger,
  type CalendarDataSource,
  type CalendarLogger
} from './calendar-pipeline';
import {
  calendarDateFromDate,
  monthOf,
  shiftMonth,
  todayCalendarDate,
  toDayKey,
  type CalendarDate,
  type CalendarMonth,
  type Clock,
  type DayKey
} from './day-key';
import { CalendarFetchError, describeError } from './errors';
import { MonthEventCache, type MonthData } from './month-event-cache';

export type CalendarStatus = 'idle' | 'loading' | 'loaded' | 'error';

export const NO_BAND_SELECTED_MESSAGE = 'No band selected';

export interface CalendarStateData {
  status: CalendarStatus;
  /** Band the calendar is loaded for; re-selecting it does not reload. */
  bandId: string | null;
  selectedMonth: CalendarMonth;
  allEvents: CalendarEvent[];
  markers: CalendarMarkerMap;
  isLoading: boolean;
  error: string | null;
  /** Bumped by every load; only the newest load may publish. */
  generation: number;
  lastLoadedAt: number | null;
}

export interface CalendarActions {
  selectBand: (bandId: string | null) => Promise<void>;
  refresh: () => Promise<void>;
  invalidateAndRefresh: (bandId: string) => Promise<void>;
  getCachedMonth: (year: number, month: number) => MonthData | null;
  previousMonth: () => void;
  nextMonth: () => void;
  goToToday: () => void;
  reset: () => void;
}

export type CalendarState = CalendarStateData & CalendarActions;
export type CalendarStore = StoreApi<CalendarState>;

export interface CalendarStoreOptions {
  dataSource: CalendarDataSource;
  cache?: MonthEventCache;
  clock?: Clock;
  logger?: CalendarLogger;
}

function formatLoadError(error: unknown): string {
  if (error instanceof CalendarFetchError) return error.message;
  return `Failed to load events: ${describeError(error)}`;
}

export function createCalendarStore(options: CalendarStoreOptions): CalendarStore {
  const clock = options.clock ?? Date.now;
  const cache = options.cache ?? new MonthEventCache({ clock });
  const logger = options.logger ?? silentCalendarLogger;

  const initialState = (): CalendarStateData => ({
    status: 'idle',
    bandId: null,
    selectedMonth: monthOf(todayCalendarDate(clock)),
    allEvents: [],
    markers: new Map(),
    isLoading: false,
    error: null,
    generation: 0,
    lastLoadedAt: null
  });

  return createStore<CalendarState>()((set, get) => {
    const isCurrent = (generation: number, bandId: string) =>
      get().generation === generation && get().bandId === bandId;

    const runPipeline = async (bandId: string): Promise<void> => {
      const generation = get().generation + 1;
      set({ status: 'loading', isLoading: true, error: null, generation });

      try {
        const calendar = await loadBandCalendar(options.dataSource, bandId, { logger });
        if (!isCurrent(generation, bandId)) {
          logger.debug('Discarding superseded calendar load', { bandId, generation });
          return;
        }

        cache.put(bandId, calendar.events);
        set({
          status: 'loaded',
          allEvents: calendar.events,
          markers: calendar.markers,
          isLoading: false,
          error: null,
          lastLoadedAt: clock()
        });
      } catch (error) {
        if (!isCurrent(generation, bandId)) {
          logger.debug('Discarding superseded calendar failure', { bandId, generation });
          return;
        }

        logger.warn('Calendar load failed', { bandId, error: describeError(error) });
        // Last good events and markers stay visible behind the error.
        set({ status: 'error', isLoading: false, error: formatLoadError(error) });
      }
    };

    return {
      ...initialState(),

      selectBand: async (bandId) => {
        if (!bandId) {
          set((state) => ({
            status: 'idle',
            bandId: null,
            allEvents: [],
            markers: new Map(),
            isLoading: false,
            error: NO_BAND_SELECTED_MESSAGE,
            generation: state.generation + 1
          }));
          return;
        }

        if (bandId === get().bandId) return;

        set({ bandId, allEvents: [], markers: new Map(), lastLoadedAt: null });
        await runPipeline(bandId);
      },

      refresh: async () => {
        const bandId = get().bandId;
        if (!bandId) return;
        await runPipeline(bandId);
      },

      invalidateAndRefresh: async (bandId) => {
        const removed = cache.invalidate(bandId);
        logger.info('Invalidated cached calendar months', { bandId, removed });
        if (bandId === get().bandId) {
          await runPipeline(bandId);
        }
      },

      getCachedMonth: (year, month) => {
        const bandId = get().bandId;
        if (!bandId) return null;
        return cache.get(bandId, year, month);
      },

      previousMonth: () => set((state) => ({ selectedMonth: shiftMonth(state.selectedMonth, -1) })),

      nextMonth: () => set((state) => ({ selectedMonth: shiftMonth(state.selectedMonth, 1) })),

      goToToday: () => set({ selectedMonth: monthOf(todayCalendarDate(clock)) }),

      reset: () => {
        cache.clear();
        set((state) => ({ ...initialState(), generation: state.generation + 1 }));
      }
    };
  });
}

function toCalendarDate(date: CalendarDate | Date): CalendarDate {
  return date instanceof Date ? calendarDateFromDate(date) : date;
}

/** Events in the selected month, by date then start time. */
export function selectEventsForMonth(state: CalendarStateData): CalendarEvent[] {
  const { year, month } = state.selectedMonth;
  return sortCalendarEvents(
    state.allEvents.filter((event) => event.date.year === year && event.date.month === month)
  );
}

export function selectEventsByDate(state: CalendarStateData): Map<DayKey, CalendarEvent[]> {
  const byDate = new Map<DayKey, CalendarEvent[]>();
  for (const event of state.allEvents) {
    const key = toDayKey(event.date);
    const bucket = byDate.get(key);
    if (bucket) {
      bucket.push(event);
    } else {
      byDate.set(key, [event]);
    }
  }
  return byDate;
}

export function selectEventsForDate(state: CalendarStateData, date: CalendarDate | Date): CalendarEvent[] {
  const key = toDayKey(toCalendarDate(date));
  return state.allEvents.filter((event) => toDayKey(event.date) === key);
}

export function selectHasEvents(state: CalendarStateData, date: CalendarDate | Date): boolean {
  return selectEventsForDate(state, date).length > 0;
}

export function selectHasGig(state: CalendarStateData, date: CalendarDate | Date): boolean {
  const entry = state.markers.get(toDayKey(toCalendarDate(date)));
  if (entry) return entry.gig;
  return selectEventsForDate(state, date).some(isGig);
}

export function selectHasRehearsal(state: CalendarStateData, date: CalendarDate | Date): boolean {
  const entry = state.markers.get(toDayKey(toCalendarDate(date)));
  if (entry) return entry.rehearsal;
  return selectEventsForDate(state, date).some(isRehearsal);
}

export function selectHasBlockOut(state: CalendarStateData, date: CalendarDate | Date): boolean {
  return state.markers.get(toDayKey(toCalendarDate(date)))?.blockOut ?? false;
}

export function selectMarkers(state: CalendarStateData, date: CalendarDate | Date): CalendarDayMarkers {
  return getMarkersForDate(state.markers, toCalendarDate(date));
}
