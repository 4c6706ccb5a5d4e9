import {
  createCalendarStore,
  MonthEventCache,
  selectEventsForDate,
  selectEventsForMonth,
  selectHasBlockOut,
  selectHasGig,
  selectHasRehearsal,
  type Gig
} from '@gigboard/shared';
import { blockOut, deferred, fakeDataSource, gig, rehearsal } from './support/fixtures';

describe('calendar store', () => {
  const now = new Date(2025, 6, 15, 12).getTime();
  const clock = () => now;

  const data = {
    gigs: [gig('g1', '2025-07-10', '8:00 PM'), gig('g2', '2025-08-02', '9:00 PM')],
    rehearsals: [rehearsal('r1', '2025-07-10', '18:00')],
    blockOuts: [blockOut('b1', 'u1', '2025-07-12', 'Tour')],
    names: { u1: 'Alex' }
  };

  it('starts idle on the current month', () => {
    const store = createCalendarStore({ dataSource: fakeDataSource(data), clock });

    expect(store.getState()).toMatchObject({
      status: 'idle',
      bandId: null,
      selectedMonth: { year: 2025, month: 7 },
      allEvents: [],
      isLoading: false,
      error: null,
      generation: 0
    });
  });

  it('loads a band and caches its months', async () => {
    const store = createCalendarStore({ dataSource: fakeDataSource(data), clock });

    await store.getState().selectBand('band-1');

    const state = store.getState();
    expect(state.status).toBe('loaded');
    expect(state.isLoading).toBe(false);
    expect(state.lastLoadedAt).toBe(now);
    expect(state.allEvents.map((event) => event.id)).toEqual(['r1', 'g1', 'u1_2025-07-12', 'g2']);
    expect(state.getCachedMonth(2025, 8)?.events.map((event) => event.id)).toEqual(['g2']);
    expect(state.getCachedMonth(2025, 9)).toBeNull();
  });

  it('does not reload when the same band is selected again', async () => {
    const source = fakeDataSource(data);
    const store = createCalendarStore({ dataSource: source, clock });

    await store.getState().selectBand('band-1');
    await store.getState().selectBand('band-1');

    expect(source.fetchGigsForBand).toHaveBeenCalledTimes(1);
  });

  it('clears the calendar when no band is selected', async () => {
    const store = createCalendarStore({ dataSource: fakeDataSource(data), clock });
    await store.getState().selectBand('band-1');

    await store.getState().selectBand(null);

    expect(store.getState()).toMatchObject({
      status: 'idle',
      bandId: null,
      allEvents: [],
      error: 'No band selected',
      generation: 2
    });
    expect(store.getState().getCachedMonth(2025, 7)).toBeNull();
  });

  it('ignores a load that finishes after a newer band was selected', async () => {
    const slowGigs = deferred<Gig[]>();
    const source = fakeDataSource(data);
    source.fetchGigsForBand.mockImplementation(async (bandId: string) =>
      bandId === 'band-1' ? slowGigs.promise : [gig('other', '2025-07-20', '7:00 PM', { bandId: 'band-2' })]
    );
    source.fetchRehearsalsForBand.mockResolvedValue([]);
    source.fetchBlockOutsForBand.mockResolvedValue([]);
    const store = createCalendarStore({ dataSource: source, clock });

    const first = store.getState().selectBand('band-1');
    await store.getState().selectBand('band-2');
    slowGigs.resolve([gig('stale', '2025-07-10')]);
    await first;

    const state = store.getState();
    expect(state.bandId).toBe('band-2');
    expect(state.status).toBe('loaded');
    expect(state.allEvents.map((event) => event.id)).toEqual(['other']);
  });

  it('keeps the last good events when a refresh fails', async () => {
    const source = fakeDataSource(data);
    const store = createCalendarStore({ dataSource: source, clock });
    await store.getState().selectBand('band-1');

    source.fetchGigsForBand.mockRejectedValueOnce(new Error('offline'));
    await store.getState().refresh();

    const state = store.getState();
    expect(state.status).toBe('error');
    expect(state.isLoading).toBe(false);
    expect(state.error).toBe('Failed to load events: offline');
    expect(state.allEvents).toHaveLength(4);
  });

  it('reloads after invalidating the current band', async () => {
    const source = fakeDataSource(data);
    const cache = new MonthEventCache({ clock });
    const store = createCalendarStore({ dataSource: source, cache, clock });
    await store.getState().selectBand('band-1');

    cache.put('band-2', [], { months: [{ year: 2025, month: 7 }] });
    await store.getState().invalidateAndRefresh('band-1');

    expect(source.fetchGigsForBand).toHaveBeenCalledTimes(2);
    expect(cache.keys().sort()).toEqual(['band-1-2025-7', 'band-1-2025-8', 'band-2-2025-7']);
  });

  it('only invalidates another band without reloading', async () => {
    const source = fakeDataSource(data);
    const cache = new MonthEventCache({ clock });
    const store = createCalendarStore({ dataSource: source, cache, clock });
    await store.getState().selectBand('band-1');
    cache.put('band-2', [], { months: [{ year: 2025, month: 7 }] });

    await store.getState().invalidateAndRefresh('band-2');

    expect(source.fetchGigsForBand).toHaveBeenCalledTimes(1);
    expect(cache.keys().sort()).toEqual(['band-1-2025-7', 'band-1-2025-8']);
  });

  it('navigates months across the year boundary', () => {
    const january = () => new Date(2025, 0, 15, 12).getTime();
    const store = createCalendarStore({ dataSource: fakeDataSource(data), clock: january });

    store.getState().previousMonth();
    expect(store.getState().selectedMonth).toEqual({ year: 2024, month: 12 });

    store.getState().nextMonth();
    store.getState().nextMonth();
    expect(store.getState().selectedMonth).toEqual({ year: 2025, month: 2 });

    store.getState().goToToday();
    expect(store.getState().selectedMonth).toEqual({ year: 2025, month: 1 });
  });

  it('resets to the initial state and drops the cache', async () => {
    const cache = new MonthEventCache({ clock });
    const store = createCalendarStore({ dataSource: fakeDataSource(data), cache, clock });
    await store.getState().selectBand('band-1');

    store.getState().reset();

    expect(store.getState()).toMatchObject({ status: 'idle', bandId: null, allEvents: [], generation: 2 });
    expect(cache.size).toBe(0);
  });

  it('selects events and markers for the visible month and day', async () => {
    const store = createCalendarStore({ dataSource: fakeDataSource(data), clock });
    await store.getState().selectBand('band-1');
    const state = store.getState();

    expect(selectEventsForMonth(state).map((event) => event.id)).toEqual(['r1', 'g1', 'u1_2025-07-12']);
    expect(selectEventsForDate(state, { year: 2025, month: 7, day: 10 }).map((event) => event.id)).toEqual(['r1', 'g1']);
    expect(selectHasGig(state, { year: 2025, month: 7, day: 10 })).toBe(true);
    expect(selectHasRehearsal(state, { year: 2025, month: 7, day: 12 })).toBe(false);
    expect(selectHasBlockOut(state, new Date(2025, 6, 12))).toBe(true);
    expect(selectHasBlockOut(state, { year: 2025, month: 7, day: 13 })).toBe(false);
  });
});
