import { calendarEventFromGig, MonthEventCache } from '@gigboard/shared';
import { clockAt, gig } from './support/fixtures';

describe('MonthEventCache', () => {
  const start = Date.UTC(2025, 6, 1, 9);
  const julyGig = calendarEventFromGig(gig('g1', '2025-07-10'));
  const augustGig = calendarEventFromGig(gig('g2', '2025-08-02'));

  function setup() {
    const clock = clockAt(start);
    const cache = new MonthEventCache({ ttlMs: 5 * 60 * 1000, clock: clock.now });
    return { clock, cache };
  }

  it('groups events into one entry per month', () => {
    const { cache } = setup();
    cache.put('band-1', [julyGig, augustGig]);

    expect(cache.keys().sort()).toEqual(['band-1-2025-7', 'band-1-2025-8']);
    expect(cache.get('band-1', 2025, 7)).toEqual({ events: [julyGig], fetchedAt: start });
  });

  it('serves entries until the TTL has passed', () => {
    const { clock, cache } = setup();
    cache.put('band-1', [julyGig]);

    clock.advance(4 * 60 * 1000 + 59 * 1000);
    expect(cache.get('band-1', 2025, 7)?.events).toEqual([julyGig]);

    clock.advance(2 * 1000);
    expect(cache.get('band-1', 2025, 7)).toBeNull();
    expect(cache.size).toBe(1);
  });

  it('caches requested months that have no events', () => {
    const { cache } = setup();
    cache.put('band-1', [julyGig], { months: [{ year: 2025, month: 9 }] });

    expect(cache.get('band-1', 2025, 9)).toEqual({ events: [], fetchedAt: start });
    expect(cache.get('band-1', 2025, 8)).toBeNull();
  });

  it('invalidates only the given band', () => {
    const { cache } = setup();
    cache.put('band-1', [julyGig, augustGig]);
    cache.put('band-10', [julyGig]);

    expect(cache.invalidate('band-1')).toBe(2);
    expect(cache.keys()).toEqual(['band-10-2025-7']);
    expect(cache.get('band-10', 2025, 7)).not.toBeNull();
  });

  it('collects fresh events across a band', () => {
    const { clock, cache } = setup();
    cache.put('band-1', [julyGig]);
    clock.advance(4 * 60 * 1000);
    cache.put('band-1', [augustGig]);
    clock.advance(2 * 60 * 1000);

    expect(cache.bandEvents('band-1')).toEqual([augustGig]);
  });

  it('prunes stale entries', () => {
    const { clock, cache } = setup();
    cache.put('band-1', [julyGig]);
    clock.advance(6 * 60 * 1000);
    cache.put('band-2', [augustGig]);

    expect(cache.prune()).toBe(1);
    expect(cache.keys()).toEqual(['band-2-2025-8']);

    cache.clear();
    expect(cache.size).toBe(0);
  });
});
