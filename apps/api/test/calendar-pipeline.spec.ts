import {
  CalendarFetchError,
  loadBandCalendar,
  markersFromEvents,
  NoBandSelectedError,
  type CalendarLogger
} from '@gigboard/shared';
import { blockOut, fakeDataSource, gig, rehearsal } from './support/fixtures';

describe('loadBandCalendar', () => {
  const data = {
    gigs: [gig('g1', '2025-07-10', '8:00 PM')],
    rehearsals: [rehearsal('r1', '2025-07-10', '18:00')],
    blockOuts: [blockOut('b1', 'u1', '2025-07-10', 'Tour'), blockOut('b2', 'u1', '2025-07-11', 'Tour')],
    names: { u1: 'Alex' }
  };

  function recordingLogger() {
    return {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn()
    } satisfies CalendarLogger;
  }

  it('merges all three sources into ordered events and markers', async () => {
    const source = fakeDataSource(data);

    const calendar = await loadBandCalendar(source, 'band-1');

    expect(calendar.counts).toEqual({ gigs: 1, rehearsals: 1, blockOuts: 2, blockOutSpans: 1 });
    expect(calendar.events.map((event) => event.id)).toEqual(['r1', 'g1', 'u1_2025-07-10']);
    expect(calendar.events[2]?.title).toBe('Alex Out');
    expect(calendar.markers.get('2025-07-10')).toEqual({ gig: true, rehearsal: true, blockOut: true, blockOutCount: 1 });
    expect(calendar.markers.get('2025-07-11')).toEqual({ gig: false, rehearsal: false, blockOut: true, blockOutCount: 1 });
    expect(source.fetchGigsForBand).toHaveBeenCalledWith('band-1');
    expect(source.resolveUserDisplayNames).toHaveBeenCalledWith(['u1']);
  });

  it('derives the same markers from the merged events', async () => {
    const calendar = await loadBandCalendar(fakeDataSource(data), 'band-1');
    expect(markersFromEvents(calendar.events)).toEqual(calendar.markers);
  });

  it('rejects a missing band before fetching', async () => {
    const source = fakeDataSource(data);

    await expect(loadBandCalendar(source, '')).rejects.toBeInstanceOf(NoBandSelectedError);
    expect(source.fetchGigsForBand).not.toHaveBeenCalled();
  });

  it('fails the load when any fetch fails', async () => {
    const source = fakeDataSource(data);
    source.fetchRehearsalsForBand.mockRejectedValueOnce(new Error('timeout'));

    const load = loadBandCalendar(source, 'band-1');

    await expect(load).rejects.toBeInstanceOf(CalendarFetchError);
    await expect(load).rejects.toThrow('Failed to load events: timeout');
  });

  it('fails the load when a source row has an unreadable date', async () => {
    const source = fakeDataSource({ gigs: [gig('g1', '2025-02-30')] });

    const load = loadBandCalendar(source, 'band-1');

    await expect(load).rejects.toBeInstanceOf(CalendarFetchError);
    await expect(load).rejects.toThrow('Failed to load events: Invalid day key "2025-02-30", expected YYYY-MM-DD');
  });

  it('falls back to "Member" when names cannot be resolved', async () => {
    const source = fakeDataSource(data);
    source.resolveUserDisplayNames.mockRejectedValueOnce(new Error('boom'));
    const logger = recordingLogger();

    const calendar = await loadBandCalendar(source, 'band-1', { logger });

    expect(calendar.events[2]?.title).toBe('Member Out');
    expect(logger.warn).toHaveBeenCalledWith('Failed to resolve block-out member names', {
      userIds: 1,
      error: 'boom'
    });
  });

  it('skips the name lookup without block-outs', async () => {
    const source = fakeDataSource({ gigs: data.gigs });

    const calendar = await loadBandCalendar(source, 'band-1');

    expect(calendar.counts.blockOutSpans).toBe(0);
    expect(source.resolveUserDisplayNames).not.toHaveBeenCalled();
  });
});
