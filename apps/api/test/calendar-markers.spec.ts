import {
  buildCalendarMarkers,
  expandRangeToDayKeys,
  getMarkersForDate,
  hasMarkersForDate,
  markerCount,
  markersForMonth
} from '@gigboard/shared';

describe('calendar markers', () => {
  const markers = buildCalendarMarkers({
    gigs: [{ date: '2025-07-10' }],
    rehearsals: [{ date: '2025-07-10' }, { date: '2025-08-01' }],
    blockOuts: [{ startDate: '2025-07-09', untilDate: '2025-07-11' }, { startDate: '2025-07-11' }]
  });

  it('flags each kind on its day', () => {
    expect(markers.get('2025-07-10')).toEqual({ gig: true, rehearsal: true, blockOut: true, blockOutCount: 1 });
    expect(markers.get('2025-07-09')).toEqual({ gig: false, rehearsal: false, blockOut: true, blockOutCount: 1 });
    expect(markerCount(getMarkersForDate(markers, { year: 2025, month: 7, day: 10 }))).toBe(3);
  });

  it('counts overlapping block-out ranges', () => {
    expect(markers.get('2025-07-11')?.blockOutCount).toBe(2);
  });

  it('sets the block-out flag exactly when the day has a block-out count', () => {
    expect(markers.size).toBe(4);
    for (const entry of markers.values()) {
      expect(entry.blockOut).toBe(entry.blockOutCount > 0);
    }
  });

  it('returns empty markers for a day with nothing on it', () => {
    expect(getMarkersForDate(markers, { year: 2025, month: 7, day: 20 })).toEqual({
      gig: false,
      rehearsal: false,
      blockOut: false,
      blockOutCount: 0
    });
    expect(hasMarkersForDate(markers, { year: 2025, month: 7, day: 20 })).toBe(false);
  });

  it('looks up a Date by its local calendar day', () => {
    expect(hasMarkersForDate(markers, new Date(2025, 6, 10, 23, 59))).toBe(true);
  });

  it('limits a month view to that month', () => {
    expect(Object.keys(markersForMonth(markers, 2025, 7)).sort()).toEqual(['2025-07-09', '2025-07-10', '2025-07-11']);
    expect(Object.keys(markersForMonth(markers, 2025, 8))).toEqual(['2025-08-01']);
  });
});

describe('expandRangeToDayKeys', () => {
  it('expands inclusively across a month boundary', () => {
    expect(expandRangeToDayKeys({ startDate: '2025-01-30', untilDate: '2025-02-02' })).toEqual([
      '2025-01-30',
      '2025-01-31',
      '2025-02-01',
      '2025-02-02'
    ]);
  });

  it('treats a missing or earlier end as the start day only', () => {
    expect(expandRangeToDayKeys({ startDate: '2025-07-10', untilDate: null })).toEqual(['2025-07-10']);
    expect(expandRangeToDayKeys({ startDate: '2025-07-10', untilDate: '2025-07-08' })).toEqual(['2025-07-10']);
  });
});
