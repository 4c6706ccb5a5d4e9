import type { BlockOutRecord, CalendarDataSource, Gig, Rehearsal } from '@gigboard/shared';

export function gig(id: string, date: string, startTime = '8:00 PM', overrides: Partial<Gig> = {}): Gig {
  return {
    id,
    bandId: 'band-1',
    name: `Gig ${id}`,
    date,
    startTime,
    endTime: '',
    location: 'The Ballroom',
    notes: null,
    setlistId: null,
    isPotential: false,
    ...overrides
  };
}

export function rehearsal(id: string, date: string, startTime = '18:00'): Rehearsal {
  return {
    id,
    bandId: 'band-1',
    date,
    startTime,
    endTime: '21:00',
    location: 'Studio B',
    notes: null,
    setlistId: null
  };
}

export function blockOut(id: string, userId: string, date: string, reason = ''): BlockOutRecord {
  return { id, userId, bandId: 'band-1', date, reason };
}

export interface FakeCalendarData {
  gigs?: Gig[];
  rehearsals?: Rehearsal[];
  blockOuts?: BlockOutRecord[];
  names?: Record<string, string>;
}

/** In-memory data source whose reads are jest mocks, so tests can assert or override them. */
export function fakeDataSource(data: FakeCalendarData = {}) {
  return {
    fetchGigsForBand: jest.fn(async (_bandId: string) => data.gigs ?? []),
    fetchRehearsalsForBand: jest.fn(async (_bandId: string) => data.rehearsals ?? []),
    fetchBlockOutsForBand: jest.fn(async (_bandId: string) => data.blockOuts ?? []),
    resolveUserDisplayNames: jest.fn(async (_userIds: string[]) => new Map(Object.entries(data.names ?? {})))
  } satisfies CalendarDataSource;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function clockAt(start: number) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    }
  };
}
