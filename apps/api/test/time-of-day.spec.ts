import { parseTimeOfDayMinutes } from '@gigboard/shared';

describe('parseTimeOfDayMinutes', () => {
  it('reads twelve-hour times', () => {
    expect(parseTimeOfDayMinutes('7:30 PM')).toBe(1170);
    expect(parseTimeOfDayMinutes('7:30pm')).toBe(1170);
    expect(parseTimeOfDayMinutes('12:00 AM')).toBe(0);
    expect(parseTimeOfDayMinutes('12:15 PM')).toBe(735);
  });

  it('reads twenty-four-hour times with optional seconds', () => {
    expect(parseTimeOfDayMinutes('09:30')).toBe(570);
    expect(parseTimeOfDayMinutes('19:30:00')).toBe(1170);
  });

  it('returns null for empty or unrecognised values', () => {
    expect(parseTimeOfDayMinutes('')).toBeNull();
    expect(parseTimeOfDayMinutes('   ')).toBeNull();
    expect(parseTimeOfDayMinutes(null)).toBeNull();
    expect(parseTimeOfDayMinutes('TBD')).toBeNull();
    expect(parseTimeOfDayMinutes('13:00 PM')).toBeNull();
    expect(parseTimeOfDayMinutes('24:00')).toBeNull();
  });
});
