const TWELVE_HOUR_PATTERN = /^(\d{1,2}):(\d{2})\s*(AM|PM)$/i;
const TWENTY_FOUR_HOUR_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Minutes since midnight for a start time such as `"7:30 PM"`, `"7:30PM"`,
 * `"19:30"` or the Postgres `time` form `"19:30:00"`.
 *
 * Returns `null` for an empty or unrecognised value; callers order those after
 * every timed entry.
 */
export function parseTimeOfDayMinutes(value: string | null | undefined): number | null {
  const normalized = value?.trim() ?? '';
  if (!normalized) return null;

  const twelveHour = TWELVE_HOUR_PATTERN.exec(normalized);
  if (twelveHour) {
    const hour = Number(twelveHour[1]);
    const minutes = Number(twelveHour[2]);
    if (hour < 1 || hour > 12 || minutes > 59) return null;
    const isPm = twelveHour[3]?.toUpperCase() === 'PM';
    return ((hour % 12) + (isPm ? 12 : 0)) * 60 + minutes;
  }

  const twentyFourHour = TWENTY_FOUR_HOUR_PATTERN.exec(normalized);
  if (twentyFourHour) {
    const hour = Number(twentyFourHour[1]);
    const minutes = Number(twentyFourHour[2]);
    if (hour > 23 || minutes > 59) return null;
    return hour * 60 + minutes;
  }

  return null;
}
