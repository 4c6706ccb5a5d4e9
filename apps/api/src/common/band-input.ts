import { NoBandSelectedError, parseDayKey, toDayKey, type DayKey } from '@gigboard/shared';

export function requireBand(bandId: string | null | undefined): string {
  if (!bandId) throw new NoBandSelectedError();
  return bandId;
}

/** Parses and re-encodes a day key so only valid `YYYY-MM-DD` dates reach a table. */
export function canonicalDay(value: string): DayKey {
  return toDayKey(parseDayKey(value));
}

export function trimmedText(value: string | undefined): string {
  return value?.trim() ?? '';
}

/** Trimmed text, or null when nothing is left. */
export function nullableText(value: string | undefined): string | null {
  const trimmed = trimmedText(value);
  return trimmed ? trimmed : null;
}
