export type CalendarErrorCode = 'NO_BAND_SELECTED' | 'FETCH_FAILED' | 'INVALID_DAY_KEY';

export class CalendarError extends Error {
  readonly code: CalendarErrorCode;

  constructor(code: CalendarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NoBandSelectedError extends CalendarError {
  constructor(message = 'No band selected. Cannot perform this operation.') {
    super('NO_BAND_SELECTED', message);
  }
}

export class CalendarFetchError extends CalendarError {
  constructor(cause: unknown) {
    super('FETCH_FAILED', `Failed to load events: ${describeError(cause)}`, { cause });
  }
}

export class InvalidDayKeyError extends CalendarError {
  readonly key: string;

  constructor(key: string) {
    super('INVALID_DAY_KEY', `Invalid day key "${key}", expected YYYY-MM-DD`);
    this.key = key;
  }
}

export function isCalendarError(value: unknown): value is CalendarError {
  return value instanceof CalendarError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
