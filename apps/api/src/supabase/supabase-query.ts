export interface PostgrestFailure {
  message: string;
  code?: string;
  details?: string | null;
  hint?: string | null;
}

export interface PostgrestResult<T> {
  data: T | null;
  error: PostgrestFailure | null;
}

export const UNIQUE_VIOLATION = '23505';
// PostgREST answers `.single()` on zero rows with this code.
export const NO_ROWS = 'PGRST116';

export class SupabaseQueryError extends Error {
  readonly code: string | undefined;

  constructor(context: string, failure: PostgrestFailure) {
    super(`${context}: ${failure.message}`);
    this.name = 'SupabaseQueryError';
    this.code = failure.code;
  }
}

/** Returns the rows of a PostgREST response or throws its error. */
export function unwrapRows<T>(result: PostgrestResult<T>, context: string): T {
  if (result.error) throw new SupabaseQueryError(context, result.error);
  if (result.data === null) throw new SupabaseQueryError(context, { message: 'No data returned' });
  return result.data;
}

export function isUniqueViolation(failure: PostgrestFailure | null): boolean {
  return failure?.code === UNIQUE_VIOLATION;
}

export function isNoRows(failure: PostgrestFailure | null): boolean {
  return failure?.code === NO_ROWS;
}
