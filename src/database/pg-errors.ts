export const PG_EXCLUSION_VIOLATION = '23P01';

interface ErrorWithCode {
  code: string;
}

function hasCode(value: unknown): value is ErrorWithCode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string'
  );
}

/** Matches the SQLSTATE on the driver error or on a wrapped `cause`. */
export function hasPgErrorCode(error: unknown, code: string): boolean {
  if (hasCode(error) && error.code === code) return true;
  if (typeof error === 'object' && error !== null && 'cause' in error) {
    return hasPgErrorCode(error.cause, code);
  }
  return false;
}
