import { format, isValid, parseISO, set } from 'date-fns';

// Timestamps carry no offset: they are wall-clock values in the single
// implicit timezone the deployment runs in.
export const NAIVE_DATETIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

export const NAIVE_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?$/;
export const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

export function formatNaiveDateTime(date: Date): string {
  return format(date, NAIVE_DATETIME_FORMAT);
}

/** Accepts `YYYY-MM-DDTHH:mm[:ss]` and the `YYYY-MM-DD HH:mm:ss` form Postgres returns. */
export function parseNaiveDateTime(value: string): Date {
  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid date-time "${value}"`);
  }
  return parsed;
}

export function parseDay(value: string): Date {
  const parsed = parseISO(value);
  if (!DAY_PATTERN.test(value) || !isValid(parsed)) {
    throw new RangeError(`Invalid day "${value}"`);
  }
  return parsed;
}

/** Places a `HH:mm[:ss]` time of day on the calendar date of `day`. */
export function atTimeOfDay(day: Date, timeOfDay: string): Date {
  const [hours = 0, minutes = 0, seconds = 0] = timeOfDay
    .split(':')
    .map(Number);
  return set(day, { hours, minutes, seconds, milliseconds: 0 });
}

/** Postgres `time` columns come back as `HH:mm:ss`; the API speaks `HH:mm`. */
export function toHourMinute(timeOfDay: string): string {
  return timeOfDay.slice(0, 5);
}
