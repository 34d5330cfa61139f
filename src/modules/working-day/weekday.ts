import { getDay } from 'date-fns';

export enum WeekDay {
  Monday = 'Monday',
  Tuesday = 'Tuesday',
  Wednesday = 'Wednesday',
  Thursday = 'Thursday',
  Friday = 'Friday',
  Saturday = 'Saturday',
  Sunday = 'Sunday',
}

/** Monday-first, the order working days are listed in. */
export const WEEK_DAY_VALUES = [
  WeekDay.Monday,
  WeekDay.Tuesday,
  WeekDay.Wednesday,
  WeekDay.Thursday,
  WeekDay.Friday,
  WeekDay.Saturday,
  WeekDay.Sunday,
] as const;

// Indexed by date-fns getDay(): 0 = Sunday.
const WEEK_DAY_BY_INDEX: readonly WeekDay[] = [
  WeekDay.Sunday,
  WeekDay.Monday,
  WeekDay.Tuesday,
  WeekDay.Wednesday,
  WeekDay.Thursday,
  WeekDay.Friday,
  WeekDay.Saturday,
];

export function weekDayOf(date: Date): WeekDay {
  return WEEK_DAY_BY_INDEX[getDay(date)];
}
