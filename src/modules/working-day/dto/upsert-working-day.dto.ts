import { z } from 'zod';
import { TIME_OF_DAY_PATTERN } from '../../../common/time/naive-datetime.js';
import { WeekDay } from '../weekday.js';

const timeOfDay = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, 'Expected HH:mm')
  .nullable();

export const UpsertWorkingDaySchema = z.object({
  day: z.nativeEnum(WeekDay),
  opening_time: timeOfDay,
  closing_time: timeOfDay,
});

export type UpsertWorkingDayDto = z.infer<typeof UpsertWorkingDaySchema>;
