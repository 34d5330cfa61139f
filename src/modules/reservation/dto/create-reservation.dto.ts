import { z } from 'zod';
import {
  NAIVE_DATETIME_PATTERN,
  parseNaiveDateTime,
} from '../../../common/time/naive-datetime.js';

export const CreateReservationSchema = z.object({
  service_id: z.number().int().positive(),
  employee_id: z.number().int().positive(),
  start_time: z
    .string()
    .regex(
      NAIVE_DATETIME_PATTERN,
      'Expected YYYY-MM-DDTHH:mm[:ss] without offset',
    )
    .transform((value, ctx) => {
      try {
        return parseNaiveDateTime(value);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Invalid start_time',
        });
        return z.NEVER;
      }
    }),
  note: z.string().max(1000).nullable().optional(),
});

export type CreateReservationDto = z.infer<typeof CreateReservationSchema>;
