import { z } from 'zod';
import { DAY_PATTERN, parseDay } from '../../../common/time/naive-datetime.js';

export const AvailabilityQuerySchema = z.object({
  employee_id: z.coerce.number().int().positive(),
  service_id: z.coerce.number().int().positive(),
  day: z
    .string()
    .regex(DAY_PATTERN, 'Expected YYYY-MM-DD')
    .transform((value, ctx) => {
      try {
        return parseDay(value);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid day' });
        return z.NEVER;
      }
    }),
});

export type AvailabilityQueryDto = z.infer<typeof AvailabilityQuerySchema>;
