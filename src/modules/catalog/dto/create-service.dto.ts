import { z } from 'zod';

export const CreateServiceSchema = z.object({
  subcategory_id: z.number().int().positive(),
  name: z.string().trim().min(1).max(255),
  description: z.string().max(2000).nullable().optional(),
  price: z.number().nonnegative(),
  duration_minutes: z.number().int(),
});

export type CreateServiceDto = z.infer<typeof CreateServiceSchema>;
