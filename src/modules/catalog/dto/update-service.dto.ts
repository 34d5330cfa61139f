import { z } from 'zod';
import { CreateServiceSchema } from './create-service.dto.js';

export const UpdateServiceSchema = CreateServiceSchema.partial().refine(
  (value) => Object.values(value).some((field) => field !== undefined),
  { message: 'At least one field must be provided' },
);

export type UpdateServiceDto = z.infer<typeof UpdateServiceSchema>;
