import { z } from 'zod';
import { ReservationStatus } from '../../ledger/reservation-status.js';

export const UpdateReservationStatusSchema = z.object({
  status: z.nativeEnum(ReservationStatus),
});

export type UpdateReservationStatusDto = z.infer<
  typeof UpdateReservationStatusSchema
>;
