import { Module } from '@nestjs/common';
import { BookingLedgerRepository } from './booking-ledger.repository.js';
import { BOOKING_LEDGER } from './ledger.types.js';

@Module({
  providers: [
    BookingLedgerRepository,
    { provide: BOOKING_LEDGER, useExisting: BookingLedgerRepository },
  ],
  exports: [BOOKING_LEDGER],
})
export class LedgerModule {}
