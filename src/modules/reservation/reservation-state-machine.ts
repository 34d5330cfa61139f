import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InvalidTransitionError,
  PersistenceConflictError,
  ReservationClosedError,
  ReservationNotFoundError,
} from '../../common/errors/scheduling.errors.js';
import {
  BOOKING_LEDGER,
  type BookingLedger,
  type Reservation,
} from '../ledger/ledger.types.js';
import {
  isTerminalStatus,
  ReservationStatus,
} from '../ledger/reservation-status.js';

export const ALLOWED_TRANSITIONS: Readonly<
  Record<ReservationStatus, readonly ReservationStatus[]>
> = {
  [ReservationStatus.Pending]: [
    ReservationStatus.Confirmed,
    ReservationStatus.Cancelled,
  ],
  [ReservationStatus.Confirmed]: [
    ReservationStatus.Cancelled,
    ReservationStatus.Completed,
  ],
  [ReservationStatus.Cancelled]: [],
  [ReservationStatus.Completed]: [],
};

/**
 * Throws `ReservationClosedError` out of a terminal status and
 * `InvalidTransitionError` for any move missing from the table.
 */
export function assertTransition(
  from: ReservationStatus,
  to: ReservationStatus,
): void {
  if (isTerminalStatus(from)) {
    throw new ReservationClosedError(from);
  }
  if (!ALLOWED_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
}

@Injectable()
export class ReservationStateMachine {
  private readonly logger = new Logger(ReservationStateMachine.name);

  constructor(
    @Inject(BOOKING_LEDGER) private readonly ledger: BookingLedger,
  ) {}

  async updateStatus(
    reservationId: number,
    newStatus: ReservationStatus,
    actingCompanyId: number,
  ): Promise<Reservation> {
    const existing = await this.ledger.getById(reservationId);
    // Another company's reservation is reported as missing.
    if (!existing.found || existing.value.companyId !== actingCompanyId) {
      throw new ReservationNotFoundError(reservationId);
    }

    const previous = existing.value.status;
    assertTransition(previous, newStatus);

    const updated = await this.ledger.updateStatus(
      reservationId,
      newStatus,
      previous,
    );
    if (!updated.found) {
      this.logger.warn(
        `Reservation ${reservationId} left "${previous}" before it could move to "${newStatus}"`,
      );
      throw new PersistenceConflictError(
        'Reservation was modified concurrently, reload it and try again',
      );
    }

    this.logger.log(
      `Reservation ${reservationId}: "${previous}" -> "${newStatus}" by company ${actingCompanyId}`,
    );
    return updated.value;
  }
}
