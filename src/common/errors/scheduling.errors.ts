export type SchedulingErrorKind =
  | 'not_found'
  | 'unauthorized'
  | 'validation_failed'
  | 'slot_unavailable'
  | 'state_conflict'
  | 'persistence_error';

/**
 * Base class for every rejection raised by the scheduling core.
 * Carries no transport concerns; `SchedulingExceptionFilter` maps `kind`
 * to an HTTP status at the API boundary.
 */
export abstract class SchedulingError extends Error {
  abstract readonly kind: SchedulingErrorKind;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type IdentityFailureReason = 'no-profile' | 'wrong-role';

export class IdentityNotResolvedError extends SchedulingError {
  readonly kind = 'unauthorized';
  readonly code = 'IDENTITY_NOT_RESOLVED';

  constructor(readonly reason: IdentityFailureReason) {
    super(
      reason === 'no-profile'
        ? 'Account has no profile for the requested role'
        : 'Account role is not allowed to perform this action',
    );
  }
}

export class ServiceNotFoundError extends SchedulingError {
  readonly kind = 'not_found';
  readonly code = 'SERVICE_NOT_FOUND';

  constructor(readonly serviceId: number) {
    super(`Service ${serviceId} not found`);
  }
}

export class ReservationNotFoundError extends SchedulingError {
  readonly kind = 'not_found';
  readonly code = 'RESERVATION_NOT_FOUND';

  constructor(readonly reservationId: number) {
    super(`Reservation ${reservationId} not found`);
  }
}

export class EmployeeNotFoundError extends SchedulingError {
  readonly kind = 'not_found';
  readonly code = 'EMPLOYEE_NOT_FOUND';

  constructor(readonly employeeId: number) {
    super(`Employee ${employeeId} not found`);
  }
}

export class ValidationFailedError extends SchedulingError {
  readonly kind = 'validation_failed';
  readonly code: string = 'VALIDATION_FAILED';
}

export class InvalidTransitionError extends ValidationFailedError {
  override readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Cannot change reservation status from "${from}" to "${to}"`);
  }
}

/** A booking request naming a service that does not exist. */
export class UnknownServiceError extends ValidationFailedError {
  override readonly code = 'SERVICE_NOT_FOUND';

  constructor(readonly serviceId: number) {
    super(`Service ${serviceId} not found`);
  }
}

export class SlotUnavailableError extends SchedulingError {
  readonly kind = 'slot_unavailable';
  readonly code = 'SLOT_UNAVAILABLE';
}

export class ReservationClosedError extends SchedulingError {
  readonly kind = 'state_conflict';
  readonly code = 'RESERVATION_CLOSED';

  constructor(readonly status: string) {
    super(`Reservation is ${status.toLowerCase()} and can no longer be updated`);
  }
}

export class PersistenceConflictError extends SchedulingError {
  readonly kind = 'state_conflict';
  readonly code = 'PERSISTENCE_CONFLICT';
}

export class PersistenceError extends SchedulingError {
  readonly kind = 'persistence_error';
  readonly code = 'PERSISTENCE_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
