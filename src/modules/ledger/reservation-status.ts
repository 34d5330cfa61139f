export enum ReservationStatus {
  Pending = 'Pending approval',
  Confirmed = 'Confirmed',
  Cancelled = 'Cancelled',
  Completed = 'Completed',
}

export const RESERVATION_STATUS_VALUES = [
  ReservationStatus.Pending,
  ReservationStatus.Confirmed,
  ReservationStatus.Cancelled,
  ReservationStatus.Completed,
] as const;

/** Listing order: actionable reservations first. Lower sorts earlier. */
export const STATUS_PRIORITY: Readonly<Record<ReservationStatus, number>> = {
  [ReservationStatus.Pending]: 1,
  [ReservationStatus.Confirmed]: 2,
  [ReservationStatus.Completed]: 3,
  [ReservationStatus.Cancelled]: 4,
};

export const BLOCKING_STATUSES: readonly ReservationStatus[] = [
  ReservationStatus.Pending,
  ReservationStatus.Confirmed,
];

export const TERMINAL_STATUSES: readonly ReservationStatus[] = [
  ReservationStatus.Cancelled,
  ReservationStatus.Completed,
];

export function isTerminalStatus(status: ReservationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
