import type { Option } from '../../common/types/option.js';
import type { ReservationStatus } from './reservation-status.js';

export const BOOKING_LEDGER = 'BOOKING_LEDGER';

export interface Reservation {
  id: number;
  clientId: number | null;
  companyId: number;
  serviceId: number;
  employeeId: number;
  startTime: Date;
  endTime: Date;
  status: ReservationStatus;
  note: string | null;
  createdDate: Date;
  updatedDate: Date | null;
}

export type NewReservation = Omit<Reservation, 'id' | 'updatedDate'>;

export interface ReservedService {
  id: number;
  name: string;
  price: number;
  durationMinutes: number;
  isActive: boolean;
}

export interface ReservationListing extends Reservation {
  service: ReservedService;
}

export interface ReservationClient {
  id: number;
  firstName: string;
  lastName: string;
  phoneNumber: string | null;
}

export interface ReservationEmployee {
  id: number;
  firstName: string;
  lastName: string;
}

export interface ReservationCompany {
  id: number;
  name: string;
  city: string;
  postalCode: string;
  street: string;
  categoryId: number | null;
  description: string | null;
  phoneNumber: string;
}

export interface ReservationServiceDetails extends ReservedService {
  subcategoryId: number;
  description: string | null;
  company: ReservationCompany;
}

/** A reservation with the client, employee and company it involves. */
export interface ReservationDetails extends Reservation {
  client: ReservationClient | null;
  employee: ReservationEmployee;
  service: ReservationServiceDetails;
}

export interface BookingLedger {
  create(reservation: NewReservation): Promise<Reservation>;
  getById(reservationId: number): Promise<Option<Reservation>>;
  getDetailsById(reservationId: number): Promise<Option<ReservationDetails>>;
  /** Reservations of the employee starting on `day`, minus `excludeStatuses` (terminal ones by default). */
  listByEmployeeAndDate(
    employeeId: number,
    day: Date,
    excludeStatuses?: readonly ReservationStatus[],
  ): Promise<Reservation[]>;
  listByClient(clientId: number): Promise<ReservationListing[]>;
  listByCompany(companyId: number): Promise<ReservationListing[]>;
  listByEmployee(
    companyId: number,
    employeeId: number,
  ): Promise<ReservationListing[]>;
  /**
   * Moves the reservation to `status` only while it is still in
   * `expectedStatus`; `none` when it is missing or was changed meanwhile.
   */
  updateStatus(
    reservationId: number,
    status: ReservationStatus,
    expectedStatus: ReservationStatus,
  ): Promise<Option<Reservation>>;
}
