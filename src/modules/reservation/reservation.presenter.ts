import { formatNaiveDateTime } from '../../common/time/naive-datetime.js';
import type {
  Reservation,
  ReservationDetails,
  ReservationListing,
  ReservedService,
} from '../ledger/ledger.types.js';
import type { ReservationStatus } from '../ledger/reservation-status.js';

export interface ReservationResponse {
  id: number;
  client_id: number | null;
  company_id: number;
  service_id: number;
  employee_id: number;
  start_time: string;
  end_time: string;
  status: ReservationStatus;
  note: string | null;
  created_date: string;
  updated_date: string | null;
}

export interface ReservationListingResponse extends ReservationResponse {
  service: {
    id: number;
    name: string;
    price: number;
    duration_minutes: number;
    is_active: boolean;
  };
}

export interface ReservationDetailsResponse extends ReservationResponse {
  client: {
    id: number;
    first_name: string;
    last_name: string;
    phone_number: string | null;
  } | null;
  employee: { id: number; first_name: string; last_name: string };
  service: ReservationListingResponse['service'] & {
    subcategory_id: number;
    description: string | null;
    company: {
      id: number;
      name: string;
      city: string;
      postal_code: string;
      street: string;
      category_id: number | null;
      description: string | null;
      phone_number: string;
    };
  };
}

export function toReservationResponse(
  reservation: Reservation,
): ReservationResponse {
  return {
    id: reservation.id,
    client_id: reservation.clientId,
    company_id: reservation.companyId,
    service_id: reservation.serviceId,
    employee_id: reservation.employeeId,
    start_time: formatNaiveDateTime(reservation.startTime),
    end_time: formatNaiveDateTime(reservation.endTime),
    status: reservation.status,
    note: reservation.note,
    created_date: formatNaiveDateTime(reservation.createdDate),
    updated_date:
      reservation.updatedDate === null
        ? null
        : formatNaiveDateTime(reservation.updatedDate),
  };
}

const toServiceResponse = (service: ReservedService) => ({
  id: service.id,
  name: service.name,
  price: service.price,
  duration_minutes: service.durationMinutes,
  is_active: service.isActive,
});

export function toListingResponse(
  listing: ReservationListing,
): ReservationListingResponse {
  return {
    ...toReservationResponse(listing),
    service: toServiceResponse(listing.service),
  };
}

export function toDetailsResponse(
  details: ReservationDetails,
): ReservationDetailsResponse {
  const { client, employee, service } = details;
  return {
    ...toReservationResponse(details),
    client:
      client === null
        ? null
        : {
            id: client.id,
            first_name: client.firstName,
            last_name: client.lastName,
            phone_number: client.phoneNumber,
          },
    employee: {
      id: employee.id,
      first_name: employee.firstName,
      last_name: employee.lastName,
    },
    service: {
      ...toServiceResponse(service),
      subcategory_id: service.subcategoryId,
      description: service.description,
      company: {
        id: service.company.id,
        name: service.company.name,
        city: service.company.city,
        postal_code: service.company.postalCode,
        street: service.company.street,
        category_id: service.company.categoryId,
        description: service.company.description,
        phone_number: service.company.phoneNumber,
      },
    },
  };
}
