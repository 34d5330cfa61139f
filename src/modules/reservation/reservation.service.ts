import { Inject, Injectable, Logger } from '@nestjs/common';
import { addMinutes } from 'date-fns';
import { CLOCK, type Clock } from '../../common/clock/clock.js';
import {
  EmployeeNotFoundError,
  PersistenceConflictError,
  ReservationNotFoundError,
  SlotUnavailableError,
  UnknownServiceError,
} from '../../common/errors/scheduling.errors.js';
import { formatNaiveDateTime } from '../../common/time/naive-datetime.js';
import { IdentityService } from '../identity/identity.service.js';
import type { AccountPrincipal } from '../identity/account-principal.js';
import {
  SERVICE_CATALOG,
  type ServiceCatalog,
} from '../catalog/catalog.types.js';
import { AvailabilityService } from '../availability/availability.service.js';
import {
  BOOKING_LEDGER,
  type BookingLedger,
  type Reservation,
  type ReservationDetails,
  type ReservationListing,
} from '../ledger/ledger.types.js';
import { ReservationStatus } from '../ledger/reservation-status.js';
import { ReservationStateMachine } from './reservation-state-machine.js';
import type { CreateReservationDto } from './dto/create-reservation.dto.js';

@Injectable()
export class ReservationService {
  private readonly logger = new Logger(ReservationService.name);

  constructor(
    private readonly identity: IdentityService,
    @Inject(SERVICE_CATALOG) private readonly catalog: ServiceCatalog,
    private readonly availability: AvailabilityService,
    @Inject(BOOKING_LEDGER) private readonly ledger: BookingLedger,
    private readonly stateMachine: ReservationStateMachine,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Books `start_time` if it is one of the slots the calculator offers
   * right now. Clients create pending requests; a company booking on its
   * own calendar is confirmed straight away and has no client.
   */
  async createReservation(
    principal: AccountPrincipal,
    request: CreateReservationDto,
  ): Promise<Reservation> {
    const identity = await this.identity.resolve(principal);
    const clientId = identity.role === 'user' ? identity.clientId : null;
    const status =
      identity.role === 'user'
        ? ReservationStatus.Pending
        : ReservationStatus.Confirmed;

    const service = await this.catalog.getServiceById(request.service_id);
    if (!service.found) {
      throw new UnknownServiceError(request.service_id);
    }

    const availability = await this.availability.availableSlots(
      request.employee_id,
      request.service_id,
      request.start_time,
    );
    if (availability.kind === 'not-applicable') {
      throw new SlotUnavailableError(
        'The selected employee cannot perform this service',
      );
    }

    const requestedAt = request.start_time.getTime();
    if (!availability.slots.some((slot) => slot.getTime() === requestedAt)) {
      throw new SlotUnavailableError(
        `${formatNaiveDateTime(request.start_time)} is not an available slot`,
      );
    }

    try {
      const reservation = await this.ledger.create({
        clientId,
        companyId: service.value.companyId,
        serviceId: service.value.id,
        employeeId: request.employee_id,
        startTime: request.start_time,
        endTime: addMinutes(
          request.start_time,
          service.value.durationMinutes,
        ),
        status,
        note: request.note ?? null,
        createdDate: this.clock.now(),
      });
      this.logger.log(
        `Reservation ${reservation.id} created for employee ${reservation.employeeId} at ${formatNaiveDateTime(reservation.startTime)} (${reservation.status})`,
      );
      return reservation;
    } catch (error: unknown) {
      if (error instanceof PersistenceConflictError) {
        this.logger.warn(
          `Lost booking race for employee ${request.employee_id} at ${formatNaiveDateTime(request.start_time)}`,
        );
      }
      throw error;
    }
  }

  async updateStatus(
    principal: AccountPrincipal,
    reservationId: number,
    newStatus: ReservationStatus,
  ): Promise<Reservation> {
    const companyId = await this.identity.resolveCompany(principal);
    return this.stateMachine.updateStatus(reservationId, newStatus, companyId);
  }

  /** Visible to the company that owns it and to the client who booked it. */
  async getReservation(
    principal: AccountPrincipal,
    reservationId: number,
  ): Promise<ReservationDetails> {
    const identity = await this.identity.resolve(principal);
    const reservation = await this.ledger.getDetailsById(reservationId);
    if (!reservation.found) {
      throw new ReservationNotFoundError(reservationId);
    }

    const visible =
      identity.role === 'company'
        ? reservation.value.companyId === identity.companyId
        : reservation.value.clientId === identity.clientId;
    if (!visible) {
      throw new ReservationNotFoundError(reservationId);
    }
    return reservation.value;
  }

  async listForClient(
    principal: AccountPrincipal,
  ): Promise<ReservationListing[]> {
    const clientId = await this.identity.resolveClient(principal);
    return this.ledger.listByClient(clientId);
  }

  async listForCompany(
    principal: AccountPrincipal,
  ): Promise<ReservationListing[]> {
    const companyId = await this.identity.resolveCompany(principal);
    return this.ledger.listByCompany(companyId);
  }

  async listForEmployee(
    principal: AccountPrincipal,
    employeeId: number,
  ): Promise<ReservationListing[]> {
    const companyId = await this.identity.resolveCompany(principal);
    const employee = await this.catalog.findEmployee(companyId, employeeId);
    if (!employee.found) {
      throw new EmployeeNotFoundError(employeeId);
    }
    return this.ledger.listByEmployee(companyId, employeeId);
  }
}
