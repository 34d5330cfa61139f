import { Inject, Injectable } from '@nestjs/common';
import { isBefore, startOfDay } from 'date-fns';
import { CLOCK, type Clock } from '../../common/clock/clock.js';
import { atTimeOfDay } from '../../common/time/naive-datetime.js';
import {
  SERVICE_CATALOG,
  type ServiceCatalog,
} from '../catalog/catalog.types.js';
import {
  OPENING_HOURS,
  type OpeningHoursProvider,
} from '../working-day/working-day.types.js';
import {
  BOOKING_LEDGER,
  type BookingLedger,
} from '../ledger/ledger.types.js';
import { weekDayOf } from '../working-day/weekday.js';
import { generateSlots } from './slot-grid.js';
import type { AvailabilityResult } from './availability.types.js';

const noSlots = (): AvailabilityResult => ({ kind: 'slots', slots: [] });

@Injectable()
export class AvailabilityService {
  constructor(
    @Inject(SERVICE_CATALOG) private readonly catalog: ServiceCatalog,
    @Inject(OPENING_HOURS) private readonly openingHours: OpeningHoursProvider,
    @Inject(BOOKING_LEDGER) private readonly ledger: BookingLedger,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Start times at which `employeeId` can perform `serviceId` on `day`.
   * `not-applicable` means the pair itself is invalid; a closed or past
   * day is a valid, empty result.
   */
  async availableSlots(
    employeeId: number,
    serviceId: number,
    day: Date,
  ): Promise<AvailabilityResult> {
    const service = await this.catalog.getServiceById(serviceId);
    if (!service.found) {
      return { kind: 'not-applicable', reason: 'service-not-found' };
    }

    const assigned = await this.catalog.isEmployeeAssignedToService(
      serviceId,
      employeeId,
    );
    if (!assigned) {
      return { kind: 'not-applicable', reason: 'employee-not-assigned' };
    }

    const now = this.clock.now();
    const date = startOfDay(day);
    if (isBefore(date, startOfDay(now))) return noSlots();

    const workingDay = await this.openingHours.getWorkingDay(
      service.value.companyId,
      weekDayOf(date),
    );
    if (!workingDay.found) return noSlots();

    const { openingTime, closingTime } = workingDay.value;
    if (openingTime === null || closingTime === null) return noSlots();

    const booked = await this.ledger.listByEmployeeAndDate(employeeId, date);

    return {
      kind: 'slots',
      slots: generateSlots({
        windowStart: atTimeOfDay(date, openingTime),
        windowEnd: atTimeOfDay(date, closingTime),
        durationMinutes: service.value.durationMinutes,
        booked: booked.map((reservation) => ({
          start: reservation.startTime,
          end: reservation.endTime,
        })),
        now,
      }),
    };
  }
}
