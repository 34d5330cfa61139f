import { Test, TestingModule } from '@nestjs/testing';
import { format } from 'date-fns';
import { AvailabilityService } from './availability.service';
import { SERVICE_CATALOG } from '../catalog/catalog.types';
import { OPENING_HOURS } from '../working-day/working-day.types';
import { BOOKING_LEDGER } from '../ledger/ledger.types';
import { ReservationStatus } from '../ledger/reservation-status';
import { CLOCK } from '../../common/clock/clock';
import {
  COMPANY_ID,
  createSchedulingFixture,
  EMPLOYEE_ID,
  jan2030,
  SERVICE_ID,
  UNASSIGNED_EMPLOYEE_ID,
  type SchedulingFixture,
} from '../../../test/support/scheduling-fixture';

describe('AvailabilityService', () => {
  let service: AvailabilityService;
  let fixture: SchedulingFixture;

  const book = (
    startHour: number,
    startMinute: number,
    status: ReservationStatus,
  ) =>
    fixture.ledger.seed({
      clientId: null,
      companyId: COMPANY_ID,
      serviceId: SERVICE_ID,
      employeeId: EMPLOYEE_ID,
      startTime: jan2030(7, startHour, startMinute),
      endTime: jan2030(7, startHour, startMinute + 30),
      status,
      note: null,
      createdDate: jan2030(1),
      updatedDate: null,
    });

  const slotsOn = async (day: Date, employeeId = EMPLOYEE_ID) => {
    const result = await service.availableSlots(employeeId, SERVICE_ID, day);
    if (result.kind !== 'slots') {
      throw new Error(`expected slots, got ${result.reason}`);
    }
    return result.slots.map((slot) => format(slot, 'HH:mm'));
  };

  beforeEach(async () => {
    fixture = createSchedulingFixture();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AvailabilityService,
        { provide: SERVICE_CATALOG, useValue: fixture.catalog },
        { provide: OPENING_HOURS, useValue: fixture.openingHours },
        { provide: BOOKING_LEDGER, useValue: fixture.ledger },
        { provide: CLOCK, useValue: fixture.clock },
      ],
    }).compile();

    service = module.get<AvailabilityService>(AvailabilityService);
  });

  it('should report an unknown service as not applicable', async () => {
    await expect(
      service.availableSlots(EMPLOYEE_ID, 999, jan2030(7)),
    ).resolves.toEqual({ kind: 'not-applicable', reason: 'service-not-found' });
  });

  it('should report an employee outside the roster as not applicable', async () => {
    await expect(
      service.availableSlots(UNASSIGNED_EMPLOYEE_ID, SERVICE_ID, jan2030(7)),
    ).resolves.toEqual({
      kind: 'not-applicable',
      reason: 'employee-not-assigned',
    });
  });

  it('should return no slots for a day in the past', async () => {
    await expect(
      service.availableSlots(EMPLOYEE_ID, SERVICE_ID, jan2030(5)),
    ).resolves.toEqual({ kind: 'slots', slots: [] });
  });

  it('should return no slots for a Sunday stored as closed', async () => {
    expect(await slotsOn(jan2030(13))).toEqual([]);
  });

  it('should return no slots for a weekday with no stored hours', async () => {
    expect(await slotsOn(jan2030(8))).toEqual([]);
  });

  it('should leave out times blocked by a confirmed booking', async () => {
    book(10, 0, ReservationStatus.Confirmed);

    const slots = await slotsOn(jan2030(7));

    expect(slots).toHaveLength(30);
    expect(slots).toContain('09:30');
    expect(slots).toContain('10:30');
    expect(slots).not.toContain('09:45');
    expect(slots).not.toContain('10:00');
    expect(slots).not.toContain('10:15');
  });

  it('should ignore cancelled and completed bookings', async () => {
    book(12, 0, ReservationStatus.Cancelled);
    book(14, 0, ReservationStatus.Completed);

    const slots = await slotsOn(jan2030(7));

    expect(slots).toHaveLength(33);
    expect(slots).toContain('12:00');
    expect(slots).toContain('14:00');
  });

  it('should give identical answers when asked twice', async () => {
    book(9, 0, ReservationStatus.Pending);

    const monday = jan2030(7);
    const first = await service.availableSlots(EMPLOYEE_ID, SERVICE_ID, monday);
    const second = await service.availableSlots(
      EMPLOYEE_ID,
      SERVICE_ID,
      monday,
    );

    expect(second).toEqual(first);
  });

  it('should start from the next quarter hour on the current day', async () => {
    fixture.clock.set(jan2030(7, 15, 10));

    expect(await slotsOn(jan2030(7))).toEqual([
      '15:15',
      '15:30',
      '15:45',
      '16:00',
    ]);
  });
});
