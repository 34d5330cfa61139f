import { Test, TestingModule } from '@nestjs/testing';
import {
  InvalidTransitionError,
  PersistenceConflictError,
  ReservationClosedError,
  ReservationNotFoundError,
} from '../../common/errors/scheduling.errors';
import { BOOKING_LEDGER } from '../ledger/ledger.types';
import { ReservationStatus } from '../ledger/reservation-status';
import {
  assertTransition,
  ReservationStateMachine,
} from './reservation-state-machine';
import {
  COMPANY_ID,
  createSchedulingFixture,
  EMPLOYEE_ID,
  jan2030,
  OTHER_COMPANY_ID,
  SERVICE_ID,
  type SchedulingFixture,
} from '../../../test/support/scheduling-fixture';

describe('assertTransition', () => {
  const { Pending, Confirmed, Cancelled, Completed } = ReservationStatus;

  it.each([
    [Pending, Confirmed],
    [Pending, Cancelled],
    [Confirmed, Cancelled],
    [Confirmed, Completed],
  ])('should allow %s -> %s', (from, to) => {
    expect(() => assertTransition(from, to)).not.toThrow();
  });

  it.each([
    [Completed, Confirmed],
    [Completed, Cancelled],
    [Cancelled, Pending],
    [Cancelled, Cancelled],
  ])('should reject %s -> %s as closed', (from, to) => {
    expect(() => assertTransition(from, to)).toThrow(ReservationClosedError);
  });

  it.each([
    [Pending, Completed],
    [Pending, Pending],
    [Confirmed, Pending],
    [Confirmed, Confirmed],
  ])('should reject %s -> %s as an invalid transition', (from, to) => {
    expect(() => assertTransition(from, to)).toThrow(InvalidTransitionError);
  });
});

describe('ReservationStateMachine', () => {
  let stateMachine: ReservationStateMachine;
  let fixture: SchedulingFixture;

  const seed = (status: ReservationStatus) =>
    fixture.ledger.seed({
      clientId: 7,
      companyId: COMPANY_ID,
      serviceId: SERVICE_ID,
      employeeId: EMPLOYEE_ID,
      startTime: jan2030(7, 10),
      endTime: jan2030(7, 10, 30),
      status,
      note: null,
      createdDate: jan2030(1),
      updatedDate: null,
    });

  beforeEach(async () => {
    fixture = createSchedulingFixture();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReservationStateMachine,
        { provide: BOOKING_LEDGER, useValue: fixture.ledger },
      ],
    }).compile();

    stateMachine = module.get<ReservationStateMachine>(ReservationStateMachine);
  });

  it('should confirm a pending reservation', async () => {
    const reservation = seed(ReservationStatus.Pending);

    const updated = await stateMachine.updateStatus(
      reservation.id,
      ReservationStatus.Confirmed,
      COMPANY_ID,
    );

    expect(updated.status).toBe(ReservationStatus.Confirmed);
    expect(updated.updatedDate).not.toBeNull();
  });

  it('should reject Completed -> Confirmed and leave the reservation unchanged', async () => {
    const reservation = seed(ReservationStatus.Completed);

    await expect(
      stateMachine.updateStatus(
        reservation.id,
        ReservationStatus.Confirmed,
        COMPANY_ID,
      ),
    ).rejects.toMatchObject({
      kind: 'state_conflict',
      code: 'RESERVATION_CLOSED',
    });

    const stored = await fixture.ledger.getById(reservation.id);
    expect(stored).toEqual({ found: true, value: reservation });
  });

  it('should report a missing reservation as not found', async () => {
    await expect(
      stateMachine.updateStatus(404, ReservationStatus.Confirmed, COMPANY_ID),
    ).rejects.toThrow(ReservationNotFoundError);
  });

  it("should hide another company's reservation", async () => {
    const reservation = seed(ReservationStatus.Pending);

    await expect(
      stateMachine.updateStatus(
        reservation.id,
        ReservationStatus.Confirmed,
        OTHER_COMPANY_ID,
      ),
    ).rejects.toThrow(ReservationNotFoundError);
  });

  it('should raise a conflict when the status changed underneath', async () => {
    const reservation = seed(ReservationStatus.Pending);
    jest
      .spyOn(fixture.ledger, 'updateStatus')
      .mockResolvedValueOnce({ found: false });

    await expect(
      stateMachine.updateStatus(
        reservation.id,
        ReservationStatus.Cancelled,
        COMPANY_ID,
      ),
    ).rejects.toThrow(PersistenceConflictError);
  });
});
