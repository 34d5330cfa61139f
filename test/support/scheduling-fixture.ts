import { WeekDay } from '../../src/modules/working-day/weekday';
import { FixedClock } from './fixed-clock';
import { InMemoryServiceCatalog } from './in-memory-catalog';
import { InMemoryIdentityDirectory } from './in-memory-identity';
import { InMemoryBookingLedger } from './in-memory-ledger';
import { InMemoryOpeningHours } from './in-memory-opening-hours';

export const COMPANY_ID = 10;
export const OTHER_COMPANY_ID = 20;
export const CLIENT_ID = 7;
export const EMPLOYEE_ID = 5;
export const UNASSIGNED_EMPLOYEE_ID = 6;
export const SERVICE_ID = 1;

export const CLIENT_ACCOUNT = '00000000-0000-4000-8000-000000000001';
export const COMPANY_ACCOUNT = '00000000-0000-4000-8000-000000000002';
export const OTHER_COMPANY_ACCOUNT = '00000000-0000-4000-8000-000000000003';
export const ORPHAN_ACCOUNT = '00000000-0000-4000-8000-000000000004';

export const haircut = {
  id: SERVICE_ID,
  companyId: COMPANY_ID,
  name: 'Haircut',
  price: 40,
  durationMinutes: 30,
  isActive: true,
};

export const clientProfile = {
  id: CLIENT_ID,
  firstName: 'Iva',
  lastName: 'Kos',
  phoneNumber: '555-0101',
};

export const salon = {
  id: COMPANY_ID,
  name: 'Corner Salon',
  city: 'Springfield',
  postalCode: '10000',
  street: 'Main Street 1',
  categoryId: 2,
  description: null,
  phoneNumber: '555-0100',
};

/** Local wall-clock time on January 2030; the 7th is a Monday. */
export const jan2030 = (day: number, hours = 0, minutes = 0) =>
  new Date(2030, 0, day, hours, minutes, 0);

/**
 * One company open 08:00-16:30 on Mondays and closed on Sundays, a 30-minute
 * service performed by one employee, and a clock on Sunday 2030-01-06 noon.
 */
export function createSchedulingFixture() {
  const clock = new FixedClock(jan2030(6, 12));
  const identity = new InMemoryIdentityDirectory()
    .addClient(CLIENT_ACCOUNT, CLIENT_ID)
    .addCompany(COMPANY_ACCOUNT, COMPANY_ID)
    .addCompany(OTHER_COMPANY_ACCOUNT, OTHER_COMPANY_ID);
  const catalog = new InMemoryServiceCatalog()
    .addService(haircut)
    .addEmployee({
      id: EMPLOYEE_ID,
      companyId: COMPANY_ID,
      firstName: 'Ada',
      lastName: 'Novak',
    })
    .addEmployee({
      id: UNASSIGNED_EMPLOYEE_ID,
      companyId: COMPANY_ID,
      firstName: 'Ben',
      lastName: 'Horvat',
    })
    .assign(SERVICE_ID, EMPLOYEE_ID);
  const openingHours = new InMemoryOpeningHours()
    .set(COMPANY_ID, WeekDay.Monday, '08:00', '16:30')
    .set(COMPANY_ID, WeekDay.Sunday, null, null);
  const reservedHaircut = {
    id: haircut.id,
    name: haircut.name,
    price: haircut.price,
    durationMinutes: haircut.durationMinutes,
    isActive: haircut.isActive,
  };
  const ledger = new InMemoryBookingLedger(
    () => reservedHaircut,
    (reservation) => ({
      client: reservation.clientId === null ? null : clientProfile,
      employee: { id: EMPLOYEE_ID, firstName: 'Ada', lastName: 'Novak' },
      service: {
        ...reservedHaircut,
        subcategoryId: 3,
        description: null,
        company: salon,
      },
    }),
  );

  return { clock, identity, catalog, openingHours, ledger };
}

export type SchedulingFixture = ReturnType<typeof createSchedulingFixture>;
