import { pgEnum } from 'drizzle-orm/pg-core';
import { RESERVATION_STATUS_VALUES } from '../../modules/ledger/reservation-status.js';
import { WEEK_DAY_VALUES } from '../../modules/working-day/weekday.js';

export const accountRoleEnum = pgEnum('role_enum', ['user', 'company']);

export const weekDayEnum = pgEnum('day_enum', WEEK_DAY_VALUES);

export const reservationStatusEnum = pgEnum(
  'reservation_enum',
  RESERVATION_STATUS_VALUES,
);
