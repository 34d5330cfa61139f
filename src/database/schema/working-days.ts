import { pgTable, serial, integer, time, unique } from 'drizzle-orm/pg-core';
import { companies } from './accounts.js';
import { weekDayEnum } from './enums.js';

export const workingDays = pgTable(
  'working_days',
  {
    id: serial().primaryKey(),
    companyId: integer('company_id')
      .notNull()
      .references(() => companies.id, { onDelete: 'cascade' }),
    day: weekDayEnum().notNull(),
    openingTime: time('opening_time'),
    closingTime: time('closing_time'),
  },
  (table) => [
    unique('working_days_company_day_unique').on(table.companyId, table.day),
  ],
);
