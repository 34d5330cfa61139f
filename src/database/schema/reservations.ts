import {
  pgTable,
  serial,
  integer,
  text,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { clients, companies } from './accounts.js';
import { employees } from './employees.js';
import { services } from './services.js';
import { reservationStatusEnum } from './enums.js';

// The no-overlap guarantee is an exclusion constraint created in migrate.ts;
// drizzle has no DSL for EXCLUDE USING gist.
export const reservations = pgTable(
  'reservations',
  {
    id: serial().primaryKey(),
    clientId: integer('client_id').references(() => clients.id, {
      onDelete: 'set null',
    }),
    companyId: integer('company_id')
      .notNull()
      .references(() => companies.id, { onDelete: 'cascade' }),
    serviceId: integer('service_id')
      .notNull()
      .references(() => services.id, { onDelete: 'cascade' }),
    employeeId: integer('employee_id')
      .notNull()
      .references(() => employees.id, { onDelete: 'cascade' }),
    startTime: timestamp('start_time', { mode: 'string' }).notNull(),
    endTime: timestamp('end_time', { mode: 'string' }).notNull(),
    status: reservationStatusEnum().notNull(),
    note: text(),
    createdDate: timestamp('created_date', { mode: 'string' }).notNull(),
    updatedDate: timestamp('updated_date', { mode: 'string' }),
  },
  (table) => [
    index('idx_reservations_employee_time').on(
      table.employeeId,
      table.startTime,
    ),
    index('idx_reservations_company').on(table.companyId),
    index('idx_reservations_client').on(table.clientId),
  ],
);
