import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  doublePrecision,
  boolean,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';
import { companies } from './accounts.js';
import { employees } from './employees.js';

export const services = pgTable(
  'services',
  {
    id: serial().primaryKey(),
    companyId: integer('company_id')
      .notNull()
      .references(() => companies.id, { onDelete: 'cascade' }),
    subcategoryId: integer('subcategory_id').notNull(),
    name: varchar({ length: 255 }).notNull(),
    description: text(),
    price: doublePrecision().notNull(),
    durationMinutes: integer('duration_minutes').notNull(),
    isActive: boolean('is_active').notNull().default(false),
  },
  (table) => [index('idx_services_company').on(table.companyId)],
);

export const serviceEmployees = pgTable(
  'service_employees',
  {
    serviceId: integer('service_id')
      .notNull()
      .references(() => services.id, { onDelete: 'cascade' }),
    employeeId: integer('employee_id')
      .notNull()
      .references(() => employees.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.serviceId, table.employeeId] })],
);
