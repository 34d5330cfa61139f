import { pgTable, serial, integer, varchar, index } from 'drizzle-orm/pg-core';
import { companies } from './accounts.js';

export const employees = pgTable(
  'employees',
  {
    id: serial().primaryKey(),
    companyId: integer('company_id')
      .notNull()
      .references(() => companies.id, { onDelete: 'cascade' }),
    firstName: varchar('first_name', { length: 100 }).notNull(),
    lastName: varchar('last_name', { length: 100 }).notNull(),
    email: varchar({ length: 255 }).notNull().unique(),
    phoneNumber: varchar('phone_number', { length: 50 }).notNull(),
  },
  (table) => [index('idx_employees_company').on(table.companyId)],
);
