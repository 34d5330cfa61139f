import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  serial,
  integer,
  text,
  index,
} from 'drizzle-orm/pg-core';
import { accountRoleEnum } from './enums.js';

export const accounts = pgTable('accounts', {
  id: uuid().primaryKey().defaultRandom(),
  email: varchar({ length: 255 }).notNull().unique(),
  phoneNumber: varchar('phone_number', { length: 50 }).notNull(),
  password: varchar({ length: 255 }).notNull(),
  role: accountRoleEnum().notNull(),
  registrationDate: timestamp('registration_date', { mode: 'string' })
    .notNull()
    .defaultNow(),
});

export const clients = pgTable(
  'clients',
  {
    id: serial().primaryKey(),
    accountId: uuid('account_id')
      .notNull()
      .references(() => accounts.id, { onDelete: 'cascade' }),
    firstName: varchar('first_name', { length: 100 }).notNull(),
    lastName: varchar('last_name', { length: 100 }).notNull(),
  },
  (table) => [index('idx_clients_account').on(table.accountId)],
);

export const companies = pgTable(
  'companies',
  {
    id: serial().primaryKey(),
    accountId: uuid('account_id')
      .notNull()
      .references(() => accounts.id, { onDelete: 'cascade' }),
    name: varchar({ length: 255 }).notNull(),
    city: varchar({ length: 100 }).notNull(),
    postalCode: varchar('postal_code', { length: 20 }).notNull(),
    street: varchar({ length: 255 }).notNull(),
    categoryId: integer('category_id'),
    description: text(),
  },
  (table) => [index('idx_companies_account').on(table.accountId)],
);
