import { Logger } from '@nestjs/common';
import { neon } from '@neondatabase/serverless';
import * as dotenv from 'dotenv';

const logger = new Logger('Migrations');

/** Idempotent: safe to run on every boot. */
export async function runMigrations(databaseUrl: string): Promise<void> {
  const sql = neon(databaseUrl);

  const tableExists = async (tableName: string): Promise<boolean> => {
    const result = await sql`
      SELECT EXISTS (
        SELECT FROM information_schema.tables
        WHERE table_schema = 'public'
        AND table_name = ${tableName}
      ) as exists
    `;
    return result[0]?.exists === true;
  };

  logger.log('Checking/creating database schema...');

  // btree_gist lets the exclusion constraint mix `=` on integers with `&&` on ranges
  await sql`CREATE EXTENSION IF NOT EXISTS btree_gist`;

  await sql`
    DO $$
    BEGIN
      IF NOT EXISTS (SELECT 1 FROM pg_type WHERE typname = 'role_enum') THEN
        CREATE TYPE role_enum AS ENUM ('user', 'company');
      END IF;
      IF NOT EXISTS (SELECT 1 FROM pg_type WHERE typname = 'day_enum') THEN
        CREATE TYPE day_enum AS ENUM (
          'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'
        );
      END IF;
      IF NOT EXISTS (SELECT 1 FROM pg_type WHERE typname = 'reservation_enum') THEN
        CREATE TYPE reservation_enum AS ENUM (
          'Pending approval', 'Confirmed', 'Cancelled', 'Completed'
        );
      END IF;
    END $$
  `;

  if (!(await tableExists('accounts'))) {
    logger.log('Creating accounts table...');
    await sql`
      CREATE TABLE accounts (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        email VARCHAR(255) NOT NULL UNIQUE,
        phone_number VARCHAR(50) NOT NULL,
        password VARCHAR(255) NOT NULL,
        role role_enum NOT NULL,
        registration_date TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `;
  }

  if (!(await tableExists('clients'))) {
    logger.log('Creating clients table...');
    await sql`
      CREATE TABLE clients (
        id SERIAL PRIMARY KEY,
        account_id UUID NOT NULL REFERENCES accounts(id) ON DELETE CASCADE,
        first_name VARCHAR(100) NOT NULL,
        last_name VARCHAR(100) NOT NULL
      )
    `;
  }

  if (!(await tableExists('companies'))) {
    logger.log('Creating companies table...');
    await sql`
      CREATE TABLE companies (
        id SERIAL PRIMARY KEY,
        account_id UUID NOT NULL REFERENCES accounts(id) ON DELETE CASCADE,
        name VARCHAR(255) NOT NULL,
        city VARCHAR(100) NOT NULL,
        postal_code VARCHAR(20) NOT NULL,
        street VARCHAR(255) NOT NULL,
        category_id INT,
        description TEXT
      )
    `;
  }

  if (!(await tableExists('employees'))) {
    logger.log('Creating employees table...');
    await sql`
      CREATE TABLE employees (
        id SERIAL PRIMARY KEY,
        company_id INT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
        first_name VARCHAR(100) NOT NULL,
        last_name VARCHAR(100) NOT NULL,
        email VARCHAR(255) NOT NULL UNIQUE,
        phone_number VARCHAR(50) NOT NULL
      )
    `;
  }

  if (!(await tableExists('services'))) {
    logger.log('Creating services table...');
    await sql`
      CREATE TABLE services (
        id SERIAL PRIMARY KEY,
        company_id INT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
        subcategory_id INT NOT NULL,
        name VARCHAR(255) NOT NULL,
        description TEXT,
        price DOUBLE PRECISION NOT NULL,
        duration_minutes INT NOT NULL CHECK (duration_minutes > 0 AND duration_minutes % 15 = 0),
        is_active BOOLEAN NOT NULL DEFAULT false
      )
    `;
  }

  if (!(await tableExists('service_employees'))) {
    logger.log('Creating service_employees table...');
    await sql`
      CREATE TABLE service_employees (
        service_id INT NOT NULL REFERENCES services(id) ON DELETE CASCADE,
        employee_id INT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
        PRIMARY KEY (service_id, employee_id)
      )
    `;
  }

  if (!(await tableExists('working_days'))) {
    logger.log('Creating working_days table...');
    await sql`
      CREATE TABLE working_days (
        id SERIAL PRIMARY KEY,
        company_id INT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
        day day_enum NOT NULL,
        opening_time TIME,
        closing_time TIME,
        CONSTRAINT working_days_company_day_unique UNIQUE (company_id, day),
        CONSTRAINT working_days_hours_paired CHECK (
          (opening_time IS NULL) = (closing_time IS NULL)
        ),
        CONSTRAINT working_days_hours_distinct CHECK (opening_time <> closing_time)
      )
    `;
  }

  if (!(await tableExists('reservations'))) {
    logger.log('Creating reservations table...');
    await sql`
      CREATE TABLE reservations (
        id SERIAL PRIMARY KEY,
        client_id INT REFERENCES clients(id) ON DELETE SET NULL,
        company_id INT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
        service_id INT NOT NULL REFERENCES services(id) ON DELETE CASCADE,
        employee_id INT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
        start_time TIMESTAMP NOT NULL,
        end_time TIMESTAMP NOT NULL,
        status reservation_enum NOT NULL,
        note TEXT,
        created_date TIMESTAMP NOT NULL,
        updated_date TIMESTAMP,
        CHECK (end_time > start_time)
      )
    `;
  }

  logger.log('All tables created/verified');

  await sql`CREATE INDEX IF NOT EXISTS idx_clients_account ON clients(account_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_companies_account ON companies(account_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_employees_company ON employees(company_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_services_company ON services(company_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_reservations_employee_time ON reservations(employee_id, start_time)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_reservations_company ON reservations(company_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_reservations_client ON reservations(client_id)`;

  // tsrange defaults to '[)', so back-to-back bookings do not collide.
  await sql`
    DO $$
    BEGIN
      IF NOT EXISTS (
        SELECT 1 FROM pg_constraint WHERE conname = 'no_employee_overlap'
      ) THEN
        ALTER TABLE reservations ADD CONSTRAINT no_employee_overlap
        EXCLUDE USING gist (
          employee_id WITH =,
          tsrange(start_time, end_time) WITH &&
        ) WHERE (status IN ('Pending approval', 'Confirmed'));
      END IF;
    END $$
  `;

  logger.log('Exclusion constraint no_employee_overlap verified');
  logger.log('Migration completed successfully');
}

// Run directly if called as script
if (require.main === module) {
  dotenv.config({ path: '.env.local' });
  dotenv.config({ path: '.env' });

  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.error('DATABASE_URL environment variable is required');
    process.exit(1);
  }

  runMigrations(databaseUrl)
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error(err);
      process.exit(1);
    });
}
