import { Inject, Injectable } from '@nestjs/common';
import { addDays, startOfDay } from 'date-fns';
import { and, asc, eq, gte, lt, notInArray, sql, type SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import {
  accounts,
  clients,
  companies,
  employees,
  reservations,
  services,
} from '../../database/schema/index.js';
import { guardPersistence } from '../../database/persistence.js';
import { CLOCK, type Clock } from '../../common/clock/clock.js';
import {
  formatNaiveDateTime,
  parseNaiveDateTime,
} from '../../common/time/naive-datetime.js';
import { none, some, type Option } from '../../common/types/option.js';
import {
  RESERVATION_STATUS_VALUES,
  STATUS_PRIORITY,
  TERMINAL_STATUSES,
  type ReservationStatus,
} from './reservation-status.js';
import type {
  BookingLedger,
  NewReservation,
  Reservation,
  ReservationDetails,
  ReservationListing,
} from './ledger.types.js';

type ReservationRow = typeof reservations.$inferSelect;

const toReservation = (row: ReservationRow): Reservation => ({
  id: row.id,
  clientId: row.clientId,
  companyId: row.companyId,
  serviceId: row.serviceId,
  employeeId: row.employeeId,
  startTime: parseNaiveDateTime(row.startTime),
  endTime: parseNaiveDateTime(row.endTime),
  status: row.status,
  note: row.note,
  createdDate: parseNaiveDateTime(row.createdDate),
  updatedDate:
    row.updatedDate === null ? null : parseNaiveDateTime(row.updatedDate),
});

const clientAccounts = alias(accounts, 'client_account');
const companyAccounts = alias(accounts, 'company_account');

/** Listing order: the `STATUS_PRIORITY` table as a SQL `CASE`. */
export const statusPriority = sql`CASE ${reservations.status} ${sql.join(
  RESERVATION_STATUS_VALUES.map(
    (status) =>
      sql`WHEN ${status} THEN ${sql.raw(String(STATUS_PRIORITY[status]))}`,
  ),
  sql` `,
)} END`;

@Injectable()
export class BookingLedgerRepository implements BookingLedger {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async create(reservation: NewReservation): Promise<Reservation> {
    const [row] = await guardPersistence('create reservation', async () =>
      this.db
        .insert(reservations)
        .values({
          ...reservation,
          startTime: formatNaiveDateTime(reservation.startTime),
          endTime: formatNaiveDateTime(reservation.endTime),
          createdDate: formatNaiveDateTime(reservation.createdDate),
        })
        .returning(),
    );
    return toReservation(row);
  }

  async getById(reservationId: number): Promise<Option<Reservation>> {
    const [row] = await guardPersistence('load reservation', async () =>
      this.db
        .select()
        .from(reservations)
        .where(eq(reservations.id, reservationId))
        .limit(1),
    );
    return row ? some(toReservation(row)) : none();
  }

  async getDetailsById(
    reservationId: number,
  ): Promise<Option<ReservationDetails>> {
    const [row] = await guardPersistence('load reservation details', async () =>
      this.db
        .select({
          reservation: reservations,
          client: clients,
          clientPhone: clientAccounts.phoneNumber,
          employee: {
            id: employees.id,
            firstName: employees.firstName,
            lastName: employees.lastName,
          },
          service: {
            id: services.id,
            subcategoryId: services.subcategoryId,
            name: services.name,
            description: services.description,
            price: services.price,
            durationMinutes: services.durationMinutes,
            isActive: services.isActive,
          },
          company: {
            id: companies.id,
            name: companies.name,
            city: companies.city,
            postalCode: companies.postalCode,
            street: companies.street,
            categoryId: companies.categoryId,
            description: companies.description,
          },
          companyPhone: companyAccounts.phoneNumber,
        })
        .from(reservations)
        .leftJoin(clients, eq(clients.id, reservations.clientId))
        .leftJoin(clientAccounts, eq(clientAccounts.id, clients.accountId))
        .innerJoin(services, eq(services.id, reservations.serviceId))
        .innerJoin(employees, eq(employees.id, reservations.employeeId))
        .innerJoin(companies, eq(companies.id, reservations.companyId))
        .innerJoin(companyAccounts, eq(companyAccounts.id, companies.accountId))
        .where(eq(reservations.id, reservationId))
        .limit(1),
    );
    if (!row) return none();

    return some({
      ...toReservation(row.reservation),
      client:
        row.client === null
          ? null
          : {
              id: row.client.id,
              firstName: row.client.firstName,
              lastName: row.client.lastName,
              phoneNumber: row.clientPhone,
            },
      employee: row.employee,
      service: {
        ...row.service,
        company: { ...row.company, phoneNumber: row.companyPhone },
      },
    });
  }

  async listByEmployeeAndDate(
    employeeId: number,
    day: Date,
    excludeStatuses: readonly ReservationStatus[] = TERMINAL_STATUSES,
  ): Promise<Reservation[]> {
    const dayStart = startOfDay(day);
    const conditions: SQL[] = [
      eq(reservations.employeeId, employeeId),
      gte(reservations.startTime, formatNaiveDateTime(dayStart)),
      lt(reservations.startTime, formatNaiveDateTime(addDays(dayStart, 1))),
    ];
    if (excludeStatuses.length > 0) {
      conditions.push(notInArray(reservations.status, [...excludeStatuses]));
    }

    const rows = await guardPersistence('list employee reservations', async () =>
      this.db
        .select()
        .from(reservations)
        .where(and(...conditions))
        .orderBy(asc(reservations.startTime)),
    );
    return rows.map(toReservation);
  }

  async listByClient(clientId: number): Promise<ReservationListing[]> {
    return this.listWithService(eq(reservations.clientId, clientId));
  }

  async listByCompany(companyId: number): Promise<ReservationListing[]> {
    return this.listWithService(eq(reservations.companyId, companyId));
  }

  async listByEmployee(
    companyId: number,
    employeeId: number,
  ): Promise<ReservationListing[]> {
    const filter = and(
      eq(reservations.companyId, companyId),
      eq(reservations.employeeId, employeeId),
    );
    return this.listWithService(filter);
  }

  async updateStatus(
    reservationId: number,
    status: ReservationStatus,
    expectedStatus: ReservationStatus,
  ): Promise<Option<Reservation>> {
    const [row] = await guardPersistence('update reservation status', async () =>
      this.db
        .update(reservations)
        .set({
          status,
          updatedDate: formatNaiveDateTime(this.clock.now()),
        })
        .where(
          and(
            eq(reservations.id, reservationId),
            eq(reservations.status, expectedStatus),
          ),
        )
        .returning(),
    );
    return row ? some(toReservation(row)) : none();
  }

  private async listWithService(
    filter: SQL | undefined,
  ): Promise<ReservationListing[]> {
    const rows = await guardPersistence('list reservations', async () =>
      this.db
        .select({
          reservation: reservations,
          service: {
            id: services.id,
            name: services.name,
            price: services.price,
            durationMinutes: services.durationMinutes,
            isActive: services.isActive,
          },
        })
        .from(reservations)
        .innerJoin(services, eq(services.id, reservations.serviceId))
        .where(filter)
        .orderBy(statusPriority, asc(reservations.startTime)),
    );
    return rows.map(
      ({ reservation, service }): ReservationListing => ({
        ...toReservation(reservation),
        service,
      }),
    );
  }
}
