import { Inject, Injectable } from '@nestjs/common';
import { and, count, eq } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import {
  employees,
  serviceEmployees,
  services,
} from '../../database/schema/index.js';
import { guardPersistence } from '../../database/persistence.js';
import { none, some, type Option } from '../../common/types/option.js';
import type {
  EmployeeSummary,
  NewService,
  ServiceCatalog,
  ServiceDetails,
  ServicePatch,
  ServiceSummary,
} from './catalog.types.js';

type ServiceRow = typeof services.$inferSelect;

const toSummary = (row: ServiceRow): ServiceSummary => ({
  id: row.id,
  companyId: row.companyId,
  name: row.name,
  price: row.price,
  durationMinutes: row.durationMinutes,
  isActive: row.isActive,
});

@Injectable()
export class CatalogRepository implements ServiceCatalog {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {}

  async getServiceById(serviceId: number): Promise<Option<ServiceSummary>> {
    const row = await this.findServiceRow(serviceId);
    return row ? some(toSummary(row)) : none();
  }

  async getServiceDetails(serviceId: number): Promise<Option<ServiceDetails>> {
    const row = await this.findServiceRow(serviceId);
    if (!row) return none();
    return some(await this.withEmployees(row));
  }

  async isEmployeeAssignedToService(
    serviceId: number,
    employeeId: number,
  ): Promise<boolean> {
    const rows = await guardPersistence('check employee assignment', async () =>
      this.db
        .select({ employeeId: serviceEmployees.employeeId })
        .from(serviceEmployees)
        .where(
          and(
            eq(serviceEmployees.serviceId, serviceId),
            eq(serviceEmployees.employeeId, employeeId),
          ),
        )
        .limit(1),
    );
    return rows.length > 0;
  }

  async findEmployee(
    companyId: number,
    employeeId: number,
  ): Promise<Option<EmployeeSummary>> {
    const [employee] = await guardPersistence('load employee', async () =>
      this.db
        .select({
          id: employees.id,
          companyId: employees.companyId,
          firstName: employees.firstName,
          lastName: employees.lastName,
        })
        .from(employees)
        .where(
          and(eq(employees.id, employeeId), eq(employees.companyId, companyId)),
        )
        .limit(1),
    );
    return employee ? some(employee) : none();
  }

  async insertService(input: NewService): Promise<ServiceDetails> {
    const [row] = await guardPersistence('create service', async () =>
      this.db
        .insert(services)
        .values({ ...input, isActive: false })
        .returning(),
    );
    return {
      ...toSummary(row),
      subcategoryId: row.subcategoryId,
      description: row.description,
      employeeIds: [],
    };
  }

  async updateService(
    serviceId: number,
    patch: ServicePatch,
  ): Promise<Option<ServiceDetails>> {
    const [row] = await guardPersistence('update service', async () =>
      this.db
        .update(services)
        .set(patch)
        .where(eq(services.id, serviceId))
        .returning(),
    );
    if (!row) return none();
    return some(await this.withEmployees(row));
  }

  async addEmployee(serviceId: number, employeeId: number): Promise<void> {
    await guardPersistence('assign employee', async () =>
      this.db
        .insert(serviceEmployees)
        .values({ serviceId, employeeId })
        .onConflictDoNothing(),
    );
  }

  async removeEmployee(serviceId: number, employeeId: number): Promise<void> {
    await guardPersistence('unassign employee', async () =>
      this.db
        .delete(serviceEmployees)
        .where(
          and(
            eq(serviceEmployees.serviceId, serviceId),
            eq(serviceEmployees.employeeId, employeeId),
          ),
        ),
    );
  }

  async countEmployees(serviceId: number): Promise<number> {
    const [row] = await guardPersistence('count assigned employees', async () =>
      this.db
        .select({ total: count() })
        .from(serviceEmployees)
        .where(eq(serviceEmployees.serviceId, serviceId)),
    );
    return row?.total ?? 0;
  }

  async setActive(serviceId: number, isActive: boolean): Promise<void> {
    await guardPersistence('update service activity', async () =>
      this.db
        .update(services)
        .set({ isActive })
        .where(eq(services.id, serviceId)),
    );
  }

  private async findServiceRow(
    serviceId: number,
  ): Promise<ServiceRow | undefined> {
    const [row] = await guardPersistence('load service', async () =>
      this.db
        .select()
        .from(services)
        .where(eq(services.id, serviceId))
        .limit(1),
    );
    return row;
  }

  private async withEmployees(row: ServiceRow): Promise<ServiceDetails> {
    const assigned = await guardPersistence('load service employees', async () =>
      this.db
        .select({ employeeId: serviceEmployees.employeeId })
        .from(serviceEmployees)
        .where(eq(serviceEmployees.serviceId, row.id)),
    );
    return {
      ...toSummary(row),
      subcategoryId: row.subcategoryId,
      description: row.description,
      employeeIds: assigned.map((a) => a.employeeId),
    };
  }
}
