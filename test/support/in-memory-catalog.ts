import {
  fromNullable,
  none,
  some,
  type Option,
} from '../../src/common/types/option';
import type {
  EmployeeSummary,
  ServiceCatalog,
  ServiceSummary,
} from '../../src/modules/catalog/catalog.types';

export class InMemoryServiceCatalog implements ServiceCatalog {
  private readonly services = new Map<number, ServiceSummary>();
  private readonly employees = new Map<number, EmployeeSummary>();
  private readonly assignments = new Set<string>();

  addService(service: ServiceSummary): this {
    this.services.set(service.id, service);
    return this;
  }

  addEmployee(employee: EmployeeSummary): this {
    this.employees.set(employee.id, employee);
    return this;
  }

  assign(serviceId: number, employeeId: number): this {
    this.assignments.add(`${serviceId}:${employeeId}`);
    return this;
  }

  async getServiceById(serviceId: number): Promise<Option<ServiceSummary>> {
    return fromNullable(this.services.get(serviceId));
  }

  async isEmployeeAssignedToService(
    serviceId: number,
    employeeId: number,
  ): Promise<boolean> {
    return this.assignments.has(`${serviceId}:${employeeId}`);
  }

  async findEmployee(
    companyId: number,
    employeeId: number,
  ): Promise<Option<EmployeeSummary>> {
    const employee = this.employees.get(employeeId);
    return employee && employee.companyId === companyId
      ? some(employee)
      : none();
  }
}
