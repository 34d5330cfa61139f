import { Injectable, Logger } from '@nestjs/common';
import {
  EmployeeNotFoundError,
  ServiceNotFoundError,
  ValidationFailedError,
} from '../../common/errors/scheduling.errors.js';
import { IdentityService } from '../identity/identity.service.js';
import type { AccountPrincipal } from '../identity/account-principal.js';
import { SLOT_STEP_MINUTES } from '../availability/slot-grid.js';
import { CatalogRepository } from './catalog.repository.js';
import type { ServiceDetails, ServicePatch } from './catalog.types.js';
import type { CreateServiceDto } from './dto/create-service.dto.js';
import type { UpdateServiceDto } from './dto/update-service.dto.js';

function assertBookableDuration(durationMinutes: number): void {
  if (durationMinutes <= 0 || durationMinutes % SLOT_STEP_MINUTES !== 0) {
    throw new ValidationFailedError(
      `Service duration must be a positive multiple of ${SLOT_STEP_MINUTES} minutes`,
    );
  }
}

@Injectable()
export class ServiceCatalogService {
  private readonly logger = new Logger(ServiceCatalogService.name);

  constructor(
    private readonly catalog: CatalogRepository,
    private readonly identity: IdentityService,
  ) {}

  async getService(serviceId: number): Promise<ServiceDetails> {
    const service = await this.catalog.getServiceDetails(serviceId);
    if (!service.found) throw new ServiceNotFoundError(serviceId);
    return service.value;
  }

  async createService(
    principal: AccountPrincipal,
    dto: CreateServiceDto,
  ): Promise<ServiceDetails> {
    const companyId = await this.identity.resolveCompany(principal);
    assertBookableDuration(dto.duration_minutes);

    const service = await this.catalog.insertService({
      companyId,
      subcategoryId: dto.subcategory_id,
      name: dto.name,
      description: dto.description ?? null,
      price: dto.price,
      durationMinutes: dto.duration_minutes,
    });
    this.logger.log(`Company ${companyId} created service ${service.id}`);
    return service;
  }

  /** Existing reservations keep the end time they were booked with. */
  async updateService(
    principal: AccountPrincipal,
    serviceId: number,
    dto: UpdateServiceDto,
  ): Promise<ServiceDetails> {
    const companyId = await this.identity.resolveCompany(principal);
    await this.getOwnedService(companyId, serviceId);
    if (dto.duration_minutes !== undefined) {
      assertBookableDuration(dto.duration_minutes);
    }

    const patch: ServicePatch = {
      subcategoryId: dto.subcategory_id,
      name: dto.name,
      description: dto.description,
      price: dto.price,
      durationMinutes: dto.duration_minutes,
    };
    const updated = await this.catalog.updateService(serviceId, patch);
    if (!updated.found) throw new ServiceNotFoundError(serviceId);
    return updated.value;
  }

  async assignEmployee(
    principal: AccountPrincipal,
    serviceId: number,
    employeeId: number,
  ): Promise<ServiceDetails> {
    const companyId = await this.identity.resolveCompany(principal);
    await this.getOwnedService(companyId, serviceId);
    await this.getOwnedEmployee(companyId, employeeId);

    await this.catalog.addEmployee(serviceId, employeeId);
    this.logger.log(`Employee ${employeeId} assigned to service ${serviceId}`);
    return this.refreshActiveFlag(serviceId);
  }

  async unassignEmployee(
    principal: AccountPrincipal,
    serviceId: number,
    employeeId: number,
  ): Promise<ServiceDetails> {
    const companyId = await this.identity.resolveCompany(principal);
    await this.getOwnedService(companyId, serviceId);
    await this.getOwnedEmployee(companyId, employeeId);

    await this.catalog.removeEmployee(serviceId, employeeId);
    this.logger.log(`Employee ${employeeId} removed from service ${serviceId}`);
    return this.refreshActiveFlag(serviceId);
  }

  // A service is bookable only while someone can perform it.
  private async refreshActiveFlag(serviceId: number): Promise<ServiceDetails> {
    const assigned = await this.catalog.countEmployees(serviceId);
    await this.catalog.setActive(serviceId, assigned > 0);
    return this.getService(serviceId);
  }

  private async getOwnedService(
    companyId: number,
    serviceId: number,
  ): Promise<ServiceDetails> {
    const service = await this.catalog.getServiceDetails(serviceId);
    if (!service.found || service.value.companyId !== companyId) {
      throw new ServiceNotFoundError(serviceId);
    }
    return service.value;
  }

  private async getOwnedEmployee(
    companyId: number,
    employeeId: number,
  ): Promise<void> {
    const employee = await this.catalog.findEmployee(companyId, employeeId);
    if (!employee.found) throw new EmployeeNotFoundError(employeeId);
  }
}
