import type { Option } from '../../common/types/option.js';

export const SERVICE_CATALOG = 'SERVICE_CATALOG';

/** The slice of a service the scheduling core needs. */
export interface ServiceSummary {
  id: number;
  companyId: number;
  name: string;
  price: number;
  durationMinutes: number;
  isActive: boolean;
}

export interface ServiceDetails extends ServiceSummary {
  subcategoryId: number;
  description: string | null;
  employeeIds: number[];
}

export interface EmployeeSummary {
  id: number;
  companyId: number;
  firstName: string;
  lastName: string;
}

export interface ServiceCatalog {
  getServiceById(serviceId: number): Promise<Option<ServiceSummary>>;
  isEmployeeAssignedToService(
    serviceId: number,
    employeeId: number,
  ): Promise<boolean>;
  findEmployee(
    companyId: number,
    employeeId: number,
  ): Promise<Option<EmployeeSummary>>;
}

export interface NewService {
  companyId: number;
  subcategoryId: number;
  name: string;
  description: string | null;
  price: number;
  durationMinutes: number;
}

export type ServicePatch = Partial<
  Pick<
    NewService,
    'subcategoryId' | 'name' | 'description' | 'price' | 'durationMinutes'
  >
>;
