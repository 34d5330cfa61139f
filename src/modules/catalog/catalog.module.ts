import { Module } from '@nestjs/common';
import { IdentityModule } from '../identity/identity.module.js';
import { CatalogController } from './catalog.controller.js';
import { CatalogRepository } from './catalog.repository.js';
import { ServiceCatalogService } from './service-catalog.service.js';
import { SERVICE_CATALOG } from './catalog.types.js';

@Module({
  imports: [IdentityModule],
  controllers: [CatalogController],
  providers: [
    ServiceCatalogService,
    CatalogRepository,
    { provide: SERVICE_CATALOG, useExisting: CatalogRepository },
  ],
  exports: [SERVICE_CATALOG],
})
export class CatalogModule {}
