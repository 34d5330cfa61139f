import { Module } from '@nestjs/common';
import { IdentityModule } from '../identity/identity.module.js';
import { CatalogModule } from '../catalog/catalog.module.js';
import { LedgerModule } from '../ledger/ledger.module.js';
import { AvailabilityModule } from '../availability/availability.module.js';
import { ReservationController } from './reservation.controller.js';
import { ReservationService } from './reservation.service.js';
import { ReservationStateMachine } from './reservation-state-machine.js';

@Module({
  imports: [IdentityModule, CatalogModule, LedgerModule, AvailabilityModule],
  controllers: [ReservationController],
  providers: [ReservationService, ReservationStateMachine],
})
export class ReservationModule {}
