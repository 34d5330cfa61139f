import { Module } from '@nestjs/common';
import { IdentityModule } from '../identity/identity.module.js';
import { WorkingDayController } from './working-day.controller.js';
import { WorkingDayRepository } from './working-day.repository.js';
import { WorkingDayService } from './working-day.service.js';
import { OPENING_HOURS } from './working-day.types.js';

@Module({
  imports: [IdentityModule],
  controllers: [WorkingDayController],
  providers: [
    WorkingDayService,
    WorkingDayRepository,
    { provide: OPENING_HOURS, useExisting: WorkingDayRepository },
  ],
  exports: [OPENING_HOURS],
})
export class WorkingDayModule {}
