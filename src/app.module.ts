import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module.js';
import { ClockModule } from './common/clock/clock.module.js';
import { validateEnv } from './common/config/env.validation.js';
import { AppController } from './app.controller.js';
import { IdentityModule } from './modules/identity/identity.module.js';
import { CatalogModule } from './modules/catalog/catalog.module.js';
import { WorkingDayModule } from './modules/working-day/working-day.module.js';
import { LedgerModule } from './modules/ledger/ledger.module.js';
import { AvailabilityModule } from './modules/availability/availability.module.js';
import { ReservationModule } from './modules/reservation/reservation.module.js';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnv,
    }),
    DatabaseModule,
    ClockModule,
    IdentityModule,
    CatalogModule,
    WorkingDayModule,
    LedgerModule,
    AvailabilityModule,
    ReservationModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
