import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module.js';
import type { AppConfig } from './common/config/env.validation.js';
import { SchedulingExceptionFilter } from './common/filters/scheduling-exception.filter.js';
import { runMigrations } from './database/migrate.js';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(),
  );
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);

  if (config.get('RUN_MIGRATIONS', { infer: true })) {
    await runMigrations(config.get('DATABASE_URL', { infer: true }));
  }

  app.enableCors();
  app.setGlobalPrefix('api');
  app.useGlobalFilters(new SchedulingExceptionFilter());

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Appointment Booking API')
    .setDescription(
      'Slot availability and conflict-free reservations for service companies',
    )
    .setVersion('1.0')
    .addBearerAuth()
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = config.get('PORT', { infer: true });
  await app.listen(port, '0.0.0.0');
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error);
  process.exit(1);
});
