import { Module, Global } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { neon } from '@neondatabase/serverless';
import { drizzle, NeonHttpDatabase } from 'drizzle-orm/neon-http';
import * as schema from './schema/index.js';
import type { AppConfig } from '../common/config/env.validation.js';

export const DATABASE_CONNECTION = 'DATABASE_CONNECTION';

export type DatabaseConnection = NeonHttpDatabase<typeof schema>;

@Global()
@Module({
  providers: [
    {
      provide: DATABASE_CONNECTION,
      useFactory: (config: ConfigService<AppConfig, true>): DatabaseConnection => {
        const databaseUrl = config.get('DATABASE_URL', { infer: true });
        const sql = neon(databaseUrl);
        return drizzle({ client: sql, schema });
      },
      inject: [ConfigService],
    },
  ],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule {}
