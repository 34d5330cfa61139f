import { Inject, Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import { clients, companies } from '../../database/schema/index.js';
import { guardPersistence } from '../../database/persistence.js';
import { fromNullable, type Option } from '../../common/types/option.js';

export const IDENTITY_DIRECTORY = 'IDENTITY_DIRECTORY';

export interface IdentityDirectory {
  findClientId(accountId: string): Promise<Option<number>>;
  findCompanyId(accountId: string): Promise<Option<number>>;
}

@Injectable()
export class IdentityRepository implements IdentityDirectory {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {}

  async findClientId(accountId: string): Promise<Option<number>> {
    const [row] = await guardPersistence('find client profile', async () =>
      this.db
        .select({ id: clients.id })
        .from(clients)
        .where(eq(clients.accountId, accountId))
        .limit(1),
    );
    return fromNullable(row?.id);
  }

  async findCompanyId(accountId: string): Promise<Option<number>> {
    const [row] = await guardPersistence('find company profile', async () =>
      this.db
        .select({ id: companies.id })
        .from(companies)
        .where(eq(companies.accountId, accountId))
        .limit(1),
    );
    return fromNullable(row?.id);
  }
}
