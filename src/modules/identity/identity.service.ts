import { Inject, Injectable } from '@nestjs/common';
import { IdentityNotResolvedError } from '../../common/errors/scheduling.errors.js';
import type {
  AccountPrincipal,
  ResolvedIdentity,
} from './account-principal.js';
import {
  IDENTITY_DIRECTORY,
  type IdentityDirectory,
} from './identity.repository.js';

@Injectable()
export class IdentityService {
  constructor(
    @Inject(IDENTITY_DIRECTORY) private readonly directory: IdentityDirectory,
  ) {}

  /** Maps the account to the profile its role implies. */
  async resolve(principal: AccountPrincipal): Promise<ResolvedIdentity> {
    if (principal.role === 'user') {
      return { role: 'user', clientId: await this.resolveClient(principal) };
    }
    return {
      role: 'company',
      companyId: await this.resolveCompany(principal),
    };
  }

  async resolveClient(principal: AccountPrincipal): Promise<number> {
    if (principal.role !== 'user') {
      throw new IdentityNotResolvedError('wrong-role');
    }
    const client = await this.directory.findClientId(principal.accountId);
    if (!client.found) {
      throw new IdentityNotResolvedError('no-profile');
    }
    return client.value;
  }

  async resolveCompany(principal: AccountPrincipal): Promise<number> {
    if (principal.role !== 'company') {
      throw new IdentityNotResolvedError('wrong-role');
    }
    const company = await this.directory.findCompanyId(principal.accountId);
    if (!company.found) {
      throw new IdentityNotResolvedError('no-profile');
    }
    return company.value;
  }
}
