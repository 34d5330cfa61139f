export type AccountRole = 'user' | 'company';

/** What the bearer token proves: an account id and the role it signed up with. */
export interface AccountPrincipal {
  accountId: string;
  role: AccountRole;
}

export type ResolvedIdentity =
  | { role: 'user'; clientId: number }
  | { role: 'company'; companyId: number };

export function isAccountRole(value: unknown): value is AccountRole {
  return value === 'user' || value === 'company';
}
