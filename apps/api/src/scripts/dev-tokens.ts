import jwt from 'jsonwebtoken';

import { authConfig, type AuthConfig } from '../common/config';

export interface DevUser {
  sub: string;
  email: string;
  role: 'admin' | 'member';
}

export interface DevTenant {
  id: string;
  users: DevUser[];
}

export interface DevToken {
  tenantId: string;
  user: DevUser;
  token: string;
}

export const DEV_TENANTS: DevTenant[] = [
  {
    id: 'tenant-a',
    users: [
      { sub: 'a-admin', email: 'admin@a.local', role: 'admin' },
      { sub: 'a-member', email: 'member@a.local', role: 'member' },
    ],
  },
  {
    id: 'tenant-b',
    users: [
      { sub: 'b-admin', email: 'admin@b.local', role: 'admin' },
      { sub: 'b-member', email: 'member@b.local', role: 'member' },
    ],
  },
];

/** Week-long bearer tokens for local use against the API. */
export function issueDevTokens(tenants: DevTenant[] = DEV_TENANTS, config: AuthConfig = authConfig()): DevToken[] {
  return tenants.flatMap((tenant) =>
    tenant.users.map((user) => ({
      tenantId: tenant.id,
      user,
      token: jwt.sign({ sub: user.sub, tenantId: tenant.id, email: user.email, role: user.role }, config.secret, {
        issuer: config.issuer,
        audience: config.audience,
        algorithm: 'HS256',
        expiresIn: '7d',
      }),
    })),
  );
}

if (require.main === module) {
  let tenant = '';
  for (const { tenantId, user, token } of issueDevTokens()) {
    if (tenantId !== tenant) {
      tenant = tenantId;
      // eslint-disable-next-line no-console
      console.log(`\nTenant: ${tenantId}`);
    }
    // eslint-disable-next-line no-console
    console.log(`${user.role} (${user.sub}) token: ${token}`);
  }
}
