/** Identity attached to the request once the bearer token is verified. */
export interface AuthUser {
  userId: string;
  tenantId: string;
  email?: string;
  role?: string;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/no-empty-interface
    interface User extends AuthUser {}

    interface Request {
      tenantId?: string;
    }
  }
}
