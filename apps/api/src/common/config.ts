/**
 * Environment-driven settings. Read on demand so tests can set variables
 * before the Nest application is compiled.
 */

export type PersistenceDriver = 'memory' | 'firestore';

export interface AuthConfig {
  secret: string;
  issuer: string;
  audience: string;
}

export function authConfig(): AuthConfig {
  return {
    secret: process.env.JWT_SECRET || 'dev-secret',
    issuer: process.env.JWT_ISSUER || 'gcpanel-dev',
    audience: process.env.JWT_AUDIENCE || 'gcpanel-api',
  };
}

export function persistenceDriver(): PersistenceDriver {
  const driver = process.env.PERSISTENCE_DRIVER || 'memory';
  if (driver !== 'memory' && driver !== 'firestore') {
    throw new Error(`Unknown PERSISTENCE_DRIVER "${driver}" (expected "memory" or "firestore")`);
  }
  return driver;
}

export function gcpProject(): string {
  return process.env.GCP_PROJECT || 'gcpanel-dev';
}

export function corsOrigins(): string[] {
  return (process.env.CORS_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
