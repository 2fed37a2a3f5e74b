import { INestApplication } from '@nestjs/common';
import { Test, TestingModuleBuilder } from '@nestjs/testing';
import jwt, { type SignOptions } from 'jsonwebtoken';

import { AppModule } from '../src/app.module';
import { Clock } from '../src/common/clock';

export const JWT_SECRET = 'test-secret';
export const JWT_ISSUER = 'gcpanel-tests';
export const JWT_AUDIENCE = 'gcpanel-api';

/** Clock pinned to an instant; tests move it forward explicitly. */
export class FixedClock extends Clock {
  private current: Date;

  constructor(iso = '2025-03-10T09:00:00.000Z') {
    super();
    this.current = new Date(iso);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(iso: string): void {
    this.current = new Date(iso);
  }
}

export interface TokenClaims {
  sub: string;
  tenantId?: string;
  email?: string;
  role?: string;
  exp?: number;
}

export function signToken(claims: TokenClaims, options: SignOptions = {}): string {
  return jwt.sign(claims, JWT_SECRET, {
    issuer: JWT_ISSUER,
    audience: JWT_AUDIENCE,
    algorithm: 'HS256',
    ...options,
  });
}

export function bearer(tenantId: string, sub = `${tenantId}-user`): string {
  return `Bearer ${signToken({ sub, tenantId })}`;
}

export async function createTestApp(
  clock: Clock = new FixedClock(),
  customize: (builder: TestingModuleBuilder) => TestingModuleBuilder = (builder) => builder,
): Promise<INestApplication> {
  process.env.JWT_SECRET = JWT_SECRET;
  process.env.JWT_ISSUER = JWT_ISSUER;
  process.env.JWT_AUDIENCE = JWT_AUDIENCE;
  process.env.PERSISTENCE_DRIVER = 'memory';

  const builder = Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(Clock)
    .useValue(clock);
  const moduleRef = await customize(builder).compile();
  const app = moduleRef.createNestApplication({ logger: false });
  await app.init();
  return app;
}
