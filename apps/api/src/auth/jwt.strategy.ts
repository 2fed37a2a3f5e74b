import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';

import { authConfig } from '../common/config';
import type { AuthUser } from './auth-user';

export interface JwtPayload {
  sub?: string;
  tenantId?: string;
  email?: string;
  role?: string;
  exp?: number;
}

/**
 * Verifies HS256 bearer tokens (signature, issuer, audience, expiry) and maps
 * the claims onto the request user.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger('JwtStrategy');

  constructor() {
    const { secret, issuer, audience } = authConfig();
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: secret,
      issuer,
      audience,
      algorithms: ['HS256'],
      ignoreExpiration: false,
    });
  }

  validate(payload: JwtPayload): AuthUser {
    if (!payload.sub) {
      this.logger.warn('Token rejected: missing subject');
      throw new UnauthorizedException('Token has no subject');
    }

    if (payload.exp && payload.exp - Math.floor(Date.now() / 1000) < 300) {
      this.logger.warn('Token expiring soon - client should refresh', { sub: payload.sub });
    }

    return {
      userId: payload.sub,
      // Single-user tenants: fall back to the subject when no tenant claim is present.
      tenantId: payload.tenantId ?? payload.sub,
      email: payload.email,
      role: payload.role,
    };
  }
}
