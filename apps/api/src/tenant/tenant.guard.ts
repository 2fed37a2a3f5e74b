import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';

import '../auth/auth-user';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  canActivate(context: ExecutionContext) {
    const request = context.switchToHttp().getRequest<Request>();
    // CORS preflight carries no credentials
    if (request.method === 'OPTIONS') {
      return true;
    }
    return super.canActivate(context);
  }
}

@Injectable()
export class TenantGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    if (request.method === 'OPTIONS') {
      return true;
    }
    const tenantId = request.user?.tenantId;
    if (!tenantId) {
      throw new UnauthorizedException('Missing tenant in token');
    }
    request.tenantId = tenantId;
    return true;
  }
}
