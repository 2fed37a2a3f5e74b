import { Controller, Get, UseGuards } from '@nestjs/common';

import type { AuthUser } from './auth-user';
import { CurrentUser } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';

@Controller('me')
@UseGuards(JwtAuthGuard, TenantGuard)
export class MeController {
  @Get()
  getMe(@CurrentUser() user: AuthUser) {
    const { userId, tenantId, email, role } = user;
    return { sub: userId, tenantId, email, role };
  }
}
