import { Controller, Get, Param, UseGuards } from '@nestjs/common';

import { CurrentTenant } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';
import { DashboardService } from './dashboard.service';

@Controller('projects')
@UseGuards(JwtAuthGuard, TenantGuard)
export class DashboardController {
  constructor(private readonly dashboard: DashboardService) {}

  @Get(':id/dashboard')
  forProject(@CurrentTenant() tenantId: string, @Param('id') id: string) {
    return this.dashboard.forProject(tenantId, id);
  }
}
