import { Module } from '@nestjs/common';

import { BimModule } from '../bim/bim.module';
import { CostModule } from '../cost/cost.module';
import { DocumentsModule } from '../documents/documents.module';
import { ProjectsModule } from '../projects/projects.module';
import { RfiModule } from '../rfi/rfi.module';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';

@Module({
  imports: [ProjectsModule, RfiModule, CostModule, BimModule, DocumentsModule],
  controllers: [DashboardController],
  providers: [DashboardService],
})
export class DashboardModule {}
