import { Module } from '@nestjs/common';

import { AppController } from './app.controller';
import { AuthModule } from './auth/auth.module';
import { BimModule } from './bim/bim.module';
import { CommonModule } from './common/common.module';
import { CostModule } from './cost/cost.module';
import { DashboardModule } from './dashboard/dashboard.module';
import { DocumentsModule } from './documents/documents.module';
import { ImportsModule } from './imports/imports.module';
import { ProjectsModule } from './projects/projects.module';
import { RfiModule } from './rfi/rfi.module';
import { SchemasController } from './schemas/schemas.controller';

@Module({
  // CommonModule is global: persistence, rate limits, clock and request logging
  imports: [
    CommonModule,
    AuthModule,
    ProjectsModule,
    RfiModule,
    BimModule,
    CostModule,
    ImportsModule,
    DocumentsModule,
    DashboardModule,
  ],
  controllers: [AppController, SchemasController],
})
export class AppModule {}
