import { Module } from '@nestjs/common';

import { ProjectsModule } from '../projects/projects.module';
import { CostController, CsiDivisionsController } from './cost.controller';
import { CostRepository } from './cost.repository';
import { CostService } from './cost.service';

@Module({
  imports: [ProjectsModule],
  controllers: [CostController, CsiDivisionsController],
  providers: [CostRepository, CostService],
  exports: [CostService],
})
export class CostModule {}
