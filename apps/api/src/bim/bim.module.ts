import { Module } from '@nestjs/common';

import { ProjectsModule } from '../projects/projects.module';
import { BimController } from './bim.controller';
import { BimRepository } from './bim.repository';
import { BimService } from './bim.service';

@Module({
  imports: [ProjectsModule],
  controllers: [BimController],
  providers: [BimRepository, BimService],
  exports: [BimService],
})
export class BimModule {}
