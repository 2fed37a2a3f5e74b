import { Module } from '@nestjs/common';

import { ProjectsModule } from '../projects/projects.module';
import { RfiController } from './rfi.controller';
import { RfiRepository } from './rfi.repository';
import { RfiService } from './rfi.service';

@Module({
  imports: [ProjectsModule],
  controllers: [RfiController],
  providers: [RfiRepository, RfiService],
  exports: [RfiService],
})
export class RfiModule {}
