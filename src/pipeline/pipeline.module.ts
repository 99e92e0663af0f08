import { Module } from '@nestjs/common';
import { ProductionModule } from '../production/production.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { SiteImportModule } from '../site-import/site-import.module';
import { PipelineController } from './pipeline.controller';
import { PipelineService } from './pipeline.service';

@Module({
  imports: [SiteImportModule, ProductionModule, ProfilesModule],
  controllers: [PipelineController],
  providers: [PipelineService],
  exports: [PipelineService],
})
export class PipelineModule {}
