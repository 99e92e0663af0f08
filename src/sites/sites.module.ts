import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Site } from '../database/entities/site.entity';
import { SitesController } from './sites.controller';
import { SitesService } from './sites.service';

/**
 * SitesModule
 *
 * Site Store (upsert, filtered reads, stage marking) and read endpoints.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Site])],
  controllers: [SitesController],
  providers: [SitesService],
  exports: [SitesService],
})
export class SitesModule {}
