import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { monitoringConfig } from '../config/monitoring.config';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { SitesModule } from '../sites/sites.module';
import { SiteImportService } from './site-import.service';

@Module({
  imports: [
    ConfigModule.forFeature(monitoringConfig),
    MonitoringModule,
    SitesModule,
  ],
  providers: [SiteImportService],
  exports: [SiteImportService],
})
export class SiteImportModule {}
