import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { productionConfig } from '../config/production.config';
import { ProductionPoint } from '../database/entities/production-point.entity';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { SitesModule } from '../sites/sites.module';
import { CsvDownloadService } from './csv-download.service';
import { ProductionController } from './production.controller';
import { ProductionCsvParser } from './production-csv.parser';
import { ProductionIngestService } from './production-ingest.service';
import { ProductionPointStore } from './production-point.store';
import { ProductionUploadService } from './production-upload.service';

/**
 * ProductionModule
 *
 * Production history: CSV export download, CSV ingest, batch upload and
 * the per-site manual upload endpoint.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([ProductionPoint]),
    ConfigModule.forFeature(productionConfig),
    MonitoringModule,
    SitesModule,
  ],
  controllers: [ProductionController],
  providers: [
    ProductionCsvParser,
    ProductionPointStore,
    ProductionIngestService,
    CsvDownloadService,
    ProductionUploadService,
  ],
  exports: [
    ProductionPointStore,
    ProductionIngestService,
    CsvDownloadService,
    ProductionUploadService,
  ],
})
export class ProductionModule {}
