import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { monitoringConfig } from '../config/monitoring.config';
import { MonitoringApiClient } from './monitoring-api.client';
import { TolerantJsonDecoder } from './decoding/tolerant-json.decoder';
import { StrictJsonStrategy } from './decoding/strategies/strict-json.strategy';
import { CleanupJsonStrategy } from './decoding/strategies/cleanup-json.strategy';
import { LenientJsonStrategy } from './decoding/strategies/lenient-json.strategy';

/**
 * MonitoringModule
 *
 * Access to the remote monitoring API:
 * - MonitoringApiClient: paginated site listing and CSV export download
 * - TolerantJsonDecoder: strict -> cleanup -> lenient decoding cascade
 */
@Module({
  imports: [ConfigModule.forFeature(monitoringConfig)],
  providers: [
    MonitoringApiClient,
    TolerantJsonDecoder,
    StrictJsonStrategy,
    CleanupJsonStrategy,
    LenientJsonStrategy,
  ],
  exports: [MonitoringApiClient, TolerantJsonDecoder],
})
export class MonitoringModule {}
