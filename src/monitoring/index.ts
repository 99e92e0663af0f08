export { MonitoringModule } from './monitoring.module';
export { MonitoringApiClient, computeBackoffDelay } from './monitoring-api.client';
export type { MonitoringPage, CsvExportRange } from './monitoring-api.client';
export { TolerantJsonDecoder } from './decoding/tolerant-json.decoder';
export type { DecodeResult } from './decoding/tolerant-json.decoder';
export type { IDecodeStrategy } from './decoding/interfaces/decode-strategy.interface';
