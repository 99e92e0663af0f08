export { ProductionModule } from './production.module';
export { ProductionIngestService, MAX_REPORTED_ERRORS } from './production-ingest.service';
export type { IngestSummary, IngestOptions } from './production-ingest.service';
export { ProductionCsvParser, parseLocalTimestamp, parseProductionWatts } from './production-csv.parser';
export { ProductionPointStore } from './production-point.store';
export { CsvDownloadService } from './csv-download.service';
export type { DownloadSummary } from './csv-download.service';
export { ProductionUploadService } from './production-upload.service';
export type { UploadSummary } from './production-upload.service';
export { buildSiteCsvPath, findSiteCsvFile, sanitizeFilenamePart } from './csv-files';
export type {
  NewProductionPoint,
  ProductionStore,
} from './interfaces/production-store.interface';
