export { SiteImportModule } from './site-import.module';
export { SiteImportService } from './site-import.service';
export type { ImportSummary } from './site-import.service';
export { mapSiteRecord, parseCapacityKw, parseApiDate } from './site-record.mapper';
