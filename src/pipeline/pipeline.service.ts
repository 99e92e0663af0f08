import { Injectable, Logger } from '@nestjs/common';
import { CsvDownloadService, DownloadSummary } from '../production/csv-download.service';
import {
  ProductionUploadService,
  UploadSummary,
} from '../production/production-upload.service';
import {
  CalculateProfilesOptions,
  ProfileSummary,
  YearlyProfileService,
} from '../profiles/yearly-profile.service';
import { ImportSummary, SiteImportService } from '../site-import/site-import.service';

export interface PipelineRunSummary {
  importSites: ImportSummary;
  downloadCsvs: DownloadSummary;
  uploadProduction: UploadSummary;
  calculateProfiles: ProfileSummary;
}

export type StageSummary =
  | ImportSummary
  | DownloadSummary
  | UploadSummary
  | ProfileSummary;

/**
 * True when a stage summary reports an abort or per-item errors.
 */
export function hasFailures(summary: StageSummary): boolean {
  if ('completed' in summary && !summary.completed) {
    return true;
  }
  return summary.errors.length > 0;
}

/**
 * PipelineService - runs the pipeline stages, alone or in order.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly siteImport: SiteImportService,
    private readonly csvDownload: CsvDownloadService,
    private readonly productionUpload: ProductionUploadService,
    private readonly yearlyProfiles: YearlyProfileService,
  ) {}

  importSites(limit?: number): Promise<ImportSummary> {
    return this.siteImport.run(limit);
  }

  downloadCsvs(): Promise<DownloadSummary> {
    return this.csvDownload.downloadPending();
  }

  uploadProduction(): Promise<UploadSummary> {
    return this.productionUpload.uploadPending();
  }

  calculateProfiles(
    options: CalculateProfilesOptions = {},
  ): Promise<ProfileSummary> {
    return this.yearlyProfiles.calculatePending(options);
  }

  /**
   * All stages in order. Later stages still run after an aborted import:
   * they work on whatever earlier runs left in the store.
   */
  async runAll(limit?: number): Promise<PipelineRunSummary> {
    const importSites = await this.importSites(limit);
    if (!importSites.completed) {
      this.logger.warn(`Site import aborted: ${importSites.abortReason ?? 'unknown reason'}`);
    }
    const downloadCsvs = await this.downloadCsvs();
    const uploadProduction = await this.uploadProduction();
    const calculateProfiles = await this.calculateProfiles();
    return { importSites, downloadCsvs, uploadProduction, calculateProfiles };
  }
}
