import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError } from '../common/errors';
import { productionConfig, ProductionConfig } from '../config/production.config';
import { SiteStage } from '../sites/site-stage';
import { SitesService } from '../sites/sites.service';
import { findSiteCsvFile } from './csv-files';
import { ProductionIngestService } from './production-ingest.service';

export interface UploadSummary {
  sitesConsidered: number;
  uploaded: number;
  skipped: number;
  rowsInserted: number;
  errors: string[];
  durationMs: number;
}

/**
 * ProductionUploadService - Production Upload Runner
 *
 * Ingests the downloaded CSV of every `downloaded` site. A site only moves
 * to `uploaded` after a completed ingest that found at least one valid
 * row; anything else leaves it eligible for the next run.
 */
@Injectable()
export class ProductionUploadService {
  private readonly logger = new Logger(ProductionUploadService.name);

  constructor(
    private readonly ingestService: ProductionIngestService,
    private readonly sitesService: SitesService,
    @Inject(productionConfig.KEY)
    private readonly config: ProductionConfig,
  ) {}

  async uploadPending(): Promise<UploadSummary> {
    const startTime = Date.now();
    const sites = await this.sitesService.getAll({
      stages: [SiteStage.Downloaded],
    });
    const summary: UploadSummary = {
      sitesConsidered: sites.length,
      uploaded: 0,
      skipped: 0,
      rowsInserted: 0,
      errors: [],
      durationMs: 0,
    };
    this.logger.log(`Uploading production data for ${sites.length} site(s)`);

    for (const site of sites) {
      try {
        const filePath = await findSiteCsvFile(
          this.config.csvDataDir,
          site.siteId,
        );
        if (!filePath) {
          summary.skipped++;
          this.logger.warn(`No CSV file found for site ${site.siteId}`);
          continue;
        }

        const result = await this.ingestService.ingest(site, filePath);
        summary.rowsInserted += result.rowsInserted;

        const validRows = result.rowsRead - result.rowsSkipped;
        if (!result.completed || validRows === 0) {
          summary.skipped++;
          summary.errors.push(
            `Site ${site.siteId}: ${result.completed ? 'no valid rows' : 'ingest incomplete'}` +
              (result.errors.length > 0 ? ` (${result.errors[result.errors.length - 1]})` : ''),
          );
          continue;
        }

        await this.sitesService.markStage(site.siteId, SiteStage.Uploaded);
        summary.uploaded++;
      } catch (error) {
        const message = `Site ${site.siteId}: ${describeError(error)}`;
        summary.errors.push(message);
        this.logger.error(`Upload failed. ${message}`);
      }
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.log(
      `Upload complete: ${summary.uploaded}/${summary.sitesConsidered} uploaded, ${summary.rowsInserted} rows inserted`,
    );
    return summary;
  }
}
