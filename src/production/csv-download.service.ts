import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { describeError } from '../common/errors';
import { productionConfig, ProductionConfig } from '../config/production.config';
import { Site } from '../database/entities/site.entity';
import { MonitoringApiClient } from '../monitoring/monitoring-api.client';
import { SiteStage } from '../sites/site-stage';
import { SitesService } from '../sites/sites.service';
import { buildSiteCsvPath } from './csv-files';

export interface DownloadSummary {
  sitesConsidered: number;
  downloaded: number;
  skipped: number;
  errors: string[];
  durationMs: number;
}

/**
 * CsvDownloadService - CSV Downloader
 *
 * Fetches the production export for every discovered site and files it
 * under the data directory by location. Per-site failures are counted and
 * the batch moves on.
 */
@Injectable()
export class CsvDownloadService {
  private readonly logger = new Logger(CsvDownloadService.name);

  constructor(
    private readonly apiClient: MonitoringApiClient,
    private readonly sitesService: SitesService,
    @Inject(productionConfig.KEY)
    private readonly config: ProductionConfig,
  ) {}

  async downloadPending(): Promise<DownloadSummary> {
    const startTime = Date.now();
    const countries = this.config.downloadCountries;
    const sites = await this.sitesService.getAll({
      stages: [SiteStage.Discovered],
      countries: countries.length > 0 ? countries : undefined,
    });

    const summary: DownloadSummary = {
      sitesConsidered: sites.length,
      downloaded: 0,
      skipped: 0,
      errors: [],
      durationMs: 0,
    };
    this.logger.log(`Downloading CSV exports for ${sites.length} site(s)`);

    for (const site of sites) {
      const skipReason = this.exportRangeProblem(site);
      if (skipReason) {
        summary.skipped++;
        summary.errors.push(`Site ${site.siteId}: ${skipReason}`);
        this.logger.warn(`Skipping site ${site.siteId}: ${skipReason}`);
        continue;
      }

      try {
        await this.downloadSite(site);
        summary.downloaded++;
      } catch (error) {
        const message = `Site ${site.siteId}: ${describeError(error)}`;
        summary.errors.push(message);
        this.logger.error(`CSV download failed. ${message}`);
      }
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.log(
      `CSV download complete: ${summary.downloaded}/${summary.sitesConsidered} downloaded, ${summary.skipped} skipped`,
    );
    return summary;
  }

  private exportRangeProblem(site: Site): string | null {
    const { installationDate, lastReportingTime } = site;
    if (!installationDate && !lastReportingTime) {
      return 'no installation date or last reporting time';
    }
    if (!installationDate) return 'no installation date';
    if (!lastReportingTime) return 'no last reporting time';
    if (lastReportingTime.getTime() < installationDate.getTime()) {
      return 'last reporting time is before the installation date';
    }
    return null;
  }

  private async downloadSite(site: Site): Promise<void> {
    if (!site.installationDate || !site.lastReportingTime) {
      throw new Error('Export range is incomplete');
    }
    const csv = await this.apiClient.downloadSiteCsv(site.siteId, {
      start: site.installationDate,
      end: site.lastReportingTime,
    });

    const filePath = buildSiteCsvPath(this.config.csvDataDir, site);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, csv, 'utf-8');
    await this.sitesService.markStage(site.siteId, SiteStage.Downloaded);
    this.logger.debug(`Saved ${filePath}`);
  }
}
