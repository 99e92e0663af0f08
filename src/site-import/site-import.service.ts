import { Inject, Injectable, Logger } from '@nestjs/common';
import { monitoringConfig, MonitoringConfig } from '../config/monitoring.config';
import { ConfigurationError, FetchError, describeError } from '../common/errors';
import { MonitoringApiClient } from '../monitoring/monitoring-api.client';
import { SitesService } from '../sites/sites.service';
import { mapSiteRecord } from './site-record.mapper';

/**
 * Import Result Summary
 */
export interface ImportSummary {
  /** Records received from the API */
  fetched: number;
  created: number;
  updated: number;
  /** Records that could not be mapped to a site (e.g. missing id) */
  skipped: number;
  /** Records whose upsert failed */
  failed: number;
  pages: number;
  /** false when a page fetch failed and the run stopped early */
  completed: boolean;
  abortReason?: string;
  errors: string[];
  durationMs: number;
}

/**
 * SiteImportService - Import Orchestrator
 *
 * Walks the paginated site listing with an offset cursor and upserts
 * every record into the Site Store.
 *
 * Stops on the first of:
 * - an empty page
 * - cursor >= totalCount (when the API reports one)
 * - the optional overall record limit
 *
 * A FetchError (retries exhausted) ends the run; work already upserted
 * stays committed and the partial summary is returned.
 */
@Injectable()
export class SiteImportService {
  private readonly logger = new Logger(SiteImportService.name);

  constructor(
    private readonly apiClient: MonitoringApiClient,
    private readonly sitesService: SitesService,
    @Inject(monitoringConfig.KEY)
    private readonly config: MonitoringConfig,
  ) {}

  async run(limit?: number): Promise<ImportSummary> {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new ConfigurationError(
        `Import limit must be a non-negative integer, got ${limit}`,
      );
    }

    const startTime = Date.now();
    const summary: ImportSummary = {
      fetched: 0,
      created: 0,
      updated: 0,
      skipped: 0,
      failed: 0,
      pages: 0,
      completed: false,
      errors: [],
      durationMs: 0,
    };

    this.logger.log(
      `Starting site import (page size ${this.config.pageSize}, limit ${limit ?? 'none'})`,
    );

    let offset = 0;
    for (;;) {
      if (limit !== undefined && summary.fetched >= limit) {
        this.logger.log(`Reached the import limit of ${limit} records`);
        break;
      }

      const pageLimit =
        limit === undefined
          ? this.config.pageSize
          : Math.min(this.config.pageSize, limit - summary.fetched);

      let records: unknown[];
      let totalCount: number | null;
      try {
        ({ records, totalCount } = await this.apiClient.fetchPage(
          offset,
          pageLimit,
        ));
      } catch (error) {
        if (!(error instanceof FetchError)) {
          throw error;
        }
        summary.abortReason = `Page at offset ${offset} failed after ${error.attempts} attempt(s): ${error.message}`;
        summary.errors.push(summary.abortReason);
        summary.durationMs = Date.now() - startTime;
        this.logger.error(`Site import aborted: ${summary.abortReason}`);
        return summary;
      }

      summary.pages++;
      if (records.length === 0) {
        this.logger.log('No more records returned from the API');
        break;
      }

      // The API may return more than asked for; keep all of it unless the
      // overall limit says otherwise, and advance past what was kept.
      const pageRecords =
        limit === undefined ? records : records.slice(0, limit - summary.fetched);
      summary.fetched += pageRecords.length;
      await this.storeRecords(pageRecords, summary);
      offset += pageRecords.length;

      this.logger.log(
        `Page ${summary.pages}: ${pageRecords.length} records (offset ${offset}/${totalCount ?? '?'})`,
      );

      if (totalCount !== null && offset >= totalCount) {
        this.logger.log("Fetched all available records according to the API's totalCount");
        break;
      }

      await this.sleep(this.config.pageDelayMs);
    }

    summary.completed = true;
    summary.durationMs = Date.now() - startTime;
    this.logger.log(
      `Site import complete: ${summary.fetched} fetched, ${summary.created} created, ${summary.updated} updated, ${summary.skipped} skipped, ${summary.failed} failed`,
    );
    return summary;
  }

  private async storeRecords(
    records: unknown[],
    summary: ImportSummary,
  ): Promise<void> {
    for (const record of records) {
      const mapping = mapSiteRecord(record);
      if (!mapping.ok) {
        summary.skipped++;
        summary.errors.push(`Skipped record: ${mapping.reason}`);
        this.logger.warn(`Skipping record: ${mapping.reason}`);
        continue;
      }

      try {
        const { created } = await this.sitesService.upsert(mapping.attributes);
        if (created) {
          summary.created++;
        } else {
          summary.updated++;
        }
      } catch (error) {
        summary.failed++;
        const message = `Site ${mapping.attributes.siteId}: ${describeError(error)}`;
        summary.errors.push(message);
        this.logger.error(`Upsert failed for ${message}`);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
