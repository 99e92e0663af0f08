import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { describeError } from '../common/errors';
import { productionConfig, ProductionConfig } from '../config/production.config';
import { Site } from '../database/entities/site.entity';
import { resolveSiteTimeZone } from '../sites/site-time-zone';
import { NewProductionPoint } from './interfaces/production-store.interface';
import { ProductionCsvParser } from './production-csv.parser';
import { ProductionPointStore } from './production-point.store';

/** Row error messages kept per file; counters still cover every row. */
export const MAX_REPORTED_ERRORS = 100;

/**
 * Ingest Result Summary
 */
export interface IngestSummary {
  siteId: number;
  timeZone: string;
  rowsRead: number;
  rowsInserted: number;
  /** Rows rejected by the parser */
  rowsSkipped: number;
  /** Rows already stored, or repeated within the file */
  rowsDuplicate: number;
  /** false when the file was unusable or a batch insert failed */
  completed: boolean;
  errors: string[];
  durationMs: number;
}

export interface IngestOptions {
  /** IANA zone or UTC offset overriding the site's resolved zone */
  timeZone?: string | null;
}

/**
 * ProductionIngestService - CSV Ingestor
 *
 * 1. Parse the file in the site's local time zone
 * 2. Drop timestamps already stored (one lookup per file) and in-file repeats
 * 3. Insert the rest in batches; the first failing batch ends the file and
 *    leaves earlier batches committed
 */
@Injectable()
export class ProductionIngestService {
  private readonly logger = new Logger(ProductionIngestService.name);

  constructor(
    private readonly parser: ProductionCsvParser,
    private readonly productionStore: ProductionPointStore,
    @Inject(productionConfig.KEY)
    private readonly config: ProductionConfig,
  ) {}

  /**
   * Ingest one production CSV for one site.
   *
   * @param file - path on disk or file content
   * @throws ConfigurationError for an unknown explicit time zone
   */
  async ingest(
    site: Pick<Site, 'siteId' | 'country'>,
    file: string | Buffer,
    options: IngestOptions = {},
  ): Promise<IngestSummary> {
    const startTime = Date.now();
    const timeZone = resolveSiteTimeZone(
      site,
      this.config.defaultTimeZone,
      options.timeZone,
    );
    const summary: IngestSummary = {
      siteId: site.siteId,
      timeZone,
      rowsRead: 0,
      rowsInserted: 0,
      rowsSkipped: 0,
      rowsDuplicate: 0,
      completed: false,
      errors: [],
      durationMs: 0,
    };

    try {
      const buffer = typeof file === 'string' ? await readFile(file) : file;
      const parsed = await this.parser.parse(buffer, timeZone);

      summary.rowsRead = parsed.rowsRead;
      summary.rowsSkipped = parsed.rowErrors.length;
      for (const rowError of parsed.rowErrors.slice(0, MAX_REPORTED_ERRORS)) {
        summary.errors.push(rowError.message);
      }

      const seen = await this.productionStore.existingTimestamps(site.siteId);
      const pending: NewProductionPoint[] = [];
      for (const row of parsed.rows) {
        const key = row.timestamp.getTime();
        if (seen.has(key)) {
          summary.rowsDuplicate++;
          continue;
        }
        seen.add(key);
        pending.push({
          timestamp: row.timestamp,
          productionWatts: row.productionWatts,
        });
      }

      summary.completed = await this.insertInBatches(
        site.siteId,
        pending,
        summary,
      );
    } catch (error) {
      const message = describeError(error);
      summary.errors.push(message);
      this.logger.error(`Ingest failed for site ${site.siteId}: ${message}`);
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.log(
      `Site ${site.siteId}: ${summary.rowsInserted}/${summary.rowsRead} rows inserted ` +
        `(${summary.rowsDuplicate} duplicate, ${summary.rowsSkipped} skipped, zone ${timeZone})`,
    );
    return summary;
  }

  /**
   * @returns false when a batch failed
   */
  private async insertInBatches(
    siteId: number,
    points: NewProductionPoint[],
    summary: IngestSummary,
  ): Promise<boolean> {
    const batchSize = this.config.batchSize;
    for (let start = 0; start < points.length; start += batchSize) {
      const batch = points.slice(start, start + batchSize);
      try {
        const inserted = await this.productionStore.insertBatch(siteId, batch);
        summary.rowsInserted += inserted;
        // Stored by another writer since the duplicate lookup
        summary.rowsDuplicate += batch.length - inserted;
      } catch (error) {
        const batchNumber = start / batchSize + 1;
        summary.errors.push(
          `Batch ${batchNumber} failed after ${summary.rowsInserted} rows: ${describeError(error)}`,
        );
        return false;
      }
    }
    return true;
  }
}
