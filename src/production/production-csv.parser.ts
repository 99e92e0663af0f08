import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { DateTime } from 'luxon';
import { CsvFormatError, IngestRowError } from '../common/errors';
import { isRecord } from '../common/utils/is-record';

/**
 * Header names (lowercase) accepted for each required column.
 */
const TIMESTAMP_HEADERS = ['time', 'timestamp', 'date', 'datetime', 'date_time'];
const PRODUCTION_HEADERS = [
  'system production (w)',
  'production (w)',
  'production',
  'power (w)',
  'watts',
];

/**
 * Local-time layouts tried when the value is not ISO 8601.
 */
const LOCAL_TIMESTAMP_FORMATS = [
  'M/d/yyyy H:mm',
  'M/d/yyyy H:mm:ss',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
];

export interface ParsedProductionRow {
  rowNumber: number;
  /** UTC instant */
  timestamp: Date;
  productionWatts: number;
}

export interface ProductionCsvParseResult {
  rowsRead: number;
  rows: ParsedProductionRow[];
  rowErrors: IngestRowError[];
}

/**
 * Parse a wall-clock timestamp written in `zone` into a UTC instant.
 * An explicit offset or trailing Z in the value takes precedence.
 */
export function parseLocalTimestamp(value: string, zone: string): Date | null {
  const text = value.replace(/"/g, '').trim();
  if (!text) return null;

  if (/^\d{4}-\d{2}-\d{2}T/.test(text)) {
    const iso = DateTime.fromISO(text, { zone });
    return iso.isValid ? iso.toJSDate() : null;
  }
  for (const format of LOCAL_TIMESTAMP_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, { zone });
    if (parsed.isValid) {
      return parsed.toJSDate();
    }
  }
  return null;
}

/**
 * Production in watts. Empty cells are 0 W; anything non-numeric or
 * negative is rejected (null).
 */
export function parseProductionWatts(value: string | undefined): number | null {
  if (value === undefined) return null;
  const text = value.replace(/"/g, '').trim();
  if (!text) return 0;
  const watts = Number(text);
  return Number.isFinite(watts) && watts >= 0 ? watts : null;
}

function toStringRecord(row: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (!isRecord(row)) return record;
  for (const [key, value] of Object.entries(row)) {
    record[key] = typeof value === 'string' ? value : String(value ?? '');
  }
  return record;
}

function findColumn(headers: string[], candidates: string[]): string | null {
  for (const candidate of candidates) {
    const header = headers.find((h) => h.toLowerCase() === candidate);
    if (header !== undefined) return header;
  }
  return null;
}

/**
 * ProductionCsvParser - per-site production export (header + data rows).
 *
 * Expected structure:
 *   Time,System Production (W)
 *   01/15/2023 10:00,1234.5
 *
 * Unusable rows become IngestRowErrors; a header without both required
 * columns raises CsvFormatError.
 */
@Injectable()
export class ProductionCsvParser {
  private readonly logger = new Logger(ProductionCsvParser.name);

  async parse(
    fileBuffer: Buffer,
    timeZone: string,
  ): Promise<ProductionCsvParseResult> {
    let headers: string[] | null = null;
    const stream = Readable.from(fileBuffer).pipe(
      csvParser({
        mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
      }),
    );
    stream.on('headers', (parsedHeaders: string[]) => {
      headers = parsedHeaders;
    });

    const rawRows: Record<string, string>[] = [];
    for await (const row of stream) {
      rawRows.push(toStringRecord(row));
    }

    const columns = this.resolveColumns(headers);
    const result: ProductionCsvParseResult = {
      rowsRead: rawRows.length,
      rows: [],
      rowErrors: [],
    };

    rawRows.forEach((raw, index) => {
      const rowNumber = index + 1;
      const timeValue = raw[columns.time];
      const timestamp =
        timeValue === undefined ? null : parseLocalTimestamp(timeValue, timeZone);
      if (!timestamp) {
        result.rowErrors.push(
          new IngestRowError(rowNumber, `Unparseable timestamp '${timeValue ?? ''}'`),
        );
        return;
      }

      const productionWatts = parseProductionWatts(raw[columns.production]);
      if (productionWatts === null) {
        result.rowErrors.push(
          new IngestRowError(
            rowNumber,
            `Invalid production value '${raw[columns.production] ?? ''}'`,
          ),
        );
        return;
      }

      result.rows.push({ rowNumber, timestamp, productionWatts });
    });

    this.logger.debug(
      `Parsed ${result.rows.length}/${result.rowsRead} rows (${result.rowErrors.length} rejected, zone ${timeZone})`,
    );
    return result;
  }

  private resolveColumns(headers: string[] | null): {
    time: string;
    production: string;
  } {
    if (!headers || headers.length === 0) {
      throw new CsvFormatError('File is empty or has no header row');
    }
    const time = findColumn(headers, TIMESTAMP_HEADERS);
    const production = findColumn(headers, PRODUCTION_HEADERS);
    if (!time || !production) {
      throw new CsvFormatError(
        `Missing ${!time ? 'timestamp' : 'production'} column in header: ${headers.join(', ')}`,
      );
    }
    return { time, production };
  }
}
