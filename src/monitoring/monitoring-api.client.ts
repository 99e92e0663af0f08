import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { monitoringConfig, MonitoringConfig } from '../config/monitoring.config';
import { FetchError, ParseError, describeError } from '../common/errors';
import { TolerantJsonDecoder } from './decoding/tolerant-json.decoder';

/**
 * One page of the site listing.
 * `records` are raw API objects; mapping to Site happens in the importer.
 */
export interface MonitoringPage {
  records: unknown[];
  /** Total number of sites reported by the API, or null when absent */
  totalCount: number | null;
}

export interface CsvExportRange {
  start: Date;
  end: Date;
}

/**
 * Static listing query parameters sent alongside start/limit.
 */
const LISTING_QUERY: Readonly<Record<string, string>> = {
  sort: 'maxImpact',
  dir: 'ASC',
  status: '0',
  category: '0',
  filter: '',
  showMap: 'false',
};

/**
 * Static chart-export parameters (power series, 15-minute resolution).
 */
const CSV_EXPORT_QUERY: Readonly<Record<string, string>> = {
  timeUnit: '2',
  pn0: 'Power',
  id0: '0',
  t0: '0',
  hasMeters: 'false',
};

/** Non-5xx statuses that are still worth retrying */
const TRANSIENT_STATUSES = new Set([408, 429]);

/** A body that fails to decode is re-requested this many times */
const PARSE_RETRIES = 1;

const JITTER_RATIO = 0.5;

const listingEnvelopeSchema = z.object({
  records: z.array(z.unknown()),
  totalCount: z.union([z.number(), z.string()]).nullish(),
});

/**
 * Exponential backoff with jitter: base * 2^(attempt-1), capped at max,
 * plus up to 50% random jitter.
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(
    maxDelayMs,
    baseDelayMs * Math.pow(2, attempt - 1),
  );
  return Math.round(exponential + exponential * JITTER_RATIO * random());
}

/**
 * HTTP client for the monitoring API.
 *
 * Each call is a fresh round-trip (no caching). Transport faults, 5xx,
 * 408 and 429 are retried with backoff; any other non-2xx status fails
 * immediately with a non-retryable FetchError.
 */
@Injectable()
export class MonitoringApiClient {
  private readonly logger = new Logger(MonitoringApiClient.name);

  constructor(
    @Inject(monitoringConfig.KEY)
    private readonly config: MonitoringConfig,
    private readonly decoder: TolerantJsonDecoder,
  ) {}

  /**
   * Fetch one page of the site listing.
   *
   * A body that cannot be decoded (or lacks a `records` array) is
   * re-requested once before surfacing as FetchError.
   */
  async fetchPage(offset: number, limit: number): Promise<MonitoringPage> {
    const url = this.buildUrl(this.config.baseUrl, {
      start: String(offset),
      limit: String(limit),
      ...LISTING_QUERY,
    });

    let attemptsUsed = 0;
    for (let parseAttempt = 0; ; parseAttempt++) {
      const { body, attempts } = await this.requestText(
        url,
        this.config.requestTimeoutMs,
      );
      attemptsUsed += attempts;

      try {
        const page = this.toPage(body);
        this.logger.debug(
          `Fetched ${page.records.length} records at offset ${offset} (total: ${page.totalCount ?? 'unknown'})`,
        );
        return page;
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }
        if (parseAttempt >= PARSE_RETRIES) {
          throw new FetchError(
            `Unparseable listing page at offset ${offset}: ${error.message}`,
            { attempts: attemptsUsed, retryable: true, cause: error },
          );
        }
        this.logger.warn(
          `Unparseable listing page at offset ${offset}, requesting again`,
        );
      }
    }
  }

  /**
   * Download a site's production CSV export for a time range.
   */
  async downloadSiteCsv(siteId: number, range: CsvExportRange): Promise<string> {
    const url = this.buildUrl(
      this.config.csvExportUrl.replace('{siteId}', encodeURIComponent(String(siteId))),
      {
        st: String(range.start.getTime()),
        et: String(range.end.getTime()),
        fid: String(siteId),
        ...CSV_EXPORT_QUERY,
      },
    );

    const { body } = await this.requestText(url, this.config.csvExportTimeoutMs);
    this.logger.debug(`Downloaded ${body.length} bytes of CSV for site ${siteId}`);
    return body;
  }

  private toPage(body: string): MonitoringPage {
    const { payload } = this.decoder.decode(body);
    const envelope = listingEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ParseError(
        `Listing payload has no records array: ${envelope.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        body.slice(0, 800),
      );
    }

    const rawTotal = envelope.data.totalCount;
    const total = rawTotal === null || rawTotal === undefined ? NaN : Number(rawTotal);

    return {
      records: envelope.data.records,
      totalCount: Number.isFinite(total) && total >= 0 ? total : null,
    };
  }

  /**
   * GET with retry. Returns the body of the first 2xx response and the
   * number of attempts it took.
   */
  private async requestText(
    url: string,
    timeoutMs: number,
  ): Promise<{ body: string; attempts: number }> {
    const { maxAttempts } = this.config;
    let lastError: unknown;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: this.config.headers,
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (response.ok) {
          return { body: await response.text(), attempts: attempt };
        }
      } catch (error) {
        lastError = error;
        lastStatus = undefined;
        await this.backoffOrGiveUp(attempt, `transport error: ${describeError(error)}`);
        continue;
      }

      const errorBody = await this.readErrorBody(response);
      if (response.status >= 500 || TRANSIENT_STATUSES.has(response.status)) {
        lastError = new Error(`HTTP ${response.status}: ${errorBody}`);
        lastStatus = response.status;
        await this.backoffOrGiveUp(attempt, `HTTP ${response.status}`);
        continue;
      }

      throw new FetchError(
        `Request to ${url} was rejected with HTTP ${response.status}: ${errorBody}`,
        { attempts: attempt, retryable: false, status: response.status },
      );
    }

    throw new FetchError(
      `Request to ${url} failed after ${maxAttempts} attempt(s): ${describeError(lastError)}`,
      {
        attempts: maxAttempts,
        retryable: true,
        status: lastStatus,
        cause: lastError,
      },
    );
  }

  private async backoffOrGiveUp(attempt: number, reason: string): Promise<void> {
    const { maxAttempts, retryBaseDelayMs, retryMaxDelayMs } = this.config;
    if (attempt >= maxAttempts) {
      this.logger.error(
        `Request failed (attempt ${attempt}/${maxAttempts}): ${reason}`,
      );
      return;
    }

    const delay = computeBackoffDelay(attempt, retryBaseDelayMs, retryMaxDelayMs);
    this.logger.warn(
      `Request failed (attempt ${attempt}/${maxAttempts}): ${reason}. Retrying in ${delay}ms...`,
    );
    await this.sleep(delay);
  }

  /**
   * Best-effort description of an error response body.
   */
  private async readErrorBody(response: Response): Promise<string> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return `<unreadable body: ${describeError(error)}>`;
    }
    if (!text.trim()) {
      return '<empty body>';
    }

    try {
      const { payload } = this.decoder.decode(text);
      const message = payload.message ?? payload.error ?? payload.errorMessage;
      return typeof message === 'string' ? message : JSON.stringify(payload).slice(0, 200);
    } catch (error) {
      if (error instanceof ParseError) {
        return text.slice(0, 200);
      }
      throw error;
    }
  }

  private buildUrl(base: string, params: Record<string, string>): string {
    const url = new URL(base);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
