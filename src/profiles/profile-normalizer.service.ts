import { Inject, Injectable, Logger } from '@nestjs/common';
import { DateTime } from 'luxon';
import { ConfigurationError, InsufficientDataError } from '../common/errors';
import { productionConfig, ProductionConfig } from '../config/production.config';
import { profilesConfig, ProfilesConfig } from '../config/profiles.config';
import { Site } from '../database/entities/site.entity';
import { NewProductionPoint } from '../production/interfaces/production-store.interface';
import { resolveSiteTimeZone } from '../sites/site-time-zone';
import { BUCKETS_PER_YEAR, bucketOfYear, fillMissingBuckets } from './reference-year';

/**
 * One slot of a normalized reference year, in watts per installed kW.
 */
export interface ReferenceYearValue {
  bucket: number;
  perKwGeneration: number;
}

export interface ProfileOptions {
  timeZone?: string | null;
}

/**
 * ProfileNormalizer - turns a site's production history into a typical
 * year of 35,040 quarter-hour slots, normalized by installed capacity.
 */
@Injectable()
export class ProfileNormalizerService {
  private readonly logger = new Logger(ProfileNormalizerService.name);

  constructor(
    @Inject(profilesConfig.KEY)
    private readonly config: ProfilesConfig,
    @Inject(productionConfig.KEY)
    private readonly production: ProductionConfig,
  ) {}

  /**
   * @throws ConfigurationError when capacity is not a positive number
   * @throws InsufficientDataError when fewer than `minMonths` months have data
   */
  compute(
    site: Pick<Site, 'siteId' | 'capacityKw' | 'country'>,
    history: NewProductionPoint[],
    options: ProfileOptions = {},
  ): ReferenceYearValue[] {
    const { siteId, capacityKw } = site;
    if (!Number.isFinite(capacityKw) || capacityKw <= 0) {
      throw new ConfigurationError(
        `Site ${siteId} has no usable capacity (${capacityKw} kW)`,
      );
    }

    const zone = resolveSiteTimeZone(
      site,
      this.production.defaultTimeZone,
      options.timeZone,
    );
    const samples = this.localSamples(history, zone);

    const months = new Set(samples.map((sample) => sample.local.month));
    if (months.size < this.config.minMonths) {
      throw new InsufficientDataError(siteId, months.size, this.config.minMonths);
    }

    const sums = new Float64Array(BUCKETS_PER_YEAR);
    const counts = new Uint32Array(BUCKETS_PER_YEAR);
    for (const { local, watts } of samples) {
      const bucket = bucketOfYear(local);
      sums[bucket] += watts;
      counts[bucket]++;
    }

    const means: (number | null)[] = [];
    for (let bucket = 0; bucket < BUCKETS_PER_YEAR; bucket++) {
      means.push(counts[bucket] > 0 ? sums[bucket] / counts[bucket] : null);
    }
    const emptyBuckets = means.filter((mean) => mean === null).length;

    this.logger.debug(
      `Site ${siteId}: ${samples.length} samples over ${months.size} months, ${emptyBuckets} buckets interpolated (zone ${zone})`,
    );

    return fillMissingBuckets(means).map((watts, bucket) => ({
      bucket,
      perKwGeneration: watts / capacityKw,
    }));
  }

  /**
   * Finite samples in local time, minus whole days of zero production
   * when configured.
   */
  private localSamples(
    history: NewProductionPoint[],
    zone: string,
  ): Array<{ local: DateTime; watts: number }> {
    const samples = history
      .filter((point) => Number.isFinite(point.productionWatts))
      .map((point) => ({
        local: DateTime.fromJSDate(point.timestamp, { zone }),
        watts: point.productionWatts,
      }));
    if (!this.config.dropZeroDays) {
      return samples;
    }

    const dayTotals = new Map<string, number>();
    for (const sample of samples) {
      const day = sample.local.toISODate() ?? '';
      dayTotals.set(day, (dayTotals.get(day) ?? 0) + sample.watts);
    }
    return samples.filter(
      (sample) => (dayTotals.get(sample.local.toISODate() ?? '') ?? 0) !== 0,
    );
  }
}
