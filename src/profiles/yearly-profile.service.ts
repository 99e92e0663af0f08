import { Injectable, Logger } from '@nestjs/common';
import {
  ConfigurationError,
  InsufficientDataError,
  describeError,
} from '../common/errors';
import { ProductionPointStore } from '../production/production-point.store';
import { SiteStage } from '../sites/site-stage';
import { SitesService } from '../sites/sites.service';
import { ProfileNormalizerService } from './profile-normalizer.service';
import { ReferenceYearStore } from './reference-year.store';

export interface ProfileSummary {
  sitesConsidered: number;
  profiled: number;
  /** Sites without enough months of data */
  skipped: number;
  errors: string[];
  durationMs: number;
}

export interface CalculateProfilesOptions {
  /** Also rebuild sites that already have a profile */
  recompute?: boolean;
}

/**
 * YearlyProfileService - Profile Runner
 *
 * Builds and stores the reference year of every uploaded site, one site
 * at a time. A site that fails is reported and the batch continues.
 */
@Injectable()
export class YearlyProfileService {
  private readonly logger = new Logger(YearlyProfileService.name);

  constructor(
    private readonly sitesService: SitesService,
    private readonly productionStore: ProductionPointStore,
    private readonly normalizer: ProfileNormalizerService,
    private readonly referenceYearStore: ReferenceYearStore,
  ) {}

  async calculatePending(
    options: CalculateProfilesOptions = {},
  ): Promise<ProfileSummary> {
    const startTime = Date.now();
    const stages = options.recompute
      ? [SiteStage.Uploaded, SiteStage.Profiled]
      : [SiteStage.Uploaded];
    const sites = await this.sitesService.getAll({ stages });

    const summary: ProfileSummary = {
      sitesConsidered: sites.length,
      profiled: 0,
      skipped: 0,
      errors: [],
      durationMs: 0,
    };
    this.logger.log(`Calculating reference years for ${sites.length} site(s)`);

    for (const site of sites) {
      try {
        const history = await this.productionStore.findBySite(site.siteId);
        const profile = this.normalizer.compute(site, history);
        await this.referenceYearStore.replaceAll(site.siteId, profile);
        await this.sitesService.markStage(site.siteId, SiteStage.Profiled);
        summary.profiled++;
      } catch (error) {
        if (error instanceof InsufficientDataError) {
          summary.skipped++;
          this.logger.warn(error.message);
          continue;
        }
        const message = `Site ${site.siteId}: ${describeError(error)}`;
        summary.errors.push(message);
        if (error instanceof ConfigurationError) {
          this.logger.warn(message);
        } else {
          this.logger.error(`Profile calculation failed. ${message}`);
        }
      }
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.log(
      `Profiles complete: ${summary.profiled}/${summary.sitesConsidered} profiled, ${summary.skipped} skipped`,
    );
    return summary;
  }
}
