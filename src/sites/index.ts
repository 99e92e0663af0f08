export { SitesModule } from './sites.module';
export { SitesService, MUTABLE_SITE_COLUMNS } from './sites.service';
export {
  SiteStage,
  STAGE_ORDER,
  markStage,
  isStageReached,
  toSiteProgress,
} from './site-stage';
export type { SiteProgress, StageColumns } from './site-stage';
export { resolveSiteTimeZone, isValidTimeZone } from './site-time-zone';
export type {
  SiteAttributes,
  SiteFilter,
  SiteStore,
  SiteUpsertResult,
} from './interfaces/site-store.interface';
