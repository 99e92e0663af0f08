export { ProfilesModule } from './profiles.module';
export { ProfileNormalizerService } from './profile-normalizer.service';
export type { ReferenceYearValue, ProfileOptions } from './profile-normalizer.service';
export { ReferenceYearStore } from './reference-year.store';
export { YearlyProfileService } from './yearly-profile.service';
export type {
  CalculateProfilesOptions,
  ProfileSummary,
} from './yearly-profile.service';
export {
  BUCKETS_PER_YEAR,
  bucketOfYear,
  fillMissingBuckets,
  referenceDayOfYear,
} from './reference-year';
