import { Site } from '../../database/entities/site.entity';
import { SiteStage } from '../site-stage';

/**
 * Descriptive site fields written by the importer. Stage columns are
 * not part of it; only markStage writes them.
 */
export type SiteAttributes = Pick<
  Site,
  | 'siteId'
  | 'name'
  | 'status'
  | 'siteType'
  | 'zipCode'
  | 'address'
  | 'secondaryAddress'
  | 'country'
  | 'state'
  | 'city'
  | 'latitude'
  | 'longitude'
  | 'capacityKw'
  | 'installationDate'
  | 'lastReportingTime'
>;

export interface SiteUpsertResult {
  site: Site;
  /** true when the site did not exist before */
  created: boolean;
}

export interface SiteFilter {
  stages?: SiteStage[];
  countries?: string[];
}

/**
 * Read/write contract for site records.
 */
export interface SiteStore {
  upsert(attributes: SiteAttributes): Promise<SiteUpsertResult>;
  getAll(filter?: SiteFilter): Promise<Site[]>;
  getById(siteId: number): Promise<Site | null>;
  /**
   * Mark a pipeline stage completed. Never moves a site backwards.
   */
  markStage(siteId: number, stage: SiteStage, at?: Date): Promise<Site>;
}
