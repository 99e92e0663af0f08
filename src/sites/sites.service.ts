import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, Repository } from 'typeorm';
import { Site } from '../database/entities/site.entity';
import { isRecord } from '../common/utils/is-record';
import { SiteStage, markStage } from './site-stage';
import {
  SiteAttributes,
  SiteFilter,
  SiteStore,
  SiteUpsertResult,
} from './interfaces/site-store.interface';

/**
 * Columns refreshed when an already-known site is imported again.
 */
export const MUTABLE_SITE_COLUMNS = [
  'name',
  'status',
  'siteType',
  'zipCode',
  'address',
  'secondaryAddress',
  'country',
  'state',
  'city',
  'latitude',
  'longitude',
  'capacityKw',
  'installationDate',
  'lastReportingTime',
] as const satisfies readonly (keyof SiteAttributes)[];

/**
 * SitesService - TypeORM-backed Site Store.
 */
@Injectable()
export class SitesService implements SiteStore {
  private readonly logger = new Logger(SitesService.name);

  constructor(
    @InjectRepository(Site)
    private readonly siteRepository: Repository<Site>,
  ) {}

  /**
   * Insert or refresh a site (ON CONFLICT (siteId) DO UPDATE).
   * Only descriptive columns are overwritten; stage columns are left alone.
   */
  async upsert(attributes: SiteAttributes): Promise<SiteUpsertResult> {
    const result = await this.siteRepository
      .createQueryBuilder()
      .insert()
      .into(Site)
      .values(attributes)
      .orUpdate([...MUTABLE_SITE_COLUMNS, 'updatedAt'], ['siteId'])
      .returning('"siteId", (xmax = 0) AS "inserted"')
      .execute();

    const row: unknown = Array.isArray(result.raw) ? result.raw[0] : undefined;
    const created = isRecord(row) && row.inserted === true;

    const site = await this.siteRepository.findOneByOrFail({
      siteId: attributes.siteId,
    });
    this.logger.debug(
      `${created ? 'Created' : 'Updated'} site ${attributes.siteId}`,
    );
    return { site, created };
  }

  async getAll(filter: SiteFilter = {}): Promise<Site[]> {
    const where: FindOptionsWhere<Site> = {};
    if (filter.stages && filter.stages.length > 0) {
      where.stage = In(filter.stages);
    }
    if (filter.countries && filter.countries.length > 0) {
      where.country = In(filter.countries);
    }

    return this.siteRepository.find({ where, order: { siteId: 'ASC' } });
  }

  async getById(siteId: number): Promise<Site | null> {
    return this.siteRepository.findOneBy({ siteId });
  }

  async markStage(
    siteId: number,
    stage: SiteStage,
    at: Date = new Date(),
  ): Promise<Site> {
    const site = await this.getById(siteId);
    if (!site) {
      throw new NotFoundException(`Site ${siteId} not found`);
    }

    const columns = markStage(site, stage, at);
    await this.siteRepository.update({ siteId }, columns);
    this.logger.log(`Site ${siteId}: ${stage} at ${at.toISOString()}`);

    return Object.assign(site, columns);
  }
}
