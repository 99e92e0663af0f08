import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { profilesConfig, ProfilesConfig } from '../config/profiles.config';
import { ReferenceYearPoint } from '../database/entities/reference-year-point.entity';
import { ReferenceYearValue } from './profile-normalizer.service';

/**
 * ReferenceYearStore - persisted reference years.
 */
@Injectable()
export class ReferenceYearStore {
  private readonly logger = new Logger(ReferenceYearStore.name);

  constructor(
    @InjectRepository(ReferenceYearPoint)
    private readonly referenceYearRepository: Repository<ReferenceYearPoint>,
    @Inject(profilesConfig.KEY)
    private readonly config: ProfilesConfig,
  ) {}

  /**
   * Swap a site's reference year atomically: delete, then insert in chunks,
   * inside one transaction.
   */
  async replaceAll(siteId: number, values: ReferenceYearValue[]): Promise<void> {
    const chunkSize = this.config.insertChunkSize;

    await this.referenceYearRepository.manager.transaction(async (manager) => {
      await manager.delete(ReferenceYearPoint, { siteId });
      for (let start = 0; start < values.length; start += chunkSize) {
        const chunk = values.slice(start, start + chunkSize).map((value) => ({
          siteId,
          bucket: value.bucket,
          perKwGeneration: value.perKwGeneration,
        }));
        await manager
          .createQueryBuilder()
          .insert()
          .into(ReferenceYearPoint)
          .values(chunk)
          .execute();
      }
    });

    this.logger.debug(`Stored ${values.length} reference-year points for site ${siteId}`);
  }

  async findBySite(siteId: number): Promise<ReferenceYearValue[]> {
    const rows = await this.referenceYearRepository.find({
      where: { siteId },
      order: { bucket: 'ASC' },
    });
    return rows.map((row) => ({
      bucket: row.bucket,
      perKwGeneration: row.perKwGeneration,
    }));
  }
}
