import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { ProductionPoint } from '../database/entities/production-point.entity';
import {
  NewProductionPoint,
  ProductionStore,
} from './interfaces/production-store.interface';

/**
 * ProductionPointStore - TypeORM-backed Production Store.
 *
 * The composite PK (siteId, timestamp) is the final guard against
 * duplicates: inserts use ON CONFLICT DO NOTHING, so an existing reading
 * is never overwritten.
 */
@Injectable()
export class ProductionPointStore implements ProductionStore {
  private readonly logger = new Logger(ProductionPointStore.name);

  constructor(
    @InjectRepository(ProductionPoint)
    private readonly productionRepository: Repository<ProductionPoint>,
  ) {}

  async existingTimestamps(siteId: number): Promise<Set<number>> {
    const rows = await this.productionRepository.find({
      select: ['timestamp'],
      where: { siteId },
    });
    return new Set(rows.map((row) => row.timestamp.getTime()));
  }

  async insertBatch(
    siteId: number,
    points: NewProductionPoint[],
  ): Promise<number> {
    if (points.length === 0) return 0;

    const values: QueryDeepPartialEntity<ProductionPoint>[] = points.map(
      (point) => ({
        siteId,
        timestamp: point.timestamp,
        productionWatts: point.productionWatts,
      }),
    );

    let inserted: number;
    try {
      const result = await this.productionRepository
        .createQueryBuilder()
        .insert()
        .into(ProductionPoint)
        .values(values)
        .orIgnore()
        .returning('"timestamp"')
        .execute();
      // RETURNING yields only the rows that were not dropped by the conflict
      inserted = Array.isArray(result.raw) ? result.raw.length : 0;
    } catch (error) {
      this.logger.error('Batch insert failed', {
        siteId,
        batchSize: points.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    if (inserted < points.length) {
      this.logger.warn(
        `Site ${siteId}: ${points.length - inserted} of ${points.length} points already stored`,
      );
    }
    return inserted;
  }

  async findBySite(siteId: number): Promise<NewProductionPoint[]> {
    const rows = await this.productionRepository.find({
      select: ['timestamp', 'productionWatts'],
      where: { siteId },
      order: { timestamp: 'ASC' },
    });
    return rows.map((row) => ({
      timestamp: row.timestamp,
      productionWatts: row.productionWatts,
    }));
  }
}
