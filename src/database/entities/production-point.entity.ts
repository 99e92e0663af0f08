import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Site } from './site.entity';

/**
 * One timestamped power reading for a site.
 *
 * Composite Primary Key: [siteId, timestamp]
 * - At most one reading per site per instant
 * - Rows are written once and never updated; re-ingesting a file
 *   relies on ON CONFLICT DO NOTHING against this key
 */
@Entity('site_production_data')
export class ProductionPoint {
  @PrimaryColumn({ type: 'integer' })
  siteId!: number;

  /**
   * Reading time (UTC enforced via timestamptz).
   */
  @PrimaryColumn({ type: 'timestamptz' })
  timestamp!: Date;

  @Column({ type: 'double precision' })
  productionWatts!: number;

  @ManyToOne(() => Site, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'siteId' })
  site?: Site;
}
