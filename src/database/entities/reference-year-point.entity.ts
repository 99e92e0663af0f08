import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Site } from './site.entity';

/**
 * One 15-minute slot of a site's normalized "typical year".
 * Each profiled site has exactly 35,040 rows (buckets 0..35039).
 */
@Entity('site_reference_year_production')
export class ReferenceYearPoint {
  @PrimaryColumn({ type: 'integer' })
  siteId!: number;

  @PrimaryColumn({ type: 'integer' })
  bucket!: number;

  /**
   * Average production in watts per installed kW.
   */
  @Column({ type: 'double precision' })
  perKwGeneration!: number;

  @ManyToOne(() => Site, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'siteId' })
  site?: Site;
}
