import {
  Entity,
  Column,
  PrimaryColumn,
  Index,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import { SiteStage } from '../../sites/site-stage';

/**
 * Site Entity - one solar installation tracked by the pipeline.
 *
 * The aggregate root: production points and reference-year points
 * reference it and are removed with it (ON DELETE CASCADE).
 *
 * Descriptive columns are refreshed on every import. The stage columns
 * (`stage`, `csvDownloadedOn`, `uploadedOn`, `profileUpdatedOn`) are owned
 * by the pipeline stages and only ever move forward.
 */
@Entity('solar_sites')
@Index('idx_solar_sites_stage', ['stage'])
export class Site {
  /**
   * Stable identifier assigned by the monitoring API.
   */
  @PrimaryColumn({ type: 'integer' })
  siteId!: number;

  @Column({ type: 'varchar', length: 255, nullable: true })
  name!: string | null;

  /**
   * Lifecycle status as reported by the API (e.g. "Active").
   */
  @Column({ type: 'varchar', length: 255, nullable: true })
  status!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  siteType!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  zipCode!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  address!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  secondaryAddress!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  country!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  state!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  city!: string | null;

  @Column({ type: 'double precision', nullable: true })
  latitude!: number | null;

  @Column({ type: 'double precision', nullable: true })
  longitude!: number | null;

  /**
   * Installed (peak) capacity in kW. 0 when the API did not report one.
   */
  @Column({ type: 'double precision', default: 0 })
  capacityKw!: number;

  @Column({ type: 'timestamptz', nullable: true })
  installationDate!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  lastReportingTime!: Date | null;

  @Column({
    type: 'enum',
    enum: SiteStage,
    enumName: 'site_stage',
    default: SiteStage.Discovered,
  })
  stage!: SiteStage;

  /** Set when the production CSV was downloaded (has_csv). */
  @Column({ type: 'timestamptz', nullable: true })
  csvDownloadedOn!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  uploadedOn!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  profileUpdatedOn!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
