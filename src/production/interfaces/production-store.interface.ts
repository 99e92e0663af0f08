/**
 * A production reading ready to be written.
 */
export interface NewProductionPoint {
  /** UTC instant */
  timestamp: Date;
  productionWatts: number;
}

/**
 * Read/write contract for a site's production history.
 */
export interface ProductionStore {
  /**
   * Every stored timestamp for the site, as epoch milliseconds.
   */
  existingTimestamps(siteId: number): Promise<Set<number>>;

  /**
   * Insert points, ignoring any that already exist.
   * @returns number of points actually inserted
   */
  insertBatch(siteId: number, points: NewProductionPoint[]): Promise<number>;

  /**
   * Full history ordered by timestamp.
   */
  findBySite(siteId: number): Promise<NewProductionPoint[]>;
}
