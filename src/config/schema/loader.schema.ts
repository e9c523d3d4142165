/**
 * Data Loader Config Schema
 *
 * Batch size and ordering for iterating a dataset of examples.
 *
 * @module config/schema/loader
 */

export interface DataLoaderConfigSchema {
  /** Examples per collated batch */
  batchSize: number;

  /** Visit examples in a seeded random order */
  shuffle: boolean;

  /**
   * When shuffling, keep each author's examples together and in their
   * original order, shuffling only the order of authors.
   */
  groupByAuthor: boolean;

  /** Seed for the shuffle; the same seed and epoch give the same order */
  seed: number;

  /** Drop a trailing batch smaller than `batchSize` */
  dropLast: boolean;
}

export const DEFAULT_DATA_LOADER_CONFIG: DataLoaderConfigSchema = {
  batchSize: 32,
  shuffle: true,
  groupByAuthor: true,
  seed: 42,
  dropLast: false,
};
