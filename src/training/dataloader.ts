/**
 * Data Loader
 *
 * Slices a dataset into batches in sampler order and collates each one.
 * Batches are produced lazily; a consumer cancels by leaving the loop,
 * never in the middle of a batch.
 *
 * @module training/dataloader
 */

import { log } from '../debug/index.js';
import { createCollatorError, ERROR_CODES } from '../errors/collator-error.js';
import type { CollatorConfigSchema, DataLoaderConfigSchema } from '../config/schema/index.js';
import { assertValidLoaderConfig } from '../config/validate.js';
import type { Example } from './datasets/example.js';
import { HistoryCollator } from './collator/collator.js';
import type { Batch } from './collator/materializer.js';
import {
  AuthorGroupedSampler,
  RandomSampler,
  SequentialSampler,
  type Sampler,
} from './sampler.js';

export interface DataLoaderOptions<T, B> {
  batchSize: number;
  collate: (items: T[]) => B;
  sampler?: Sampler;
  dropLast?: boolean;
}

export class DataLoader<T, B> {
  readonly dataset: readonly T[];
  readonly batchSize: number;
  readonly dropLast: boolean;
  private sampler: Sampler;
  private collateFn: (items: T[]) => B;

  constructor(dataset: readonly T[], options: DataLoaderOptions<T, B>) {
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
      throw createCollatorError(
        ERROR_CODES.CONFIGURATION,
        `batchSize must be a positive integer, got ${options.batchSize}`
      );
    }
    const sampler = options.sampler ?? new SequentialSampler(dataset.length);
    if (sampler.size !== dataset.length) {
      throw createCollatorError(
        ERROR_CODES.CONFIGURATION,
        `Sampler covers ${sampler.size} examples, dataset has ${dataset.length}`
      );
    }
    this.dataset = dataset;
    this.batchSize = options.batchSize;
    this.dropLast = options.dropLast ?? false;
    this.sampler = sampler;
    this.collateFn = options.collate;
  }

  /** Number of batches per epoch */
  get length(): number {
    const full = Math.floor(this.dataset.length / this.batchSize);
    const partial = this.dataset.length % this.batchSize;
    return this.dropLast || partial === 0 ? full : full + 1;
  }

  collate(items: T[]): B {
    return this.collateFn(items);
  }

  async *batches(epoch = 0): AsyncGenerator<B, void, void> {
    const order = this.sampler.indices(epoch);
    const count = this.length;
    log.debug('DataLoader', `epoch=${epoch} batches=${count} batchSize=${this.batchSize}`);
    for (let b = 0; b < count; b++) {
      const slice = order.slice(b * this.batchSize, (b + 1) * this.batchSize);
      yield this.collate(slice.map((index) => this.dataset[index]));
    }
  }
}

/**
 * Build the sampler described by the loader config.
 */
export function createSampler(examples: readonly Example[], config: DataLoaderConfigSchema): Sampler {
  if (!config.shuffle) return new SequentialSampler(examples.length);
  if (config.groupByAuthor) {
    return new AuthorGroupedSampler(
      examples.map((example) => example.author),
      { seed: config.seed }
    );
  }
  return new RandomSampler(examples.length, { seed: config.seed });
}

/**
 * Data loader over examples that yields collated batches.
 */
export function createExampleLoader(
  examples: readonly Example[],
  config: { collator: CollatorConfigSchema; loader: DataLoaderConfigSchema }
): DataLoader<Example, Batch> {
  assertValidLoaderConfig(config.loader);
  const collator = new HistoryCollator(undefined, config.collator);
  return new DataLoader(examples, {
    batchSize: config.loader.batchSize,
    dropLast: config.loader.dropLast,
    sampler: createSampler(examples, config.loader),
    collate: (items) => collator.collate(items),
  });
}
