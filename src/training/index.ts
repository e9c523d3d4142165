/**
 * Training data pipeline: datasets, collation, sampling and loading.
 *
 * @module training
 */

export * from './datasets/index.js';
export * from './collator/index.js';
export {
  SequentialSampler,
  RandomSampler,
  AuthorGroupedSampler,
  createRng,
  shuffleInPlace,
  type Sampler,
} from './sampler.js';
export {
  DataLoader,
  createSampler,
  createExampleLoader,
  type DataLoaderOptions,
} from './dataloader.js';
