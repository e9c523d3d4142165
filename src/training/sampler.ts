/**
 * Example samplers.
 *
 * A sampler decides the order in which a data loader visits example
 * indices. All shuffling is seeded: the same seed and epoch always give
 * the same order.
 *
 * @module training/sampler
 */

export interface Sampler {
  /** Number of indices produced per epoch */
  readonly size: number;
  /** Example indices for one epoch */
  indices(epoch?: number): number[];
}

/**
 * mulberry32 PRNG; returns floats in [0, 1).
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function epochSeed(seed: number, epoch: number): number {
  return (seed ^ Math.imul(epoch + 1, 0x9e3779b1)) >>> 0;
}

/**
 * In-place Fisher-Yates shuffle.
 */
export function shuffleInPlace<T>(items: T[], rng: () => number): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

export class SequentialSampler implements Sampler {
  readonly size: number;

  constructor(size: number) {
    this.size = size;
  }

  indices(): number[] {
    return Array.from({ length: this.size }, (_, i) => i);
  }
}

export class RandomSampler implements Sampler {
  readonly size: number;
  private seed: number;

  constructor(size: number, options: { seed: number }) {
    this.size = size;
    this.seed = options.seed;
  }

  indices(epoch = 0): number[] {
    const order = Array.from({ length: this.size }, (_, i) => i);
    return shuffleInPlace(order, createRng(epochSeed(this.seed, epoch)));
  }
}

/**
 * Shuffles authors, not examples: each author's examples stay contiguous
 * and in input (chronological) order. Examples without an author form a
 * group of one.
 */
export class AuthorGroupedSampler implements Sampler {
  readonly size: number;
  private groups: number[][];
  private seed: number;

  constructor(authors: readonly (string | undefined)[], options: { seed: number }) {
    this.size = authors.length;
    this.seed = options.seed;

    const byAuthor = new Map<string, number[]>();
    const groups: number[][] = [];
    authors.forEach((author, index) => {
      if (author === undefined) {
        groups.push([index]);
        return;
      }
      const group = byAuthor.get(author);
      if (group) {
        group.push(index);
      } else {
        const created = [index];
        byAuthor.set(author, created);
        groups.push(created);
      }
    });
    this.groups = groups;
  }

  get groupCount(): number {
    return this.groups.length;
  }

  indices(epoch = 0): number[] {
    const order = shuffleInPlace(this.groups.slice(), createRng(epochSeed(this.seed, epoch)));
    return order.flat();
  }
}
