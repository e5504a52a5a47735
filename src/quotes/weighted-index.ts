import { RandomSource, randomIndex } from '../utils/random';

/**
 * Weighted sampler over indices 0..n-1 using Vose's alias method.
 * Construction is O(n); each sample costs two random draws.
 *
 * Weights are non-negative integers with a positive total. A zero weight
 * is never sampled.
 */
export class WeightedIndex {
  private readonly probability: Float64Array;
  private readonly alias: Uint32Array;
  readonly totalWeight: number;

  constructor(weights: readonly number[]) {
    if (weights.length === 0) {
      throw new RangeError('WeightedIndex: no weights given');
    }

    let total = 0;
    for (const weight of weights) {
      if (!Number.isInteger(weight) || weight < 0) {
        throw new RangeError(`WeightedIndex: invalid weight ${weight}`);
      }
      total += weight;
    }
    if (total === 0) {
      throw new RangeError('WeightedIndex: all weights are zero');
    }
    this.totalWeight = total;

    const n = weights.length;
    this.probability = new Float64Array(n);
    this.alias = new Uint32Array(n);

    // Scale so that the average bucket holds exactly 1
    const scaled = weights.map((w) => (w * n) / total);
    const small: number[] = [];
    const large: number[] = [];
    scaled.forEach((p, i) => (p < 1 ? small : large).push(i));

    let s = small.pop();
    let l = large.pop();
    while (s !== undefined && l !== undefined) {
      this.probability[s] = scaled[s];
      this.alias[s] = l;
      scaled[l] = scaled[l] + scaled[s] - 1;
      if (scaled[l] < 1) {
        small.push(l);
      } else {
        large.push(l);
      }
      s = small.pop();
      l = large.pop();
    }

    // Leftovers are full buckets (up to float rounding)
    for (const i of [s, l, ...small, ...large]) {
      if (i !== undefined) {
        this.probability[i] = 1;
        this.alias[i] = i;
      }
    }
  }

  get length(): number {
    return this.probability.length;
  }

  sample(random: RandomSource): number {
    const bucket = randomIndex(random, this.probability.length);
    return random() < this.probability[bucket] ? bucket : this.alias[bucket];
  }
}
