import type { RandomSource } from '../utils/random';
import type { Chromosome } from './genetic.types';

/**
 * Recombine two parents into two offspring.
 *
 * Instead of a single cut point, the overlapping prefix (the length `m` of the
 * shorter parent) is split into consecutive runs of random length. Each run
 * ends at a boundary drawn uniformly in [start, m]; runs alternate between
 * "exchange" and "keep", the first one being an exchange run. Genes inside
 * exchange runs swap places between the two offspring. A zero-length run still
 * flips the alternation.
 *
 * Genes at positions ≥ m (the longer parent's tail) never move, so each child
 * keeps the length of the parent it was copied from.
 *
 * @example
 * const [childA, childB] = cross([1, 1, 1, 1], [2, 2, 2], random);
 * // childA.length === 4, childB.length === 3, childA[3] === 1
 *
 * @param first First parent (left untouched).
 * @param second Second parent (left untouched).
 * @param random Source of boundary draws.
 * @returns Offspring derived from `first` and `second` respectively.
 */
export function cross<G>(
  first: readonly G[],
  second: readonly G[],
  random: RandomSource
): [Chromosome<G>, Chromosome<G>] {
  const childA = first.slice();
  const childB = second.slice();
  const overlap = Math.min(childA.length, childB.length);

  let index = 0;
  let exchange = true;
  while (index < overlap) {
    const next = random.int(index, overlap);
    if (exchange) {
      for (let i = index; i < next; i++) {
        const gene = childA[i];
        childA[i] = childB[i];
        childB[i] = gene;
      }
    }
    exchange = !exchange;
    index = next;
  }

  return [childA, childB];
}
