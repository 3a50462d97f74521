import type { RandomSource } from '../utils/random';
import type { Chromosome } from './genetic.types';

/** Half-open range `[begin, end)` of genes rewritten by a mutation. */
export interface MutationSpan {
  begin: number;
  end: number;
}

/**
 * Mutate a chromosome in place.
 *
 * A single draw per chromosome (not per gene) decides whether a mutation
 * happens. When it does, a start index `begin` is drawn in [0, length - 1] and
 * an end index in [begin, length]; every gene in `[begin, end)` is replaced by a
 * freshly generated one. `begin === end` rewrites nothing. The length never
 * changes.
 *
 * @param chromosome Chromosome to modify.
 * @param probability Chance of a mutation event, in [0, 1].
 * @param randomGene Generator for replacement genes.
 * @param random Source of every draw.
 * @returns The rewritten span, or `undefined` when no mutation happened.
 */
export function mutate<G>(
  chromosome: Chromosome<G>,
  probability: number,
  randomGene: () => G,
  random: RandomSource
): MutationSpan | undefined {
  if (random.next() >= probability) return undefined;

  const begin = random.int(0, chromosome.length - 1);
  const end = random.int(begin, chromosome.length);
  for (let i = begin; i < end; i++) chromosome[i] = randomGene();
  return { begin, end };
}
