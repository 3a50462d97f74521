import type { RandomSource } from '../utils/random';
import type { SelectionMethod } from '../methods/selection';
import { warnOnce } from '../utils/warnings';
import { GeneticConfigError } from './genetic.errors';
import type { PopulationStore } from './genetic.population';
import type { Chromosome } from './genetic.types';

/**
 * Select one or more parents from the current population.
 *
 * Supported strategies (via `method.name`):
 * - 'ROULETTE_WHEEL'       : one pick, probability proportional to score
 * - 'STOCHASTIC_UNIVERSAL' : up to `k` evenly spaced picks from a single spin
 * - 'TOURNAMENT'           : best of `method.size` uniform draws
 *
 * The returned chromosomes are copies; crossover and mutation may modify them
 * without touching the published store.
 *
 * @example
 * const parents = select(store, { name: 'TOURNAMENT', size: 3 }, new Random(7));
 *
 * @param store Scored population of the current generation (non-empty).
 * @param method Selection descriptor.
 * @param random Source of every draw.
 * @returns At least one chromosome.
 * @throws GeneticConfigError for an unknown descriptor.
 */
export function select<G>(
  store: PopulationStore<G>,
  method: SelectionMethod,
  random: RandomSource
): Chromosome<G>[] {
  switch (method.name) {
    case 'ROULETTE_WHEEL':
      return [rouletteWheel(store, random).slice()];
    case 'STOCHASTIC_UNIVERSAL':
      return stochasticUniversal(store, random).map((c) => c.slice());
    case 'TOURNAMENT':
      return [tournament(store, method.size, random).slice()];
    default:
      return unknownSelection(method);
  }
}

/**
 * Spin the wheel once: draw `r` in [0, total] and return the chromosome whose
 * cumulative score first reaches `r`.
 *
 * A total of zero or less is not special-cased. The draw then falls in
 * [total, 0] and the store answers with the lowest-ranked entry whose running
 * sum reaches it (or the best one), which is defined but carries no fitness
 * signal. Scoring functions meant for this strategy should stay positive.
 */
export function rouletteWheel<G>(
  store: PopulationStore<G>,
  random: RandomSource
): Chromosome<G> {
  const total = store.totalScore();
  if (total <= 0) warnDegenerate('ROULETTE_WHEEL', total);
  return store.cumulativeScoreAt(random.real(0, total));
}

/**
 * Stochastic universal sampling.
 *
 * Picks `k` uniformly in [1, max(1, size / 10)], spaces `k` pointers
 * `total / k` apart from a random offset in [0, spacing] and returns the
 * chromosome under each pointer that still lies on the wheel (≤ total).
 * Rounding at the far end can leave the last pointer off the wheel, so fewer
 * than `k` chromosomes may come back. At most `k` pointers are read, and when
 * none lands on the wheel (total ≤ 0) the chromosome under the offset is
 * returned so a call always yields at least one pick.
 */
export function stochasticUniversal<G>(
  store: PopulationStore<G>,
  random: RandomSource
): Chromosome<G>[] {
  const total = store.totalScore();
  if (total <= 0) warnDegenerate('STOCHASTIC_UNIVERSAL', total);
  const pointers = random.int(1, Math.max(1, Math.floor(store.size / 10)));
  const spacing = total / pointers;
  const offset = random.real(0, spacing);

  const picked: Chromosome<G>[] = [];
  for (let i = 0; i < pointers; i++) {
    const pointer = offset + i * spacing;
    if (pointer > total) break;
    picked.push(store.cumulativeScoreAt(pointer));
  }
  if (!picked.length) picked.push(store.cumulativeScoreAt(offset));
  return picked;
}

/**
 * Tournament selection: draw `size` ranks uniformly with replacement and
 * return the highest-scored competitor. The first competitor seen wins ties.
 */
export function tournament<G>(
  store: PopulationStore<G>,
  size: number,
  random: RandomSource
): Chromosome<G> {
  const competitors: number[] = [];
  for (let i = 0; i < size; i++) competitors.push(random.int(0, store.size - 1));

  let bestIndex = competitors[0];
  let bestScore = store.scoreAt(bestIndex);
  for (const index of competitors) {
    const score = store.scoreAt(index);
    if (score > bestScore) {
      bestIndex = index;
      bestScore = score;
    }
  }
  return store.chromosomeAt(bestIndex);
}

function warnDegenerate(strategy: string, total: number): void {
  warnOnce(
    `selection:${strategy}:total`,
    `${strategy} selection received a total fitness of ${total}; picks no longer follow fitness. Keep scores positive or use TOURNAMENT.`
  );
}

function unknownSelection(method: never): never {
  throw new GeneticConfigError(
    `Unknown selection type: ${JSON.stringify(method)}`
  );
}
