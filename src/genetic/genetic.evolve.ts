import { PopulationStore } from './genetic.population';
import { select } from './genetic.selection';
import { cross } from './genetic.crossover';
import { mutate } from './genetic.mutation';
import type {
  Chromosome,
  GeneticOptions,
  GeneticProblem,
} from './genetic.types';

/**
 * Generation-level building blocks of the evolution loop.
 *
 * One generation is: score the working population into a fresh store, check
 * the ending criterion (done by the engine), then {@link breed} the next
 * working population from that store. These functions never touch engine
 * state; the engine decides when a built store becomes visible.
 */

/**
 * Score every chromosome exactly once and insert it into a new store.
 *
 * The store is returned only after the last insertion, so the caller can
 * publish it in a single assignment.
 */
export function scorePopulation<G>(
  population: readonly Chromosome<G>[],
  problem: GeneticProblem<G>
): PopulationStore<G> {
  const store = new PopulationStore<G>();
  for (const chromosome of population)
    store.insert(problem.score(chromosome), chromosome);
  return store;
}

/**
 * Produce the next working population from a scored store.
 *
 * Steps:
 *  1. Selection: call the configured strategy until at least two chromosomes
 *     are at hand (stochastic universal sampling may return several per call).
 *  2. Recombination: cross them two by two. With an odd count the last pick is
 *     dropped for this cycle rather than carried over.
 *  3. Repeat until `populationSize` offspring exist; overflow from the last pair
 *     is trimmed.
 *  4. Mutation: give every offspring its independent mutation chance.
 *
 * @returns Exactly `options.populationSize` chromosomes.
 */
export function breed<G>(
  store: PopulationStore<G>,
  problem: GeneticProblem<G>,
  options: GeneticOptions<G>
): Chromosome<G>[] {
  const { populationSize, random } = options;
  const offspring: Chromosome<G>[] = [];

  while (offspring.length < populationSize) {
    const parents: Chromosome<G>[] = [];
    while (parents.length < 2)
      parents.push(...select(store, options.selection, random));

    for (let i = 0; i + 1 < parents.length; i += 2) {
      const [childA, childB] = cross(parents[i], parents[i + 1], random);
      offspring.push(childA, childB);
    }
  }
  offspring.length = populationSize;

  const randomGene = () => problem.randomGene(random);
  for (const chromosome of offspring)
    mutate(chromosome, options.mutationProbability, randomGene, random);

  return offspring;
}
