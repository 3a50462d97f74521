import type { RandomSource } from '../utils/random';
import type {
  Chromosome,
  ChromosomeSize,
  GeneticOptions,
  GeneticProblem,
} from './genetic.types';

/**
 * Create a random chromosome: length uniform in [size.min, size.max], every
 * gene from `problem.randomGene`.
 */
export function randomChromosome<G>(
  problem: GeneticProblem<G>,
  size: ChromosomeSize,
  random: RandomSource
): Chromosome<G> {
  const length = random.int(size.min, size.max);
  const chromosome: Chromosome<G> = [];
  for (let i = 0; i < length; i++) chromosome.push(problem.randomGene(random));
  return chromosome;
}

/** Build the initial working population of `options.populationSize` random chromosomes. */
export function seedPopulation<G>(
  problem: GeneticProblem<G>,
  options: GeneticOptions<G>
): Chromosome<G>[] {
  const population: Chromosome<G>[] = [];
  for (let i = 0; i < options.populationSize; i++)
    population.push(
      randomChromosome(problem, options.chromosomeSize, options.random)
    );
  return population;
}

/** Render a chromosome with the problem's printer (empty string when absent). */
export function render<G>(problem: GeneticProblem<G>, chromosome: readonly G[]): string {
  return problem.print ? problem.print(chromosome) : '';
}
