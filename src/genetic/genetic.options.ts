import { selection as selectionMethods } from '../methods/selection';
import { ending as endingCriteria } from '../methods/ending';
import { resolveRandom } from '../utils/random';
import { GeneticConfigError } from './genetic.errors';
import type { GeneticOptions, GeneticOptionsInput } from './genetic.types';

/** Default population size. */
export const DEFAULT_POPULATION_SIZE = 100;
/** Default per-chromosome mutation probability. */
export const DEFAULT_MUTATION_PROBABILITY = 0.01;
/** Default chromosome length bounds. */
export const DEFAULT_CHROMOSOME_SIZE = { min: 1, max: 100 };

/**
 * Fill every missing option with its default. Caller-provided values are kept
 * as they are; validation happens later, at run start.
 *
 * Defaults: 100 chromosomes, mutation probability 0.01, BEST_SCORE ending,
 * TOURNAMENT selection of size 10, lengths in [1, 100], shared random source.
 */
export function hydrateOptions<G>(
  input: GeneticOptionsInput<G> = {}
): GeneticOptions<G> {
  return {
    populationSize: input.populationSize ?? DEFAULT_POPULATION_SIZE,
    mutationProbability:
      input.mutationProbability ?? DEFAULT_MUTATION_PROBABILITY,
    ending: input.ending ?? { ...endingCriteria.BEST_SCORE },
    selection: input.selection ?? { ...selectionMethods.TOURNAMENT },
    chromosomeSize: input.chromosomeSize ?? { ...DEFAULT_CHROMOSOME_SIZE },
    random: resolveRandom(input.random),
    schedule: input.schedule,
  };
}

/**
 * Check that the options describe a runnable configuration.
 *
 * @throws GeneticConfigError describing the first violation found.
 */
export function validateOptions<G>(options: GeneticOptions<G>): void {
  const { populationSize, mutationProbability, chromosomeSize } = options;

  if (!Number.isInteger(populationSize) || populationSize < 1)
    throw new GeneticConfigError(
      `The population size must be a positive integer (got ${populationSize})`
    );
  if (
    typeof mutationProbability !== 'number' ||
    !(mutationProbability >= 0 && mutationProbability <= 1)
  )
    throw new GeneticConfigError(
      `The mutation probability must be within [0, 1] (got ${mutationProbability})`
    );
  if (
    !Number.isInteger(chromosomeSize.min) ||
    !Number.isInteger(chromosomeSize.max) ||
    chromosomeSize.min < 1 ||
    chromosomeSize.max < chromosomeSize.min
  )
    throw new GeneticConfigError(
      `The chromosome size must satisfy 1 <= min <= max with integer bounds (got ${chromosomeSize.min}..${chromosomeSize.max})`
    );

  const selection = options.selection;
  switch (selection.name) {
    case 'ROULETTE_WHEEL':
    case 'STOCHASTIC_UNIVERSAL':
      break;
    case 'TOURNAMENT':
      if (!Number.isInteger(selection.size) || selection.size < 1)
        throw new GeneticConfigError(
          `The tournament size must be a positive integer (got ${selection.size})`
        );
      if (selection.size > populationSize)
        throw new GeneticConfigError(
          'The tournament size cannot be greater than the population size'
        );
      break;
    default:
      throw new GeneticConfigError(
        `Unknown selection type: ${JSON.stringify(selection)}`
      );
  }

  const ending = options.ending;
  switch (ending.name) {
    case 'MAX_SCORE':
      if (typeof ending.score !== 'number' || Number.isNaN(ending.score))
        throw new GeneticConfigError(
          `The MAX_SCORE threshold must be a number (got ${String(ending.score)})`
        );
      break;
    case 'BEST_SCORE':
    case 'NEVER_STOP':
      break;
    default:
      throw new GeneticConfigError(
        `Unknown ending criterion: ${JSON.stringify(ending)}`
      );
  }

  if (
    options.schedule &&
    (!Number.isInteger(options.schedule.generations) ||
      options.schedule.generations < 1)
  )
    throw new GeneticConfigError(
      `The schedule interval must be a positive integer (got ${options.schedule.generations})`
    );
}
