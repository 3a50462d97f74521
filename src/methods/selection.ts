/** Roulette-wheel (fitness proportionate) selection descriptor. */
export interface RouletteWheelSelection {
  name: 'ROULETTE_WHEEL';
}

/** Stochastic universal sampling descriptor. */
export interface StochasticUniversalSelection {
  name: 'STOCHASTIC_UNIVERSAL';
}

/** Tournament selection descriptor. */
export interface TournamentSelection {
  name: 'TOURNAMENT';
  /** Number of competitors drawn (with replacement) per tournament. */
  size: number;
}

/** Any supported selection descriptor. */
export type SelectionMethod =
  | RouletteWheelSelection
  | StochasticUniversalSelection
  | TournamentSelection;

/**
 * Defines the selection methods used to choose the parents of the next
 * generation from the fitness-sorted population.
 *
 * Selection balances exploration (keeping diversity) against exploitation
 * (favouring high-fitness chromosomes). Fitness proportionate methods read the
 * raw scores and therefore expect them to be positive; tournament selection only
 * compares scores and works with any sign.
 *
 * @see {@link https://en.wikipedia.org/wiki/Selection_(genetic_algorithm)|Selection (genetic algorithm) - Wikipedia}
 */
export const selection: {
  ROULETTE_WHEEL: RouletteWheelSelection;
  STOCHASTIC_UNIVERSAL: StochasticUniversalSelection;
  TOURNAMENT: TournamentSelection;
} = {
  /**
   * Roulette Wheel Selection (Fitness Proportionate Selection).
   *
   * Spins a wheel whose slots are as wide as each chromosome's score and returns
   * the chromosome the ball lands on. A total score of zero or less makes the
   * wheel degenerate: a pick is still returned, but it no longer reflects fitness.
   */
  ROULETTE_WHEEL: {
    name: 'ROULETTE_WHEEL',
  },

  /**
   * Stochastic Universal Sampling.
   *
   * Same wheel as ROULETTE_WHEEL, but a random number `k` of evenly spaced
   * pointers (between 1 and a tenth of the population) is placed on it with a
   * single spin, returning up to `k` chromosomes at once.
   *
   * @see {@link https://en.wikipedia.org/wiki/Stochastic_universal_sampling}
   */
  STOCHASTIC_UNIVERSAL: {
    name: 'STOCHASTIC_UNIVERSAL',
  },

  /**
   * Tournament Selection.
   *
   * Draws `size` chromosomes uniformly (with replacement) and keeps the best.
   * A size of 1 is plain uniform sampling; larger sizes raise the selection
   * pressure. The size must not exceed the population size.
   *
   * @property {number} size - Competitors per tournament. Defaults to 10.
   */
  TOURNAMENT: {
    name: 'TOURNAMENT',
    size: 10,
  },
};
